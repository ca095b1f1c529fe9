import {
  assertNumber,
  assertRecord,
  assertString,
  isRecord,
  readBooleanOrDefault,
  readOpenEnum,
  readOptionalNonNegative,
  readOptionalOpenEnum,
  readOptionalNumber,
  readOptionalString,
  type JsonRecord,
  type OpenEnum,
} from '../common/validation/runtime-validation';
import { RANK_TIERS, type RankTier } from './league.constants';
import type {
  LeagueSummary,
  PastSeason,
  RankStandingPolicy,
} from './league.types';
import {
  DEFAULT_RANK_STANDING_POLICY,
  decodeRankStanding,
} from './rank-standing.decoder';

const readOptionalTier = (
  value: unknown,
  path: string,
): OpenEnum<RankTier> | undefined =>
  readOptionalOpenEnum(value, path, RANK_TIERS);

export const decodePastSeason = (
  key: string,
  value: unknown,
  path: string,
): PastSeason => {
  const season = assertRecord(value, path);
  return {
    season: readOptionalString(season.season, `${path}.season`) ?? key,
    username: assertString(season.username, `${path}.username`),
    country: readOptionalString(season.country, `${path}.country`),
    placement: readOptionalNonNegative(
      season.placement,
      `${path}.placement`,
    ),
    ranked: readBooleanOrDefault(season.ranked, `${path}.ranked`, false),
    gamesPlayed: assertNumber(season.gamesplayed, `${path}.gamesplayed`, {
      integer: true,
      min: 0,
    }),
    gamesWon: assertNumber(season.gameswon, `${path}.gameswon`, {
      integer: true,
      min: 0,
    }),
    glicko: readOptionalNumber(season.glicko, `${path}.glicko`),
    rd: readOptionalNumber(season.rd, `${path}.rd`),
    tr: assertNumber(season.tr, `${path}.tr`),
    gxe: readOptionalNumber(season.gxe, `${path}.gxe`),
    rank: readOpenEnum(assertString(season.rank, `${path}.rank`), RANK_TIERS),
    bestRank: readOptionalTier(season.bestrank, `${path}.bestrank`),
    apm: readOptionalNumber(season.apm, `${path}.apm`),
    pps: readOptionalNumber(season.pps, `${path}.pps`),
    vs: readOptionalNumber(season.vs, `${path}.vs`),
  };
};

const decodePastSeasons = (value: unknown, path: string): PastSeason[] => {
  if (value === undefined || value === null) {
    return [];
  }
  const past = assertRecord(value, path);
  return Object.entries(past).map(([key, season]) =>
    decodePastSeason(key, season, `${path}.${key}`),
  );
};

// Older summaries nest everything one level down under `league`.
const unwrapLegacy = (root: JsonRecord, path: string) =>
  root.gamesplayed === undefined && isRecord(root.league)
    ? { league: root.league, path: `${path}.league` }
    : { league: root, path };

export const decodeLeagueSummary = (
  value: unknown,
  path: string,
  policy: RankStandingPolicy = DEFAULT_RANK_STANDING_POLICY,
): LeagueSummary => {
  const root = assertRecord(value, path);
  const { league, path: base } = unwrapLegacy(root, path);

  return {
    standing: decodeRankStanding(league, base, policy),
    gamesPlayed:
      readOptionalNumber(league.gamesplayed, `${base}.gamesplayed`, {
        integer: true,
        min: 0,
      }) ?? 0,
    gamesWon:
      readOptionalNumber(league.gameswon, `${base}.gameswon`, {
        integer: true,
        min: 0,
      }) ?? 0,
    glicko: readOptionalNumber(league.glicko, `${base}.glicko`),
    rd: readOptionalNumber(league.rd, `${base}.rd`),
    gxe: readOptionalNumber(league.gxe, `${base}.gxe`),
    apm: readOptionalNumber(league.apm, `${base}.apm`),
    pps: readOptionalNumber(league.pps, `${base}.pps`),
    vs: readOptionalNumber(league.vs, `${base}.vs`),
    decaying: readBooleanOrDefault(league.decaying, `${base}.decaying`, false),
    bestRank: readOptionalTier(league.bestrank, `${base}.bestrank`),
    standingLocal: readOptionalNonNegative(
      league.standing_local,
      `${base}.standing_local`,
    ),
    nextRank: readOptionalTier(league.next_rank, `${base}.next_rank`),
    prevRank: readOptionalTier(league.prev_rank, `${base}.prev_rank`),
    nextAt: readOptionalNonNegative(league.next_at, `${base}.next_at`),
    prevAt: readOptionalNonNegative(league.prev_at, `${base}.prev_at`),
    past: decodePastSeasons(league.past, `${base}.past`),
  };
};

/**
 * Position inside the current tier as a percentage. Upstream boundaries move,
 * so values outside 0..100 happen. `undefined` when the user has no global
 * standing or a boundary is missing.
 */
export const rankProgress = (summary: LeagueSummary): number | undefined => {
  const { standing, prevAt, nextAt } = summary;
  if (
    standing.kind !== 'ranked' ||
    standing.standing === undefined ||
    prevAt === undefined ||
    nextAt === undefined ||
    nextAt === prevAt
  ) {
    return undefined;
  }
  return ((standing.standing - prevAt) / (nextAt - prevAt)) * 100;
};
