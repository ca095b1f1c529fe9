import {
  assertNumber,
  assertRecord,
  isRecord,
  readOpenEnum,
  readOptionalNonNegative,
  readOptionalNumber,
  readOptionalString,
  type JsonRecord,
} from '../common/validation/runtime-validation';
import {
  DEFAULT_SENTINEL_TIERS,
  PLACEMENT_GAMES,
  RANK_TIERS,
} from './league.constants';
import type {
  RankStanding,
  RankStandingKind,
  RankStandingPolicy,
} from './league.types';

export const DEFAULT_RANK_STANDING_POLICY: RankStandingPolicy = {
  precedence: 'tier',
  sentinelTiers: DEFAULT_SENTINEL_TIERS,
  placementGames: PLACEMENT_GAMES,
};

const RANK_FIELDS = ['rank', 'tr', 'rating', 'gamesplayed'] as const;

const hasRankFields = (value: JsonRecord): boolean =>
  RANK_FIELDS.some((field) => value[field] !== undefined);

// Current payloads carry `tr`; older ones used `rating`.
const readRating = (league: JsonRecord, path: string): number => {
  if (league.tr !== undefined && league.tr !== null) {
    return assertNumber(league.tr, `${path}.tr`);
  }
  return assertNumber(league.rating, `${path}.rating`);
};

const classify = (
  league: JsonRecord,
  path: string,
  policy: RankStandingPolicy,
): RankStanding => {
  const tier = readOptionalString(league.rank, `${path}.rank`);
  const gamesPlayed = readOptionalNumber(
    league.gamesplayed,
    `${path}.gamesplayed`,
    { integer: true, min: 0 },
  );
  const isSentinel =
    tier !== undefined && policy.sentinelTiers.includes(tier);

  if (tier !== undefined && !isSentinel) {
    return {
      kind: 'ranked',
      tier: readOpenEnum(tier, RANK_TIERS),
      rating: readRating(league, path),
      standing: readOptionalNonNegative(league.standing, `${path}.standing`),
      percentile: readOptionalNumber(league.percentile, `${path}.percentile`),
    };
  }

  if (gamesPlayed === undefined || gamesPlayed === 0) {
    return { kind: 'unranked' };
  }

  // Without a tier any played game means the user is still placing.
  if (!isSentinel) {
    return { kind: 'placement', gamesPlayedInPlacement: gamesPlayed };
  }

  if (
    policy.precedence === 'placement' &&
    gamesPlayed < policy.placementGames
  ) {
    return { kind: 'placement', gamesPlayedInPlacement: gamesPlayed };
  }

  return { kind: 'unranked' };
};

/**
 * Reads a league object into a {@link RankStanding}.
 *
 * The flat shape is tried first. When it carries none of the rank fields the
 * legacy `{ league: { ... } }` wrapper is tried, and an empty object (a user
 * who never played league) is `unranked`.
 */
export const decodeRankStanding = (
  value: unknown,
  path: string,
  policy: RankStandingPolicy = DEFAULT_RANK_STANDING_POLICY,
): RankStanding => {
  const root = assertRecord(value, path);
  if (hasRankFields(root)) {
    return classify(root, path, policy);
  }

  if (isRecord(root.league) && hasRankFields(root.league)) {
    return classify(root.league, `${path}.league`, policy);
  }

  return { kind: 'unranked' };
};

export const isRanked = (
  standing: RankStanding,
): standing is Extract<RankStanding, { kind: 'ranked' }> =>
  standing.kind === 'ranked';

export const rankStandingKind = (standing: RankStanding): RankStandingKind =>
  standing.kind;
