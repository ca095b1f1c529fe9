import {
  assertArray,
  assertEpochMillis,
  assertIsoDateTime,
  assertNumber,
  assertRecord,
  assertString,
  readCodedOpenEnum,
  readOpenEnum,
  readOptionalNumber,
} from '../common/validation/runtime-validation';
import { RANK_TIERS } from '../league/league.constants';
import {
  LEAGUEFLOW_POINT_LENGTH,
  LEAGUEFLOW_RESULTS,
  SCOREFLOW_POINT_LENGTH,
} from './labs.constants';
import type {
  LeagueRankData,
  LeagueRanks,
  Leagueflow,
  Scoreflow,
} from './labs.types';

const readTuple = (value: unknown, path: string, length: number): number[] => {
  const tuple = assertArray(value, path);
  return Array.from({ length }, (_, index) =>
    assertNumber(tuple[index], `${path}[${index}]`),
  );
};

// 점의 첫 값은 startTime 기준 오프셋(ms)이다.
const readFlow = (value: unknown, path: string, length: number) => {
  const root = assertRecord(value, path);
  const startTime = assertEpochMillis(root.startTime, `${path}.startTime`);
  const points = assertArray(root.points, `${path}.points`).map(
    (point, index) => readTuple(point, `${path}.points[${index}]`, length),
  );
  return {
    startTime,
    points,
    at: (offset: number) => new Date(startTime.getTime() + offset),
  };
};

export const decodeScoreflow = (value: unknown, path: string): Scoreflow => {
  const flow = readFlow(value, path, SCOREFLOW_POINT_LENGTH);
  return {
    startTime: flow.startTime,
    points: flow.points.map(([offset, personalBest, score]) => ({
      playedAt: flow.at(offset),
      personalBest: personalBest === 1,
      score,
    })),
  };
};

export const decodeLeagueflow = (value: unknown, path: string): Leagueflow => {
  const flow = readFlow(value, path, LEAGUEFLOW_POINT_LENGTH);
  return {
    startTime: flow.startTime,
    points: flow.points.map(
      ([offset, result, trAfter, opponentTrBefore], index) => ({
        playedAt: flow.at(offset),
        result: readCodedOpenEnum(
          result,
          `${path}.points[${index}][1]`,
          LEAGUEFLOW_RESULTS,
        ),
        trAfter,
        opponentTrBefore,
      }),
    ),
  };
};

const decodeRankData = (
  tier: string,
  value: unknown,
  path: string,
): LeagueRankData => {
  const rank = assertRecord(value, path);
  return {
    tier: readOpenEnum(tier, RANK_TIERS),
    position: assertNumber(rank.pos, `${path}.pos`, { integer: true, min: 0 }),
    percentile: assertNumber(rank.percentile, `${path}.percentile`),
    tr: assertNumber(rank.tr, `${path}.tr`),
    targetTr: assertNumber(rank.targettr, `${path}.targettr`),
    apm: readOptionalNumber(rank.apm, `${path}.apm`),
    pps: readOptionalNumber(rank.pps, `${path}.pps`),
    vs: readOptionalNumber(rank.vs, `${path}.vs`),
    count: assertNumber(rank.count, `${path}.count`, { integer: true, min: 0 }),
  };
};

/**
 * `labs/league_ranks`. data는 `total`과 tier 이름을 키로 한 항목들이다.
 * 새 tier가 생겨도 원문 키로 보존한다.
 */
export const decodeLeagueRanks = (
  value: unknown,
  path: string,
): LeagueRanks => {
  const root = assertRecord(value, path);
  const data = assertRecord(root.data, `${path}.data`);
  return {
    id: assertString(root._id, `${path}._id`, { minLength: 1 }),
    streamId: assertString(root.s, `${path}.s`),
    createdAt: assertIsoDateTime(root.t, `${path}.t`),
    total: assertNumber(data.total, `${path}.data.total`, {
      integer: true,
      min: 0,
    }),
    ranks: Object.entries(data)
      .filter(([key]) => key !== 'total')
      .map(([key, rank]) => decodeRankData(key, rank, `${path}.data.${key}`)),
  };
};
