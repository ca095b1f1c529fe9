import {
  assertArray,
  assertNumber,
  assertRecord,
  readOptionalNumber,
} from '../common/validation/runtime-validation';
import type { ServerActivity, ServerStats } from './server.types';

const COUNT = { min: 0 } as const;

export const decodeServerStats = (value: unknown, path: string): ServerStats => {
  const stats = assertRecord(value, path);
  const anonCount = assertNumber(stats.anoncount, `${path}.anoncount`, COUNT);
  const userCount = assertNumber(stats.usercount, `${path}.usercount`, COUNT);

  return {
    userCount,
    userCountDelta:
      readOptionalNumber(stats.usercount_delta, `${path}.usercount_delta`) ?? 0,
    anonCount,
    // 구버전 응답에는 totalaccounts가 없다.
    totalAccounts:
      readOptionalNumber(stats.totalaccounts, `${path}.totalaccounts`, COUNT) ??
      userCount,
    rankedCount: assertNumber(stats.rankedcount, `${path}.rankedcount`, COUNT),
    recordCount:
      readOptionalNumber(stats.recordcount, `${path}.recordcount`, COUNT) ?? 0,
    gamesPlayed: assertNumber(stats.gamesplayed, `${path}.gamesplayed`, COUNT),
    gamesPlayedDelta:
      readOptionalNumber(
        stats.gamesplayed_delta,
        `${path}.gamesplayed_delta`,
      ) ?? 0,
    gamesFinished: assertNumber(
      stats.gamesfinished,
      `${path}.gamesfinished`,
      COUNT,
    ),
    gameTime: assertNumber(stats.gametime, `${path}.gametime`, COUNT),
    inputs: assertNumber(stats.inputs, `${path}.inputs`, COUNT),
    piecesPlaced: assertNumber(
      stats.piecesplaced,
      `${path}.piecesplaced`,
      COUNT,
    ),
  };
};

export const registeredPlayers = (stats: ServerStats): number =>
  stats.userCount - stats.anonCount;

export const playTimeHours = (stats: ServerStats): number =>
  stats.gameTime / 3600;

export const decodeServerActivity = (
  value: unknown,
  path: string,
): ServerActivity => {
  const root = assertRecord(value, path);
  return {
    activity: assertArray(root.activity, `${path}.activity`).map(
      (count, index) =>
        assertNumber(count, `${path}.activity[${index}]`, {
          integer: true,
          min: 0,
        }),
    ),
  };
};

export const activityPeak = (
  activity: ServerActivity,
): { value: number; index: number } | undefined =>
  activity.activity.reduce<{ value: number; index: number } | undefined>(
    (peak, value, index) =>
      peak === undefined || value > peak.value ? { value, index } : peak,
    undefined,
  );
