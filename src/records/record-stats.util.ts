import { REPLAY_BASE_URL } from './record.constants';
import type { GameRecord, SinglePlayStats } from './record.types';

const perSecond = (count: number | undefined, timeMs: number | undefined) =>
  count === undefined || timeMs === undefined || timeMs <= 0
    ? undefined
    : count / (timeMs / 1000);

const ratio = (numerator: number | undefined, denominator: number | undefined) =>
  numerator === undefined || denominator === undefined || denominator === 0
    ? undefined
    : numerator / denominator;

/** Pieces per second. */
export const piecesPerSecond = (stats: SinglePlayStats): number | undefined =>
  perSecond(stats.piecesPlaced, stats.finalTimeMs);

/** Keys per piece. */
export const keysPerPiece = (stats: SinglePlayStats): number | undefined =>
  ratio(stats.inputs, stats.piecesPlaced);

/** Keys per second. */
export const keysPerSecond = (stats: SinglePlayStats): number | undefined =>
  perSecond(stats.inputs, stats.finalTimeMs);

/** Lines per minute. */
export const linesPerMinute = (stats: SinglePlayStats): number | undefined => {
  const perSec = perSecond(stats.lines, stats.finalTimeMs);
  return perSec === undefined ? undefined : perSec * 60;
};

/** Score per piece. */
export const scorePerPiece = (stats: SinglePlayStats): number | undefined =>
  ratio(stats.score, stats.piecesPlaced);

// 0~100 사이 백분율
export const finesseRate = (stats: SinglePlayStats): number | undefined => {
  const rate = ratio(stats.finesse?.perfectPieces, stats.piecesPlaced);
  return rate === undefined ? undefined : rate * 100;
};

export const replayUrl = (record: GameRecord): string | undefined =>
  record.replayId ? `${REPLAY_BASE_URL}${record.replayId}` : undefined;
