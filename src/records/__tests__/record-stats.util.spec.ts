import { describe, expect, it } from 'vitest';
import {
  finesseRate,
  keysPerPiece,
  keysPerSecond,
  linesPerMinute,
  piecesPerSecond,
  replayUrl,
  scorePerPiece,
} from '../record-stats.util';
import { decodeGameRecord } from '../game-record.decoder';
import type { SinglePlayStats } from '../record.types';

const stats: SinglePlayStats = {
  finalTimeMs: 40000,
  score: 5000,
  lines: 40,
  inputs: 250,
  piecesPlaced: 100,
  clears: {},
  finesse: { perfectPieces: 95 },
};

describe('record-stats.util', () => {
  it('플레이 시간 기준 지표를 계산한다', () => {
    expect(piecesPerSecond(stats)).toBe(2.5);
    expect(keysPerSecond(stats)).toBe(6.25);
    expect(linesPerMinute(stats)).toBe(60);
  });

  it('피스 기준 지표를 계산한다', () => {
    expect(keysPerPiece(stats)).toBe(2.5);
    expect(scorePerPiece(stats)).toBe(50);
    expect(finesseRate(stats)).toBe(95);
  });

  it('값이 없거나 0이면 undefined를 반환한다', () => {
    const empty: SinglePlayStats = { clears: {}, finalTimeMs: 0, piecesPlaced: 0 };

    expect(piecesPerSecond(empty)).toBeUndefined();
    expect(keysPerPiece(empty)).toBeUndefined();
    expect(finesseRate(empty)).toBeUndefined();
  });

  it('replay ID가 있으면 리플레이 URL을 만든다', () => {
    const record = decodeGameRecord(
      {
        _id: 'record-1',
        replayid: 'replay-test-1',
        ts: '2024-07-24T12:00:00.000Z',
        gamemode: 'custom',
      },
      '$',
    );

    expect(replayUrl(record)).toBe('https://tetr.io/#R:replay-test-1');
    expect(replayUrl({ ...record, replayId: undefined })).toBeUndefined();
  });
});
