import { describe, expect, it } from 'vitest';
import { RuntimeValidationError } from '../../common/validation/runtime-validation';
import {
  decodeClearCounts,
  decodeGameRecord,
  isUnknownRecord,
} from '../game-record.decoder';

const holder = {
  id: '5e32fc85ab319c2ab1beb07c',
  username: 'test-player',
  avatar_revision: 1700000000000,
  country: 'KR',
  supporter: true,
};

const baseRecord = {
  _id: '66a0f0aa0000000000000001',
  replayid: 'replay-test-1',
  stub: false,
  ts: '2024-07-24T12:00:00.000Z',
  user: holder,
  otherusers: [],
  leaderboards: ['40l_global', '40l_country_KR'],
  disputed: false,
  revolution: null,
  pb: true,
  oncepb: true,
  p: { pri: 41.2, sec: 0, ter: 1721822400000 },
};

const sprintResults = {
  stats: {
    finaltime: 41200,
    score: 0,
    lines: 40,
    level: 1,
    inputs: 300,
    holds: 12,
    piecesplaced: 100,
    topcombo: 3,
    topbtb: 0,
    tspins: 0,
    clears: { singles: 2, doubles: 1, triples: 0, quads: 9, pentas: 0 },
    garbage: { sent: 0, received: 0, attack: 0, cleared: 0 },
    finesse: { combo: 80, faults: 2, perfectpieces: 98 },
  },
  gameoverreason: 'clear',
};

describe('decodeGameRecord', () => {
  it('40l 기록을 디코딩한다', () => {
    const record = decodeGameRecord(
      { ...baseRecord, gamemode: '40l', results: sprintResults },
      '$.data',
    );

    expect(record.mode).toBe('40l');
    expect(record.id).toBe('66a0f0aa0000000000000001');
    expect(record.replayId).toBe('replay-test-1');
    expect(record.playedAt.toISOString()).toBe('2024-07-24T12:00:00.000Z');
    expect(record.personalBest).toBe(true);
    expect(record.revolution).toBeUndefined();
    expect(record.cursor).toBe('41.2:0:1721822400000');
    expect(record.leaderboards).toEqual(['40l_global', '40l_country_KR']);
    expect(record.user).toEqual({
      id: '5e32fc85ab319c2ab1beb07c',
      username: 'test-player',
      avatarRevision: 1700000000000,
      bannerRevision: undefined,
      country: 'KR',
      supporter: true,
    });

    if (record.mode !== '40l') {
      throw new Error('expected 40l record');
    }
    expect(record.gameOverReason).toBe('clear');
    expect(record.stats.finalTimeMs).toBe(41200);
    expect(record.stats.piecesPlaced).toBe(100);
    expect(record.stats.clears).toEqual({
      singles: 2,
      doubles: 1,
      triples: 0,
      quads: 9,
      pentas: 0,
    });
    expect(record.stats.finesse).toEqual({
      combo: 80,
      faults: 2,
      perfectPieces: 98,
    });
  });

  it('구버전 finalTime 필드를 읽는다', () => {
    const record = decodeGameRecord(
      {
        ...baseRecord,
        gamemode: 'blitz',
        results: { stats: { finalTime: 120000, score: 150000 } },
      },
      '$.data',
    );

    if (record.mode !== 'blitz') {
      throw new Error('expected blitz record');
    }
    expect(record.stats.finalTimeMs).toBe(120000);
    expect(record.stats.score).toBe(150000);
    expect(record.stats.clears).toEqual({});
  });

  it('zenith 기록의 고도와 모드를 읽는다', () => {
    const record = decodeGameRecord(
      {
        ...baseRecord,
        gamemode: 'zenith',
        revolution: '@2024w31',
        results: {
          stats: {
            finaltime: 180000,
            zenith: { altitude: 812.4, peakrank: 6.1, floor: 6 },
          },
          gameoverreason: 'topout',
        },
        extras: { zenith: { mods: ['nohold', 'expert'] } },
      },
      '$.data',
    );

    expect(record.mode).toBe('zenith');
    expect(record.revolution).toBe('@2024w31');
    if (record.mode !== 'zenith') {
      throw new Error('expected zenith record');
    }
    expect(record.altitude).toBe(812.4);
    expect(record.peakRank).toBe(6.1);
    expect(record.floor).toBe(6);
    expect(record.mods).toEqual(['nohold', 'expert']);
    expect(record.gameOverReason).toBe('topout');
  });

  it('zenith 고도가 없으면 경로와 함께 실패한다', () => {
    expect(() =>
      decodeGameRecord(
        {
          ...baseRecord,
          gamemode: 'zenithex',
          results: { stats: { zenith: {} } },
        },
        '$.data',
      ),
    ).toThrow(
      new RuntimeValidationError(
        '$.data.results.stats.zenith.altitude',
        'number',
        undefined,
      ),
    );
  });

  it('league 기록의 선수, 라운드, 결과를 디코딩한다', () => {
    const record = decodeGameRecord(
      {
        ...baseRecord,
        gamemode: 'league',
        otherusers: [{ id: '5e32fc85ab319c2ab1beb07d', username: 'rival' }],
        results: {
          leaderboard: [
            {
              id: '5e32fc85ab319c2ab1beb07c',
              username: 'test-player',
              active: true,
              wins: 7,
              stats: { apm: 120.5, pps: 2.8, vsscore: 250.1 },
            },
            {
              id: '5e32fc85ab319c2ab1beb07d',
              username: 'rival',
              wins: 4,
            },
          ],
          rounds: [[], [], [], [], [], [], [], [], [], [], []],
        },
        extras: {
          result: 'victory',
          league: {
            '5e32fc85ab319c2ab1beb07c': [
              { tr: 22000, rank: 'ss' },
              { tr: 22040.5, glicko: 2200, rd: 60, rank: 'ss', placement: 1 },
            ],
          },
        },
      },
      '$.data',
    );

    if (record.mode !== 'league') {
      throw new Error('expected league record');
    }
    expect(record.roundsPlayed).toBe(11);
    expect(record.result).toEqual({ known: true, value: 'victory' });
    expect(record.otherUsers.map((other) => other.username)).toEqual(['rival']);
    expect(record.players).toHaveLength(2);
    expect(record.players[0].stats.vs).toBe(250.1);
    expect(record.players[1].active).toBe(true);
    expect(record.players[1].stats).toEqual({});
    expect(record.participants).toEqual([
      {
        userId: '5e32fc85ab319c2ab1beb07c',
        tr: 22040.5,
        glicko: 2200,
        rd: 60,
        rank: { known: true, value: 'ss' },
        placement: 1,
      },
    ]);
  });

  it('모르는 gamemode는 원본을 보존한 unknown 기록이 된다', () => {
    const payload = {
      ...baseRecord,
      gamemode: 'custom_mode',
      results: { anything: 1 },
    };

    const record = decodeGameRecord(payload, '$.data');

    expect(isUnknownRecord(record)).toBe(true);
    if (!isUnknownRecord(record)) {
      throw new Error('expected unknown record');
    }
    expect(record.gamemode).toBe('custom_mode');
    expect(record.results).toEqual({ anything: 1 });
    expect(record.raw).toBe(payload);
    expect(record.id).toBe('66a0f0aa0000000000000001');
  });

  it('ts가 없으면 실패한다', () => {
    const { ts: _ts, ...withoutTs } = baseRecord;

    expect(() =>
      decodeGameRecord(
        { ...withoutTs, gamemode: '40l', results: sprintResults },
        '$.data',
      ),
    ).toThrow('Validation failed at $.data.ts: expected string');
  });
});

describe('decodeClearCounts', () => {
  it('모르는 라벨은 무시하고 아는 라벨만 남긴다', () => {
    expect(
      decodeClearCounts(
        { quads: 3, tspinpentas: 1, allclear: 2, weird: 5 },
        '$.clears',
      ),
    ).toEqual({ quads: 3, tspinpentas: 1, allclear: 2 });
  });

  it('음수 개수는 거부한다', () => {
    expect(() => decodeClearCounts({ singles: -1 }, '$.clears')).toThrow(
      'Validation failed at $.clears.singles: expected number(>=0)',
    );
  });
});
