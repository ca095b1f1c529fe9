import { beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { createTetraChannelClient } from '../tetra-channel.factory';
import { TetraChannelClient } from '../tetra-channel.client';
import type {
  TetraTransport,
  TransportRequest,
  TransportResponse,
} from '../tetra-channel.interfaces';

const jsonResponse = (status: number, body: unknown): TransportResponse => ({
  status,
  body: new TextEncoder().encode(JSON.stringify(body)),
});

const cache = {
  status: 'hit',
  cached_at: 1721822400000,
  cached_until: 1721822460000,
};

const serverStats = {
  usercount: 10,
  anoncount: 4,
  rankedcount: 2,
  gamesplayed: 100,
  gamesfinished: 90,
  gametime: 3600,
  inputs: 1000,
  piecesplaced: 400,
};

describe('TetraChannelClient', () => {
  let send: Mock<TetraTransport['send']>;
  let transport: TetraTransport;

  beforeEach(() => {
    send = vi.fn<TetraTransport['send']>();
    transport = { send };
  });

  const lastRequest = (): TransportRequest => {
    const call = send.mock.calls.at(-1);
    if (!call) {
      throw new Error('transport was not called');
    }
    return call[0];
  };

  it('성공 응답의 data와 cache를 반환한다', async () => {
    send.mockResolvedValue(
      jsonResponse(200, { success: true, data: serverStats, cache }),
    );
    const client = createTetraChannelClient({ transport });

    const result = await client.getServerStats();

    expect(result.success).toBe(true);
    if (!result.success) {
      throw result.error;
    }
    expect(result.data.userCount).toBe(10);
    expect(result.cache?.status).toEqual({ known: true, value: 'hit' });
    expect(result.cache?.cachedUntil.getTime()).toBe(1721822460000);
    expect(lastRequest()).toEqual({
      method: 'GET',
      path: 'general/stats',
      query: {},
      headers: {
        Accept: 'application/json',
        'User-Agent': 'tetra-channel-client',
      },
    });
  });

  it('세션 ID가 있으면 X-Session-ID 헤더를 붙인다', async () => {
    send.mockResolvedValue(jsonResponse(200, { success: true, data: null }));
    const client = createTetraChannelClient({
      transport,
      userAgent: 'test-agent/1.0',
      sessionId: ' session-test ',
    });

    await client.searchUser('discord', '100000000000000001');

    expect(lastRequest().headers).toEqual({
      Accept: 'application/json',
      'User-Agent': 'test-agent/1.0',
      'X-Session-ID': 'session-test',
    });
    expect(lastRequest().path).toBe(
      'users/search/discord:100000000000000001',
    );
  });

  it('유저명을 소문자로 바꿔 경로를 만든다', async () => {
    send.mockResolvedValue(
      jsonResponse(200, {
        success: true,
        data: { _id: '5e32fc85ab319c2ab1beb07c', username: 'test-player', xp: 0 },
      }),
    );
    const client = createTetraChannelClient({ transport });

    const result = await client.getUser('Test-Player');

    expect(lastRequest().path).toBe('users/test-player');
    expect(result.success && result.data.username).toBe('test-player');
  });

  it('404 응답은 not_found ApiError가 된다', async () => {
    send.mockResolvedValue(
      jsonResponse(404, { success: false, error: { msg: 'No such user!' } }),
    );
    const client = createTetraChannelClient({ transport });

    const result = await client.getUser('missing-user');

    expect(result.success).toBe(false);
    if (result.success) {
      throw new Error('expected failure');
    }
    expect(result.error.kind).toBe('api');
    if (result.error.kind !== 'api') {
      throw result.error;
    }
    expect(result.error.code).toBe('not_found');
    expect(result.error.status).toBe(404);
    expect(result.error.message).toBe('No such user!');
  });

  it('파라미터가 잘못되면 요청을 보내지 않는다', async () => {
    const client = createTetraChannelClient({ transport });

    const result = await client.getLeagueLeaderboard({ limit: 500 });

    expect(send).not.toHaveBeenCalled();
    expect(result.success).toBe(false);
    if (result.success) {
      throw new Error('expected failure');
    }
    expect(result.error.kind).toBe('request');
    expect(result.error.message).toBe('limit 값이 허용 범위를 벗어났습니다.');
  });

  it('전송 계층이 reject 하면 TransportError가 된다', async () => {
    const cause = new Error('socket hang up');
    send.mockRejectedValue(cause);
    const client = createTetraChannelClient({ transport });

    const result = await client.getServerActivity();

    if (result.success) {
      throw new Error('expected failure');
    }
    expect(result.error.kind).toBe('transport');
    expect(result.error.message).toBe(
      'Transport failed for general/activity: socket hang up',
    );
    expect(result.error.cause).toBe(cause);
  });

  it('본문 디코딩에 실패하면 DecodeError를 반환한다', async () => {
    send.mockResolvedValue(
      jsonResponse(200, { success: true, data: { activity: 'none' } }),
    );
    const client = createTetraChannelClient({ transport });

    const result = await client.getServerActivity();

    if (result.success) {
      throw new Error('expected failure');
    }
    expect(result.error.kind).toBe('decode');
    expect(result.error.message).toBe(
      'Failed to decode response at $.data.activity: expected array',
    );
  });

  it('리더보드 쿼리와 페이지 커서를 전달한다', async () => {
    send.mockResolvedValue(
      jsonResponse(200, {
        success: true,
        data: {
          entries: [
            {
              _id: '5e32fc85ab319c2ab1beb07c',
              username: 'test-player',
              role: 'user',
              xp: 1,
              league: { gamesplayed: 20, tr: 25000, rank: 'x+' },
              p: { pri: 25000, sec: 0, ter: 0 },
            },
          ],
        },
      }),
    );
    const client = createTetraChannelClient({ transport });

    const result = await client.getLeagueLeaderboard({
      limit: 25,
      after: '25001:0:0',
      country: 'kr',
    });

    expect(lastRequest().path).toBe('users/by/league');
    expect(lastRequest().query).toEqual({
      limit: '25',
      after: '25001:0:0',
      country: 'KR',
    });
    if (!result.success) {
      throw result.error;
    }
    expect(result.data.nextCursor).toBe('25000:0:0');
    expect(result.data.failures).toEqual([]);
  });

  it('XP 리더보드는 users/by/xp를 호출한다', async () => {
    send.mockResolvedValue(
      jsonResponse(200, { success: true, data: { entries: [] } }),
    );
    const client = createTetraChannelClient({ transport });

    const result = await client.getXpLeaderboard({ before: '100:0:0' });

    expect(lastRequest()).toMatchObject({
      path: 'users/by/xp',
      query: { before: '100:0:0' },
    });
    expect(result.success && result.data.entries).toEqual([]);
  });

  it('지원하지 않는 정렬 기준은 UNSUPPORTED_SORT', async () => {
    const client = createTetraChannelClient({ transport });

    const result = await client.getUserLeaderboard('tr');

    expect(send).not.toHaveBeenCalled();
    if (result.success || result.error.kind !== 'request') {
      throw new Error('expected request error');
    }
    expect(result.error.code).toBe('UNSUPPORTED_SORT');
  });

  it('유저 기록 목록 경로를 만든다', async () => {
    send.mockResolvedValue(
      jsonResponse(200, { success: true, data: { entries: [] } }),
    );
    const client = createTetraChannelClient({ transport });

    await client.getUserRecords('test-player', 'blitz', 'top', { limit: 10 });

    expect(lastRequest().path).toBe('users/test-player/records/blitz/top');
    expect(lastRequest().query).toEqual({ limit: '10' });
  });

  it('기록 리더보드와 기록 역검색 경로를 만든다', async () => {
    send.mockResolvedValue(
      jsonResponse(200, { success: true, data: { entries: [] } }),
    );
    const client = createTetraChannelClient({ transport });

    await client.getRecordLeaderboard({
      gamemode: 'zenith',
      country: 'jp',
      revolution: '@2024w31',
    });
    expect(lastRequest().path).toBe('records/zenith_country_JP@2024w31');

    await client.searchRecord({
      userId: '5e32fc85ab319c2ab1beb07c',
      gamemode: '40l',
      timestamp: 1721822400000,
    });
    expect(lastRequest()).toMatchObject({
      path: 'records/reverse',
      query: {
        user: '5e32fc85ab319c2ab1beb07c',
        gamemode: '40l',
        ts: '1721822400000',
      },
    });
  });

  it('뉴스 스트림과 기본 limit을 사용한다', async () => {
    send.mockResolvedValue(
      jsonResponse(200, { success: true, data: { news: [] } }),
    );
    const client = createTetraChannelClient({ transport });

    await client.getLatestNews({ userId: '5e32fc85ab319c2ab1beb07c' });
    expect(lastRequest()).toMatchObject({
      path: 'news/user_5e32fc85ab319c2ab1beb07c',
      query: { limit: '25' },
    });

    await client.getAllNews(5);
    expect(lastRequest()).toMatchObject({ path: 'news/', query: { limit: '5' } });
  });

  it('요약 경로를 만든다', async () => {
    send.mockResolvedValue(
      jsonResponse(200, { success: true, data: { record: null, rank: -1 } }),
    );
    const client = new TetraChannelClient({ userAgent: 'test-agent' }, transport);

    const result = await client.getUserRecordSummary('test-player', 'zenith');

    expect(lastRequest().path).toBe('users/test-player/summaries/zenith');
    expect(result.success && result.data.rank).toBeUndefined();
  });

  it('지난 시즌 리더보드 경로를 만든다', async () => {
    send.mockResolvedValue(
      jsonResponse(200, { success: true, data: { entries: [] } }),
    );
    const client = createTetraChannelClient({ transport });

    await client.getHistoricalLeagueLeaderboard('1', { limit: 50 });

    expect(lastRequest()).toMatchObject({
      path: 'users/history/league/1',
      query: { limit: '50' },
    });

    const empty = await client.getHistoricalLeagueLeaderboard('  ');
    expect(empty.success).toBe(false);
    expect(send).toHaveBeenCalledTimes(1);
  });

  it('zen, 업적, 전체 요약 경로를 만든다', async () => {
    send
      .mockResolvedValueOnce(
        jsonResponse(200, { success: true, data: { level: 3, score: 1000 } }),
      )
      .mockResolvedValueOnce(jsonResponse(200, { success: true, data: [] }))
      .mockResolvedValueOnce(
        jsonResponse(404, { success: false, error: { msg: 'No such user!' } }),
      );
    const client = createTetraChannelClient({ transport });

    const zen = await client.getUserZenSummary('Test-Player');
    expect(lastRequest().path).toBe('users/test-player/summaries/zen');
    expect(zen.success && zen.data).toEqual({ level: 3, score: 1000 });

    const achievements = await client.getUserAchievements('test-player');
    expect(lastRequest().path).toBe('users/test-player/summaries/achievements');
    expect(achievements.success && achievements.data).toEqual({
      entries: [],
      failures: [],
    });

    const all = await client.getUserAllSummaries('test-player');
    expect(lastRequest().path).toBe('users/test-player/summaries');
    expect(!all.success && all.error).toMatchObject({
      kind: 'api',
      code: 'not_found',
    });
  });

  it('labs 경로를 만든다', async () => {
    send
      .mockResolvedValueOnce(
        jsonResponse(200, {
          success: true,
          data: { startTime: 1721822400000, points: [[0, 1, -95000]] },
        }),
      )
      .mockResolvedValueOnce(
        jsonResponse(200, {
          success: true,
          data: { startTime: 1721822400000, points: [] },
        }),
      )
      .mockResolvedValueOnce(
        jsonResponse(200, {
          success: true,
          data: {
            _id: 'labs-point-1',
            s: 'league_ranks',
            t: '2024-07-24T12:00:00.000Z',
            data: { total: 0 },
          },
        }),
      );
    const client = createTetraChannelClient({ transport });

    const scoreflow = await client.getScoreflow('Test-Player', '40l');
    expect(lastRequest().path).toBe('labs/scoreflow/test-player/40l');
    expect(scoreflow.success && scoreflow.data.points).toEqual([
      { playedAt: new Date(1721822400000), personalBest: true, score: -95000 },
    ]);

    await client.getLeagueflow('test-player');
    expect(lastRequest().path).toBe('labs/leagueflow/test-player');

    const ranks = await client.getLeagueRanks();
    expect(lastRequest().path).toBe('labs/league_ranks');
    expect(ranks.success && ranks.data.ranks).toEqual([]);
  });

  it('업적 정보는 id를 검증한 뒤 요청한다', async () => {
    send.mockResolvedValue(
      jsonResponse(404, { success: false, error: { msg: 'Not found' } }),
    );
    const client = createTetraChannelClient({ transport });

    const rejected = await client.getAchievementInfo(0);
    expect(send).not.toHaveBeenCalled();
    expect(!rejected.success && rejected.error).toMatchObject({
      kind: 'request',
      code: 'INVALID_IDENTIFIER',
    });

    await client.getAchievementInfo(15);
    expect(lastRequest().path).toBe('achievements/15');
  });
});
