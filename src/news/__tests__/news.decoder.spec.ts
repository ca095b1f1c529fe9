import { describe, expect, it } from 'vitest';
import { RequestError } from '../../common/errors/client-error';
import { decodeNewsItem, decodeNewsList } from '../news.decoder';
import { toStreamId, validateNewsLimit } from '../news-query.validator';

const newsItem = (type: string, data: unknown, id = 'news-1') => ({
  _id: id,
  stream: 'global',
  type,
  data,
  ts: '2024-07-24T12:00:00.000Z',
});

describe('decodeNewsItem', () => {
  it('leaderboard 뉴스를 디코딩한다', () => {
    const item = decodeNewsItem(
      newsItem('leaderboard', {
        username: 'test-player',
        gametype: '40l',
        rank: 3,
        result: 15123,
        replayid: 'replay-test-1',
      }),
      '$.data.news[0]',
    );

    expect(item).toEqual({
      id: 'news-1',
      stream: 'global',
      createdAt: new Date('2024-07-24T12:00:00.000Z'),
      data: {
        kind: 'leaderboard',
        username: 'test-player',
        gamemode: { known: true, value: '40l' },
        rank: 3,
        result: 15123,
        replayId: 'replay-test-1',
      },
    });
  });

  it('badge 뉴스의 배지 ID는 data.type에서 읽는다', () => {
    const item = decodeNewsItem(
      newsItem('badge', {
        username: 'test-player',
        type: 'leaderboard1',
        label: 'Top of the leaderboard',
      }),
      '$',
    );

    expect(item.data).toEqual({
      kind: 'badge',
      username: 'test-player',
      badgeId: 'leaderboard1',
      label: 'Top of the leaderboard',
    });
  });

  it('rankup과 supporter_gift 뉴스를 구분한다', () => {
    expect(
      decodeNewsItem(newsItem('rankup', { username: 'a-player', rank: 'x+' }), '$')
        .data,
    ).toEqual({
      kind: 'rankup',
      username: 'a-player',
      rank: { known: true, value: 'x+' },
    });
    expect(
      decodeNewsItem(newsItem('supporter_gift', { username: 'a-player' }), '$')
        .data,
    ).toEqual({ kind: 'supporter_gift', username: 'a-player' });
  });

  it('모르는 타입은 원본 data를 보존한다', () => {
    const data = { username: 'a-player', anything: [1, 2] };

    expect(decodeNewsItem(newsItem('tournament', data), '$').data).toEqual({
      kind: 'unknown',
      type: 'tournament',
      data,
    });
  });
});

describe('decodeNewsList', () => {
  it('깨진 뉴스 항목은 건너뛰고 기록한다', () => {
    const list = decodeNewsList(
      {
        news: [
          newsItem('supporter', { username: 'a-player' }, 'news-1'),
          newsItem('personalbest', { username: 'b-player' }, 'news-2'),
          newsItem('rankup', { username: 'c-player', rank: 'u' }, 'news-3'),
        ],
      },
      '$.data',
    );

    expect(list.entries.map((item) => item.id)).toEqual(['news-1', 'news-3']);
    expect(list.failures).toEqual([
      {
        index: 1,
        path: '$.data.news[1].data.gametype',
        reason: 'expected string',
      },
    ]);
  });
});

describe('news-query.validator', () => {
  it('스트림 ID를 만든다', () => {
    expect(toStreamId('global')).toBe('global');
    expect(toStreamId({ userId: '5E32FC85AB319C2AB1BEB07C' })).toBe(
      'user_5e32fc85ab319c2ab1beb07c',
    );
  });

  it('limit은 1 이상 100 이하 정수여야 한다', () => {
    expect(validateNewsLimit(100)).toBe(100);
    expect(() => validateNewsLimit(0)).toThrow(RequestError);
    expect(() => validateNewsLimit(101)).toThrow(RequestError);
    expect(() => validateNewsLimit(1.5)).toThrow(RequestError);
  });
});
