import {
  decodePartialCollection,
  type PartialCollection,
} from '../common/http/partial-collection';
import {
  assertArray,
  assertIsoDateTime,
  assertNumber,
  assertRecord,
  assertString,
  readOpenEnum,
  type JsonRecord,
} from '../common/validation/runtime-validation';
import { RANK_TIERS } from '../league/league.constants';
import { GAME_MODES } from '../records/record.constants';
import { NEWS_TYPES } from './news.constants';
import type { NewsData, NewsItem } from './news.types';

const decodeKnownNews = (
  type: (typeof NEWS_TYPES)[number],
  data: JsonRecord,
  path: string,
): NewsData => {
  const username = assertString(data.username, `${path}.username`);
  switch (type) {
    case 'leaderboard':
      return {
        kind: type,
        username,
        gamemode: readOpenEnum(
          assertString(data.gametype, `${path}.gametype`),
          GAME_MODES,
        ),
        rank: assertNumber(data.rank, `${path}.rank`, { integer: true, min: 1 }),
        result: assertNumber(data.result, `${path}.result`),
        replayId: assertString(data.replayid, `${path}.replayid`),
      };
    case 'personalbest':
      return {
        kind: type,
        username,
        gamemode: readOpenEnum(
          assertString(data.gametype, `${path}.gametype`),
          GAME_MODES,
        ),
        result: assertNumber(data.result, `${path}.result`),
        replayId: assertString(data.replayid, `${path}.replayid`),
      };
    case 'badge':
      return {
        kind: type,
        username,
        badgeId: assertString(data.type, `${path}.type`),
        label: assertString(data.label, `${path}.label`),
      };
    case 'rankup':
      return {
        kind: type,
        username,
        rank: readOpenEnum(assertString(data.rank, `${path}.rank`), RANK_TIERS),
      };
    case 'supporter':
      return { kind: type, username };
    case 'supporter_gift':
      return { kind: type, username };
  }
};

export const decodeNewsItem = (value: unknown, path: string): NewsItem => {
  const news = assertRecord(value, path);
  const type = readOpenEnum(
    assertString(news.type, `${path}.type`),
    NEWS_TYPES,
  );

  return {
    id: assertString(news._id, `${path}._id`, { minLength: 1 }),
    stream: assertString(news.stream, `${path}.stream`),
    createdAt: assertIsoDateTime(news.ts, `${path}.ts`),
    data: type.known
      ? decodeKnownNews(
          type.value,
          assertRecord(news.data, `${path}.data`),
          `${path}.data`,
        )
      : { kind: 'unknown', type: type.raw, data: news.data },
  };
};

export const decodeNewsList = (
  value: unknown,
  path: string,
): PartialCollection<NewsItem> => {
  const root = assertRecord(value, path);
  return decodePartialCollection(
    assertArray(root.news, `${path}.news`),
    `${path}.news`,
    decodeNewsItem,
  );
};
