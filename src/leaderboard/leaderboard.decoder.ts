import type { PayloadDecoder } from '../common/http/envelope.decoder';
import { decodePartialCollection } from '../common/http/partial-collection';
import {
  assertArray,
  assertNumber,
  assertRecord,
  assertString,
  readBooleanOrDefault,
  readOptionalIsoTimestamp,
  readOptionalNonNegative,
  readOptionalOpenEnum,
  readOptionalNumber,
  readOptionalString,
} from '../common/validation/runtime-validation';
import {
  decodeLeagueSummary,
  decodePastSeason,
} from '../league/league-summary.decoder';
import type { RankStandingPolicy } from '../league/league.types';
import { DEFAULT_RANK_STANDING_POLICY } from '../league/rank-standing.decoder';
import { decodeGameRecord } from '../records/game-record.decoder';
import type { GameRecord } from '../records/record.types';
import { USER_ROLES } from '../users/user.constants';
import { decodeAchievementRatingCounts } from '../users/user.decoder';
import { encodeCursor, readOptionalSortKey } from './leaderboard-cursor.util';
import type {
  HistoricalLeaderboardEntry,
  LeaderboardPage,
  LeaderboardUser,
} from './leaderboard.types';

/**
 * `{ entries: [...] }` 형태의 목록을 항목 단위로 디코딩한다.
 * 깨진 항목은 failures로 빠지고, 커서는 정상 디코딩된 항목에서만 뽑는다.
 */
export const decodeLeaderboardPage = <T extends { cursor?: string }>(
  value: unknown,
  path: string,
  decodeEntry: PayloadDecoder<T>,
): LeaderboardPage<T> => {
  const root = assertRecord(value, path);
  const values = assertArray(root.entries, `${path}.entries`);
  const { entries, failures } = decodePartialCollection(
    values,
    `${path}.entries`,
    decodeEntry,
  );

  const page: LeaderboardPage<T> = { entries, failures };
  const nextCursor = entries.at(-1)?.cursor;
  const prevCursor = entries.at(0)?.cursor;
  if (nextCursor !== undefined) {
    page.nextCursor = nextCursor;
  }
  if (prevCursor !== undefined) {
    page.prevCursor = prevCursor;
  }
  return page;
};

const readCursor = (value: unknown, path: string): string | undefined => {
  const key = readOptionalSortKey(value, path);
  return key ? encodeCursor(key) : undefined;
};

export const createLeaderboardUserDecoder =
  (
    policy: RankStandingPolicy = DEFAULT_RANK_STANDING_POLICY,
  ): PayloadDecoder<LeaderboardUser> =>
  (value, path) => {
    const user = assertRecord(value, path);
    return {
      id: assertString(user._id, `${path}._id`, { minLength: 1 }),
      username: assertString(user.username, `${path}.username`),
      role: readOptionalOpenEnum(user.role, `${path}.role`, USER_ROLES),
      createdAt: readOptionalIsoTimestamp(user.ts, `${path}.ts`),
      xp: assertNumber(user.xp, `${path}.xp`, { min: 0 }),
      country: readOptionalString(user.country, `${path}.country`),
      supporter: readBooleanOrDefault(
        user.supporter,
        `${path}.supporter`,
        false,
      ),
      league: decodeLeagueSummary(user.league ?? {}, `${path}.league`, policy),
      gamesPlayed: readOptionalNonNegative(user.gamesplayed, `${path}.gamesplayed`),
      gamesWon: readOptionalNonNegative(user.gameswon, `${path}.gameswon`),
      gameTime: readOptionalNonNegative(user.gametime, `${path}.gametime`),
      achievementRating:
        readOptionalNumber(user.ar, `${path}.ar`, { integer: true }) ?? 0,
      achievementRatingCounts: decodeAchievementRatingCounts(
        user.ar_counts,
        `${path}.ar_counts`,
      ),
      cursor: readCursor(user.p, `${path}.p`),
    };
  };

export const decodeLeaderboardUser = createLeaderboardUserDecoder();

export const decodeHistoricalEntry: PayloadDecoder<
  HistoricalLeaderboardEntry
> = (value, path) => {
  const entry = assertRecord(value, path);
  const season = assertString(entry.season, `${path}.season`);
  return {
    ...decodePastSeason(season, entry, path),
    id: assertString(entry._id, `${path}._id`, { minLength: 1 }),
    cursor: readCursor(entry.p, `${path}.p`),
  };
};

export const decodeRecordPage = (
  value: unknown,
  path: string,
): LeaderboardPage<GameRecord> =>
  decodeLeaderboardPage(value, path, decodeGameRecord);
