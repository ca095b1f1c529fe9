import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  decodeAchievementInfo,
  decodeAchievementList,
} from '../achievements/achievement.decoder';
import type {
  Achievement,
  AchievementInfo,
} from '../achievements/achievement.types';
import { validateAchievementId } from '../achievements/achievement.util';
import {
  failureResult,
  type ClientResult,
} from '../common/http/api-response';
import {
  decodeEnvelope,
  type PayloadDecoder,
} from '../common/http/envelope.decoder';
import type { PartialCollection } from '../common/http/partial-collection';
import {
  REQUEST_ERROR_CODES,
  RequestError,
  TransportError,
} from '../common/errors/client-error';
import {
  buildRecordLeaderboardId,
  validatePagination,
  validateRecordListType,
  validateUserLeaderboardOptions,
  validateUserLeaderboardSort,
  type PaginationOptions,
  type RecordLeaderboardOptions,
  type UserLeaderboardOptions,
} from '../leaderboard/leaderboard-query.validator';
import {
  createLeaderboardUserDecoder,
  decodeHistoricalEntry,
  decodeRecordPage,
  decodeLeaderboardPage,
} from '../leaderboard/leaderboard.decoder';
import type {
  HistoricalLeaderboardEntry,
  LeaderboardPage,
  LeaderboardUser,
} from '../leaderboard/leaderboard.types';
import { decodeLeagueSummary } from '../league/league-summary.decoder';
import type {
  LeagueSummary,
  RankStandingPolicy,
} from '../league/league.types';
import { DEFAULT_RANK_STANDING_POLICY } from '../league/rank-standing.decoder';
import {
  decodeLeagueRanks,
  decodeLeagueflow,
  decodeScoreflow,
} from '../labs/labs.decoder';
import type { LeagueRanks, Leagueflow, Scoreflow } from '../labs/labs.types';
import { NEWS_DEFAULT_LIMIT } from '../news/news.constants';
import { decodeNewsList } from '../news/news.decoder';
import { toStreamId, validateNewsLimit } from '../news/news-query.validator';
import type { NewsItem, NewsStream } from '../news/news.types';
import { decodeGameRecord } from '../records/game-record.decoder';
import type { GameMode, RecordListType } from '../records/record.constants';
import { decodeRecordSummary } from '../records/record-summary.decoder';
import type { GameRecord, RecordSummary } from '../records/record.types';
import {
  decodeServerActivity,
  decodeServerStats,
} from '../server/server.decoder';
import type { ServerActivity, ServerStats } from '../server/server.types';
import {
  decodeSearchedUser,
  decodeUserProfile,
} from '../users/user.decoder';
import {
  buildSearchQuery,
  normalizeUserIdentifier,
} from '../users/user-query.validator';
import {
  decodeAllSummaries,
  decodeZenSummary,
} from '../users/user-summary.decoder';
import type {
  AllSummaries,
  SearchedUser,
  UserProfile,
  ZenSummary,
} from '../users/user.types';
import {
  SESSION_ID_HEADER,
  TETRA_CHANNEL_OPTIONS,
  TETRA_CHANNEL_TRANSPORT,
} from './tetra-channel.constants';
import type {
  QueryValues,
  TetraChannelClientOptions,
  TetraTransport,
  TransportResponse,
} from './tetra-channel.interfaces';

type PreparedRequest = {
  path: string;
  query?: QueryValues;
};

export type RecordSearchQuery = {
  userId: string;
  gamemode: GameMode;
  /** 기록 제출 시각 (epoch millis) */
  timestamp: number;
};

const segment = (value: string): string => encodeURIComponent(value);

const userPath = (user: string): string =>
  `users/${segment(normalizeUserIdentifier(user))}`;

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * TETRA CHANNEL API 클라이언트.
 *
 * 모든 메서드는 예외를 던지지 않고 `ClientResult`로 resolve 한다.
 * 파라미터 오류는 요청을 보내기 전에 RequestError로 반환된다.
 */
@Injectable()
export class TetraChannelClient {
  private readonly logger = new Logger(TetraChannelClient.name);
  private readonly headers: Readonly<Record<string, string>>;
  private readonly rankPolicy: RankStandingPolicy;
  private readonly decodeLeaderboardUser: PayloadDecoder<LeaderboardUser>;

  constructor(
    @Inject(TETRA_CHANNEL_OPTIONS)
    options: TetraChannelClientOptions,
    @Inject(TETRA_CHANNEL_TRANSPORT)
    private readonly transport: TetraTransport,
  ) {
    const sessionId = options.sessionId?.trim();
    this.headers = {
      Accept: 'application/json',
      'User-Agent': options.userAgent,
      ...(sessionId ? { [SESSION_ID_HEADER]: sessionId } : {}),
    };
    this.rankPolicy = options.rankPolicy ?? DEFAULT_RANK_STANDING_POLICY;
    this.decodeLeaderboardUser = createLeaderboardUserDecoder(this.rankPolicy);
  }

  getUser(user: string): Promise<ClientResult<UserProfile>> {
    return this.execute(
      'getUser',
      () => ({ path: userPath(user) }),
      decodeUserProfile,
    );
  }

  getUserRecords(
    user: string,
    gamemode: GameMode,
    type: RecordListType,
    options: PaginationOptions = {},
  ): Promise<ClientResult<LeaderboardPage<GameRecord>>> {
    return this.executeCollection(
      'getUserRecords',
      () => {
        const id = normalizeUserIdentifier(user);
        const listType = validateRecordListType(gamemode, type);
        return {
          path: `users/${segment(id)}/records/${gamemode}/${listType}`,
          query: validatePagination(options),
        };
      },
      decodeRecordPage,
    );
  }

  /**
   * `users/by/:leaderboard`. sort는 league, xp, ar 중 하나다.
   */
  getUserLeaderboard(
    sort: string,
    options: UserLeaderboardOptions = {},
  ): Promise<ClientResult<LeaderboardPage<LeaderboardUser>>> {
    return this.executeCollection(
      'getUserLeaderboard',
      () => ({
        path: `users/by/${validateUserLeaderboardSort(sort)}`,
        query: validateUserLeaderboardOptions(options),
      }),
      (value, path) =>
        decodeLeaderboardPage(value, path, this.decodeLeaderboardUser),
    );
  }

  getLeagueLeaderboard(
    options: UserLeaderboardOptions = {},
  ): Promise<ClientResult<LeaderboardPage<LeaderboardUser>>> {
    return this.getUserLeaderboard('league', options);
  }

  getXpLeaderboard(
    options: UserLeaderboardOptions = {},
  ): Promise<ClientResult<LeaderboardPage<LeaderboardUser>>> {
    return this.getUserLeaderboard('xp', options);
  }

  getHistoricalLeagueLeaderboard(
    season: string,
    options: UserLeaderboardOptions = {},
  ): Promise<ClientResult<LeaderboardPage<HistoricalLeaderboardEntry>>> {
    return this.executeCollection(
      'getHistoricalLeagueLeaderboard',
      () => {
        const seasonId = season.trim();
        if (seasonId === '') {
          throw new RequestError(
            REQUEST_ERROR_CODES.INVALID_IDENTIFIER,
            'season 값은 비어 있을 수 없습니다.',
            { season },
          );
        }
        return {
          path: `users/history/league/${segment(seasonId)}`,
          query: validateUserLeaderboardOptions(options),
        };
      },
      (value, path) => decodeLeaderboardPage(value, path, decodeHistoricalEntry),
    );
  }

  getRecordLeaderboard(
    options: RecordLeaderboardOptions,
  ): Promise<ClientResult<LeaderboardPage<GameRecord>>> {
    return this.executeCollection(
      'getRecordLeaderboard',
      () => ({
        path: `records/${buildRecordLeaderboardId(options)}`,
        query: validatePagination(options),
      }),
      decodeRecordPage,
    );
  }

  searchRecord(query: RecordSearchQuery): Promise<ClientResult<GameRecord>> {
    return this.execute(
      'searchRecord',
      () => {
        if (!Number.isInteger(query.timestamp) || query.timestamp < 0) {
          throw new RequestError(
            REQUEST_ERROR_CODES.INVALID_IDENTIFIER,
            'timestamp 값은 0 이상의 epoch millis 정수여야 합니다.',
            { timestamp: query.timestamp },
          );
        }
        return {
          path: 'records/reverse',
          query: {
            user: normalizeUserIdentifier(query.userId),
            gamemode: query.gamemode,
            ts: String(query.timestamp),
          },
        };
      },
      decodeGameRecord,
    );
  }

  /** 일치하는 유저가 없으면 data가 null이다. */
  searchUser(
    provider: string,
    id: string,
  ): Promise<ClientResult<SearchedUser | null>> {
    return this.execute(
      'searchUser',
      () => ({
        path: `users/search/${buildSearchQuery(provider, id)}`,
      }),
      decodeSearchedUser,
    );
  }

  getUserLeagueSummary(user: string): Promise<ClientResult<LeagueSummary>> {
    return this.execute(
      'getUserLeagueSummary',
      () => ({
        path: `${userPath(user)}/summaries/league`,
      }),
      (value, path) => decodeLeagueSummary(value, path, this.rankPolicy),
    );
  }

  getUserRecordSummary(
    user: string,
    gamemode: Exclude<GameMode, 'league'>,
  ): Promise<ClientResult<RecordSummary>> {
    return this.execute(
      'getUserRecordSummary',
      () => ({
        path: `${userPath(user)}/summaries/${gamemode}`,
      }),
      decodeRecordSummary,
    );
  }

  getUserZenSummary(user: string): Promise<ClientResult<ZenSummary>> {
    return this.execute(
      'getUserZenSummary',
      () => ({ path: `${userPath(user)}/summaries/zen` }),
      decodeZenSummary,
    );
  }

  getUserAchievements(
    user: string,
  ): Promise<ClientResult<PartialCollection<Achievement>>> {
    return this.executeCollection(
      'getUserAchievements',
      () => ({ path: `${userPath(user)}/summaries/achievements` }),
      decodeAchievementList,
    );
  }

  /** 40l, blitz, zenith, zenithex, league, zen, achievements 요약을 한 번에 받는다. */
  getUserAllSummaries(user: string): Promise<ClientResult<AllSummaries>> {
    return this.execute(
      'getUserAllSummaries',
      () => ({ path: `${userPath(user)}/summaries` }),
      (value, path) => decodeAllSummaries(value, path, this.rankPolicy),
    );
  }

  getAchievementInfo(id: number): Promise<ClientResult<AchievementInfo>> {
    return this.execute(
      'getAchievementInfo',
      () => ({ path: `achievements/${validateAchievementId(id)}` }),
      decodeAchievementInfo,
    );
  }

  getScoreflow(
    user: string,
    gamemode: Exclude<GameMode, 'league'>,
  ): Promise<ClientResult<Scoreflow>> {
    return this.execute(
      'getScoreflow',
      () => ({
        path: `labs/scoreflow/${segment(normalizeUserIdentifier(user))}/${gamemode}`,
      }),
      decodeScoreflow,
    );
  }

  getLeagueflow(user: string): Promise<ClientResult<Leagueflow>> {
    return this.execute(
      'getLeagueflow',
      () => ({
        path: `labs/leagueflow/${segment(normalizeUserIdentifier(user))}`,
      }),
      decodeLeagueflow,
    );
  }

  getLeagueRanks(): Promise<ClientResult<LeagueRanks>> {
    return this.execute(
      'getLeagueRanks',
      () => ({ path: 'labs/league_ranks' }),
      decodeLeagueRanks,
    );
  }

  getServerStats(): Promise<ClientResult<ServerStats>> {
    return this.execute(
      'getServerStats',
      () => ({ path: 'general/stats' }),
      decodeServerStats,
    );
  }

  getServerActivity(): Promise<ClientResult<ServerActivity>> {
    return this.execute(
      'getServerActivity',
      () => ({ path: 'general/activity' }),
      decodeServerActivity,
    );
  }

  getLatestNews(
    stream: NewsStream,
    limit: number = NEWS_DEFAULT_LIMIT,
  ): Promise<ClientResult<PartialCollection<NewsItem>>> {
    return this.executeCollection(
      'getLatestNews',
      () => ({
        path: `news/${segment(toStreamId(stream))}`,
        query: { limit: String(validateNewsLimit(limit)) },
      }),
      decodeNewsList,
    );
  }

  getAllNews(
    limit: number = NEWS_DEFAULT_LIMIT,
  ): Promise<ClientResult<PartialCollection<NewsItem>>> {
    return this.executeCollection(
      'getAllNews',
      () => ({
        path: 'news/',
        query: { limit: String(validateNewsLimit(limit)) },
      }),
      decodeNewsList,
    );
  }

  private async executeCollection<T extends PartialCollection<unknown>>(
    operation: string,
    prepare: () => PreparedRequest,
    decode: PayloadDecoder<T>,
  ): Promise<ClientResult<T>> {
    const result = await this.execute(operation, prepare, decode);
    if (result.success && result.data.failures.length > 0) {
      const [first] = result.data.failures;
      this.logger.warn({
        message: 'Skipped malformed collection entries',
        operation,
        failureCount: result.data.failures.length,
        decodedCount: result.data.entries.length,
        firstFailurePath: first.path,
        firstFailureReason: first.reason,
      });
    }
    return result;
  }

  private async execute<T>(
    operation: string,
    prepare: () => PreparedRequest,
    decode: PayloadDecoder<T>,
  ): Promise<ClientResult<T>> {
    let request: PreparedRequest;
    try {
      request = prepare();
    } catch (error) {
      if (!(error instanceof RequestError)) {
        throw error;
      }
      this.logger.debug({
        message: 'Rejected request parameters',
        operation,
        code: error.code,
        details: error.details,
      });
      return failureResult(error);
    }

    const query = request.query ?? {};
    this.logger.debug({
      message: 'Dispatching TETRA CHANNEL request',
      operation,
      path: request.path,
      query,
    });

    let response: TransportResponse;
    try {
      response = await this.transport.send({
        method: 'GET',
        path: request.path,
        query,
        headers: this.headers,
      });
    } catch (error) {
      this.logger.warn({
        message: 'TETRA CHANNEL transport failed',
        operation,
        path: request.path,
        error: describeError(error),
      });
      return failureResult(
        new TransportError(
          `Transport failed for ${request.path}: ${describeError(error)}`,
          { cause: error },
        ),
      );
    }

    const result = decodeEnvelope(response.status, response.body, decode);
    if (!result.success) {
      const { error } = result;
      if (error.kind === 'api') {
        this.logger.warn({
          message: 'TETRA CHANNEL returned an error',
          operation,
          path: request.path,
          status: error.status,
          code: error.code,
          upstreamMessage: error.message,
        });
      } else {
        this.logger.error({
          message: 'Failed to decode TETRA CHANNEL response',
          operation,
          path: request.path,
          status: response.status,
          reason: error.message,
        });
      }
    }
    return result;
  }
}
