import 'reflect-metadata';

export * from './common/errors/client-error';
export * from './common/http/api-response';
export type { EntryFailure, PartialCollection } from './common/http/partial-collection';
export {
  RuntimeValidationError,
  openEnumText,
  type OpenEnum,
} from './common/validation/runtime-validation';

export * from './channel/tetra-channel.constants';
export type * from './channel/tetra-channel.interfaces';
export { FetchTransport } from './channel/fetch.transport';
export {
  TetraChannelClient,
  type RecordSearchQuery,
} from './channel/tetra-channel.client';
export {
  createTetraChannelClient,
  type CreateTetraChannelClientOptions,
} from './channel/tetra-channel.factory';
export { TetraChannelModule } from './channel/tetra-channel.module';

export * from './league/league.constants';
export type * from './league/league.types';
export {
  DEFAULT_RANK_STANDING_POLICY,
  isRanked,
  rankStandingKind,
} from './league/rank-standing.decoder';
export { rankProgress } from './league/league-summary.decoder';
export * from './league/rank-tier.util';

export * from './leaderboard/leaderboard.constants';
export type * from './leaderboard/leaderboard.types';
export type {
  PaginationOptions,
  RecordLeaderboardOptions,
  UserLeaderboardOptions,
} from './leaderboard/leaderboard-query.validator';

export * from './records/record.constants';
export type * from './records/record.types';
export { isUnknownRecord } from './records/game-record.decoder';
export * from './records/record-stats.util';

export * from './users/user.constants';
export type * from './users/user.types';
export * from './users/user.util';

export * from './news/news.constants';
export type * from './news/news.types';

export type * from './server/server.types';
export {
  activityPeak,
  playTimeHours,
  registeredPlayers,
} from './server/server.decoder';

export * from './achievements/achievement.constants';
export type * from './achievements/achievement.types';
export { achievementDisplayValue } from './achievements/achievement.util';

export * from './labs/labs.constants';
export type * from './labs/labs.types';
