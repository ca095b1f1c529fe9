import type { Achievement } from '../achievements/achievement.types';
import type { PartialCollection } from '../common/http/partial-collection';
import type { OpenEnum } from '../common/validation/runtime-validation';
import type { LeagueSummary } from '../league/league.types';
import type { RecordSummary } from '../records/record.types';
import type { AR_COUNT_KEYS, SocialConnectionKind, UserRole } from './user.constants';

export interface Badge {
  id: string;
  label: string;
  group?: string;
  description?: string;
  /** 업스트림이 수여 시각을 누락하는 경우가 있다. */
  awardedAt?: Date;
}

export interface SocialConnection {
  id: string;
  username: string;
  displayUsername: string;
}

export type SocialConnections = Partial<
  Record<SocialConnectionKind, SocialConnection>
>;

export interface Distinguishment {
  type: string;
  detail?: string;
  header?: string;
  footer?: string;
}

export type AchievementRatingCounts = Partial<
  Record<(typeof AR_COUNT_KEYS)[keyof typeof AR_COUNT_KEYS], number>
>;

export interface UserProfile {
  id: string;
  username: string;
  role?: OpenEnum<UserRole>;
  createdAt?: Date;
  botMaster?: string;
  badges: Badge[];
  xp: number;
  gamesPlayed?: number;
  gamesWon?: number;
  gameTime?: number;
  country?: string;
  badStanding: boolean;
  supporter: boolean;
  supporterTier: number;
  avatarRevision?: number;
  bannerRevision?: number;
  bio?: string;
  connections: SocialConnections;
  friendCount?: number;
  distinguishment?: Distinguishment;
  achievements: number[];
  achievementRating: number;
  achievementRatingCounts: AchievementRatingCounts;
}

export interface SearchedUser {
  id: string;
  username: string;
}

export interface ZenSummary {
  level: number;
  score: number;
}

/** `users/:user/summaries` 한 번으로 받는 모든 요약 */
export interface AllSummaries {
  sprint: RecordSummary;
  blitz: RecordSummary;
  zenith: RecordSummary;
  zenithex: RecordSummary;
  league: LeagueSummary;
  zen: ZenSummary;
  achievements: PartialCollection<Achievement>;
}
