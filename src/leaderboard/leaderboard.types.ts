import type { PartialCollection } from '../common/http/partial-collection';
import type { OpenEnum } from '../common/validation/runtime-validation';
import type { LeagueSummary, PastSeason } from '../league/league.types';
import type { UserRole } from '../users/user.constants';
import type { AchievementRatingCounts } from '../users/user.types';

/**
 * 커서 기반 페이지. 항목 순서는 업스트림 응답 그대로 유지한다.
 * nextCursor는 마지막 항목, prevCursor는 첫 항목의 정렬 키다.
 */
export interface LeaderboardPage<T> extends PartialCollection<T> {
  nextCursor?: string;
  prevCursor?: string;
}

export interface LeaderboardUser {
  id: string;
  username: string;
  role?: OpenEnum<UserRole>;
  createdAt?: Date;
  xp: number;
  country?: string;
  supporter: boolean;
  league: LeagueSummary;
  gamesPlayed?: number;
  gamesWon?: number;
  gameTime?: number;
  achievementRating: number;
  achievementRatingCounts: AchievementRatingCounts;
  cursor?: string;
}

export interface HistoricalLeaderboardEntry extends PastSeason {
  id: string;
  cursor?: string;
}
