import type { PartialCollection } from '../common/http/partial-collection';
import type { OpenEnum } from '../common/validation/runtime-validation';
import type { UserRole } from '../users/user.constants';
import type {
  AchievementArType,
  AchievementRank,
  AchievementRankType,
  AchievementValueType,
} from './achievement.constants';

export interface Achievement {
  id: number;
  category: string;
  name: string;
  object: string;
  description: string;
  /** 카테고리 안에서의 순서. 문서와 달리 빠지는 경우가 있다. */
  order?: number;
  rankType: OpenEnum<AchievementRankType>;
  valueType: OpenEnum<AchievementValueType>;
  arType: OpenEnum<AchievementArType>;
  min: number;
  decimals: number;
  hidden: boolean;
  /** `valueType`에 따라 음수로 저장된다. 표시할 때는 achievementDisplayValue를 쓴다. */
  value?: number;
  additional?: number;
  updatedAt?: Date;
  /** 0부터 시작하는 리더보드 위치 */
  position?: number;
  total?: number;
  rank?: OpenEnum<AchievementRank>;
}

export interface AchievementHolder {
  id: string;
  username: string;
  role?: OpenEnum<UserRole>;
  supporter: boolean;
  country?: string;
}

export interface AchievementLeaderboardEntry {
  user: AchievementHolder;
  value: number;
  additional?: number;
  updatedAt: Date;
}

export interface AchievementCutoffs {
  total: number;
  diamond?: number;
  platinum?: number;
  gold?: number;
  silver?: number;
  bronze?: number;
}

export interface AchievementInfo {
  achievement: Achievement;
  leaderboard: PartialCollection<AchievementLeaderboardEntry>;
  cutoffs: AchievementCutoffs;
}
