export const ACHIEVEMENT_RANK_TYPES = {
  1: 'percentile',
  2: 'issue',
  3: 'zenith',
  4: 'percentilelax',
  5: 'percentilevlax',
  6: 'percentilemlax',
} as const;
export type AchievementRankType =
  (typeof ACHIEVEMENT_RANK_TYPES)[keyof typeof ACHIEVEMENT_RANK_TYPES];

export const ACHIEVEMENT_VALUE_TYPES = {
  0: 'none',
  1: 'number',
  2: 'time',
  3: 'time_inv',
  4: 'floor',
  5: 'issue',
  6: 'number_inv',
} as const;
export type AchievementValueType =
  (typeof ACHIEVEMENT_VALUE_TYPES)[keyof typeof ACHIEVEMENT_VALUE_TYPES];

// 업스트림은 이 값 유형들을 음수로 저장한다.
export const NEGATED_VALUE_TYPES: readonly AchievementValueType[] = [
  'time_inv',
  'issue',
  'number_inv',
];

export const ACHIEVEMENT_AR_TYPES = {
  0: 'unranked',
  1: 'ranked',
  2: 'competitive',
} as const;
export type AchievementArType =
  (typeof ACHIEVEMENT_AR_TYPES)[keyof typeof ACHIEVEMENT_AR_TYPES];

export const ACHIEVEMENT_RANKS = {
  0: 'none',
  1: 'bronze',
  2: 'silver',
  3: 'gold',
  4: 'platinum',
  5: 'diamond',
  100: 'issued',
} as const;
export type AchievementRank =
  (typeof ACHIEVEMENT_RANKS)[keyof typeof ACHIEVEMENT_RANKS];
