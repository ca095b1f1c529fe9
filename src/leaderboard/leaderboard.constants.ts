export const LEADERBOARD_MIN_LIMIT = 1 as const;
export const LEADERBOARD_MAX_LIMIT = 100 as const;

export const USER_LEADERBOARD_SORTS = ['league', 'xp', 'ar'] as const;
export type UserLeaderboardSort = (typeof USER_LEADERBOARD_SORTS)[number];

// XM(국가 미지정)도 같은 형식이라 별도 처리하지 않는다.
export const COUNTRY_CODE_PATTERN = /^[A-Za-z]{2}$/;
