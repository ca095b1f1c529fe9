export const NEWS_TYPES = [
  'leaderboard',
  'personalbest',
  'badge',
  'rankup',
  'supporter',
  'supporter_gift',
] as const;
export type NewsType = (typeof NEWS_TYPES)[number];

export const NEWS_DEFAULT_LIMIT = 25 as const;
export const NEWS_MIN_LIMIT = 1 as const;
export const NEWS_MAX_LIMIT = 100 as const;
