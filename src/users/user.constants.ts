export const USER_ROLES = [
  'anon',
  'user',
  'bot',
  'halfmod',
  'mod',
  'admin',
  'sysop',
  'hidden',
  'banned',
] as const;
export type UserRole = (typeof USER_ROLES)[number];

export const SOCIAL_CONNECTIONS = [
  'discord',
  'twitch',
  'twitter',
  'reddit',
  'youtube',
  'steam',
] as const;
export type SocialConnectionKind = (typeof SOCIAL_CONNECTIONS)[number];

// 유저 검색은 현재 discord 연동만 지원한다.
export const SEARCHABLE_CONNECTIONS = ['discord'] as const;
export type SearchableConnection = (typeof SEARCHABLE_CONNECTIONS)[number];

export const AR_COUNT_KEYS = {
  '1': 'bronze',
  '2': 'silver',
  '3': 'gold',
  '4': 'platinum',
  '5': 'diamond',
  '100': 'issued',
  t100: 'top100',
  t50: 'top50',
  t25: 'top25',
  t10: 'top10',
  t5: 'top5',
  t3: 'top3',
} as const;

export const USER_ASSET_URLS = {
  avatar: 'https://tetr.io/user-content/avatars/',
  banner: 'https://tetr.io/user-content/banners/',
  defaultAvatar: 'https://tetr.io/res/avatar.png',
  flag: 'https://tetr.io/res/flags/',
  badge: 'https://tetr.io/res/badges/',
  profile: 'https://ch.tetr.io/u/',
} as const;

export const USER_ID_PATTERN = /^[0-9a-f]{24}$/;
export const USERNAME_PATTERN = /^[a-z0-9_-]{3,16}$/;
