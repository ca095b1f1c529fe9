import { USER_ASSET_URLS } from './user.constants';
import type { Badge, UserProfile } from './user.types';

/**
 * XP로 레벨을 계산한다.
 * (xp/500)^0.6 + xp / (5000 + max(0, xp - 4000000) / 5000) + 1
 */
export const levelFromXp = (xp: number): number =>
  Math.floor(
    Math.pow(xp / 500, 0.6) +
      xp / (5000 + Math.max(0, xp - 4_000_000) / 5000) +
      1,
  );

export const avatarUrl = (
  user: Pick<UserProfile, 'id' | 'avatarRevision'>,
): string =>
  user.avatarRevision
    ? `${USER_ASSET_URLS.avatar}${user.id}.jpg?rv=${user.avatarRevision}`
    : USER_ASSET_URLS.defaultAvatar;

// 서포터가 아니어도 예전에 설정한 배너가 남아 있을 수 있다.
export const bannerUrl = (
  user: Pick<UserProfile, 'id' | 'bannerRevision'>,
): string | undefined =>
  user.bannerRevision
    ? `${USER_ASSET_URLS.banner}${user.id}.jpg?rv=${user.bannerRevision}`
    : undefined;

export const flagUrl = (country: string | undefined): string | undefined =>
  country ? `${USER_ASSET_URLS.flag}${country.toLowerCase()}.png` : undefined;

export const badgeIconUrl = (badge: Pick<Badge, 'id'>): string =>
  `${USER_ASSET_URLS.badge}${badge.id}.png`;

export const profileUrl = (user: Pick<UserProfile, 'username'>): string =>
  `${USER_ASSET_URLS.profile}${user.username}`;
