import {
  assertArray,
  assertNumber,
  assertRecord,
  assertString,
  readBooleanOrDefault,
  readOptionalEpochMillis,
  readOptionalIsoTimestamp,
  readOptionalNonNegative,
  readOptionalOpenEnum,
  readOptionalNumber,
  readOptionalString,
  RuntimeValidationError,
} from '../common/validation/runtime-validation';
import {
  AR_COUNT_KEYS,
  SOCIAL_CONNECTIONS,
  USER_ROLES,
} from './user.constants';
import type {
  AchievementRatingCounts,
  Badge,
  Distinguishment,
  SearchedUser,
  SocialConnections,
  UserProfile,
} from './user.types';

/**
 * 배지 수여 시각. 업스트림은 ISO 문자열을 보내지만 오래된 배지는 필드가 없거나
 * `false`로 온다. 숫자는 epoch millis로 취급한다.
 */
export const readBadgeTimestamp = (
  value: unknown,
  path: string,
): Date | undefined => {
  if (value === undefined || value === null || value === false) {
    return undefined;
  }
  if (typeof value === 'number') {
    return readOptionalEpochMillis(value, path);
  }
  if (typeof value === 'string') {
    return readOptionalIsoTimestamp(value, path);
  }
  throw new RuntimeValidationError(path, 'ISO date-time string', value);
};

export const decodeBadge = (value: unknown, path: string): Badge => {
  const badge = assertRecord(value, path);
  return {
    id: assertString(badge.id, `${path}.id`, { minLength: 1 }),
    label: assertString(badge.label, `${path}.label`),
    group: readOptionalString(badge.group, `${path}.group`),
    description: readOptionalString(badge.desc, `${path}.desc`),
    awardedAt: readBadgeTimestamp(badge.ts, `${path}.ts`),
  };
};

const decodeConnections = (
  value: unknown,
  path: string,
): SocialConnections => {
  const connections: SocialConnections = {};
  if (value === undefined || value === null) {
    return connections;
  }
  const raw = assertRecord(value, path);
  for (const kind of SOCIAL_CONNECTIONS) {
    const entry = raw[kind];
    if (entry === undefined || entry === null) {
      continue;
    }
    const entryPath = `${path}.${kind}`;
    const connection = assertRecord(entry, entryPath);
    const username = assertString(connection.username, `${entryPath}.username`);
    connections[kind] = {
      id: assertString(connection.id, `${entryPath}.id`),
      username,
      displayUsername:
        readOptionalString(
          connection.display_username,
          `${entryPath}.display_username`,
        ) ?? username,
    };
  }
  return connections;
};

export const decodeAchievementRatingCounts = (
  value: unknown,
  path: string,
): AchievementRatingCounts => {
  const counts: AchievementRatingCounts = {};
  if (value === undefined || value === null) {
    return counts;
  }
  const raw = assertRecord(value, path);
  for (const [wireKey, name] of Object.entries(AR_COUNT_KEYS)) {
    const count = readOptionalNumber(raw[wireKey], `${path}.${wireKey}`, {
      integer: true,
      min: 0,
    });
    if (count !== undefined) {
      counts[name] = count;
    }
  }
  return counts;
};

const decodeDistinguishment = (
  value: unknown,
  path: string,
): Distinguishment | undefined => {
  if (value === undefined || value === null) {
    return undefined;
  }
  const raw = assertRecord(value, path);
  return {
    type: assertString(raw.type, `${path}.type`),
    detail: readOptionalString(raw.detail, `${path}.detail`),
    header: readOptionalString(raw.header, `${path}.header`),
    footer: readOptionalString(raw.footer, `${path}.footer`),
  };
};

const readArrayOrEmpty = (value: unknown, path: string): unknown[] =>
  value === undefined || value === null ? [] : assertArray(value, path);

export const decodeUserProfile = (
  value: unknown,
  path: string,
): UserProfile => {
  const user = assertRecord(value, path);
  // 게스트 계정은 통계 값이 -1로 온다.
  const readStat = (field: string) =>
    readOptionalNonNegative(user[field], `${path}.${field}`);

  return {
    id: assertString(user._id, `${path}._id`, { minLength: 1 }),
    username: assertString(user.username, `${path}.username`),
    role: readOptionalOpenEnum(user.role, `${path}.role`, USER_ROLES),
    createdAt: readOptionalIsoTimestamp(user.ts, `${path}.ts`),
    botMaster: readOptionalString(user.botmaster, `${path}.botmaster`),
    badges: readArrayOrEmpty(user.badges, `${path}.badges`).map(
      (badge, index) => decodeBadge(badge, `${path}.badges[${index}]`),
    ),
    xp: assertNumber(user.xp, `${path}.xp`, { min: 0 }),
    gamesPlayed: readStat('gamesplayed'),
    gamesWon: readStat('gameswon'),
    gameTime: readStat('gametime'),
    country: readOptionalString(user.country, `${path}.country`),
    badStanding: readBooleanOrDefault(
      user.badstanding,
      `${path}.badstanding`,
      false,
    ),
    supporter: readBooleanOrDefault(user.supporter, `${path}.supporter`, false),
    supporterTier:
      readOptionalNumber(user.supporter_tier, `${path}.supporter_tier`, {
        integer: true,
        min: 0,
      }) ?? 0,
    avatarRevision: readOptionalNumber(
      user.avatar_revision,
      `${path}.avatar_revision`,
    ),
    bannerRevision: readOptionalNumber(
      user.banner_revision,
      `${path}.banner_revision`,
    ),
    bio: readOptionalString(user.bio, `${path}.bio`),
    connections: decodeConnections(user.connections, `${path}.connections`),
    friendCount: readOptionalNumber(user.friend_count, `${path}.friend_count`),
    distinguishment: decodeDistinguishment(
      user.distinguishment,
      `${path}.distinguishment`,
    ),
    achievements: readArrayOrEmpty(
      user.achievements,
      `${path}.achievements`,
    ).map((id, index) =>
      assertNumber(id, `${path}.achievements[${index}]`, { integer: true }),
    ),
    achievementRating:
      readOptionalNumber(user.ar, `${path}.ar`, { integer: true }) ?? 0,
    achievementRatingCounts: decodeAchievementRatingCounts(
      user.ar_counts,
      `${path}.ar_counts`,
    ),
  };
};

/** `users/search/...` 결과. 일치하는 유저가 없으면 data가 null이다. */
export const decodeSearchedUser = (
  value: unknown,
  path: string,
): SearchedUser | null => {
  if (value === null || value === undefined) {
    return null;
  }
  const root = assertRecord(value, path);
  const user = assertRecord(root.user, `${path}.user`);
  return {
    id: assertString(user._id, `${path}.user._id`, { minLength: 1 }),
    username: assertString(user.username, `${path}.user.username`),
  };
};
