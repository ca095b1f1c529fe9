import {
  decodePartialCollection,
  type PartialCollection,
} from '../common/http/partial-collection';
import {
  assertArray,
  assertIsoDateTime,
  assertNumber,
  assertRecord,
  assertString,
  readBooleanOrDefault,
  readCodedOpenEnum,
  readOptionalIsoTimestamp,
  readOptionalNonNegative,
  readOptionalNumber,
  readOptionalOpenEnum,
  readOptionalString,
} from '../common/validation/runtime-validation';
import { USER_ROLES } from '../users/user.constants';
import {
  ACHIEVEMENT_AR_TYPES,
  ACHIEVEMENT_RANKS,
  ACHIEVEMENT_RANK_TYPES,
  ACHIEVEMENT_VALUE_TYPES,
} from './achievement.constants';
import type {
  Achievement,
  AchievementCutoffs,
  AchievementHolder,
  AchievementInfo,
  AchievementLeaderboardEntry,
} from './achievement.types';

const COUNT = { integer: true, min: 0 } as const;

export const decodeAchievement = (
  value: unknown,
  path: string,
): Achievement => {
  const raw = assertRecord(value, path);
  return {
    id: assertNumber(raw.k, `${path}.k`, COUNT),
    category: assertString(raw.category, `${path}.category`),
    name: assertString(raw.name, `${path}.name`),
    object: assertString(raw.object, `${path}.object`),
    description: assertString(raw.desc, `${path}.desc`),
    order: readOptionalNumber(raw.o, `${path}.o`, { integer: true }),
    rankType: readCodedOpenEnum(raw.rt, `${path}.rt`, ACHIEVEMENT_RANK_TYPES),
    valueType: readCodedOpenEnum(raw.vt, `${path}.vt`, ACHIEVEMENT_VALUE_TYPES),
    arType: readCodedOpenEnum(raw.art, `${path}.art`, ACHIEVEMENT_AR_TYPES),
    min: assertNumber(raw.min, `${path}.min`),
    decimals: assertNumber(raw.deci, `${path}.deci`, COUNT),
    hidden: readBooleanOrDefault(raw.hidden, `${path}.hidden`, false),
    value: readOptionalNumber(raw.v, `${path}.v`),
    additional: readOptionalNumber(raw.a, `${path}.a`),
    updatedAt: readOptionalIsoTimestamp(raw.t, `${path}.t`),
    position: readOptionalNonNegative(raw.pos, `${path}.pos`, { integer: true }),
    total: readOptionalNumber(raw.total, `${path}.total`, COUNT),
    rank:
      raw.rank === undefined || raw.rank === null
        ? undefined
        : readCodedOpenEnum(raw.rank, `${path}.rank`, ACHIEVEMENT_RANKS),
  };
};

/** `users/:user/summaries/achievements`의 data는 배열이다. */
export const decodeAchievementList = (
  value: unknown,
  path: string,
): PartialCollection<Achievement> =>
  decodePartialCollection(assertArray(value, path), path, decodeAchievement);

const decodeHolder = (value: unknown, path: string): AchievementHolder => {
  const user = assertRecord(value, path);
  return {
    id: assertString(user._id, `${path}._id`, { minLength: 1 }),
    username: assertString(user.username, `${path}.username`),
    role: readOptionalOpenEnum(user.role, `${path}.role`, USER_ROLES),
    supporter: readBooleanOrDefault(user.supporter, `${path}.supporter`, false),
    country: readOptionalString(user.country, `${path}.country`),
  };
};

const decodeLeaderboardEntry = (
  value: unknown,
  path: string,
): AchievementLeaderboardEntry => {
  const entry = assertRecord(value, path);
  return {
    user: decodeHolder(entry.u, `${path}.u`),
    value: assertNumber(entry.v, `${path}.v`),
    additional: readOptionalNumber(entry.a, `${path}.a`),
    updatedAt: assertIsoDateTime(entry.t, `${path}.t`),
  };
};

const decodeCutoffs = (value: unknown, path: string): AchievementCutoffs => {
  const cutoffs = assertRecord(value, path);
  return {
    total: assertNumber(cutoffs.total, `${path}.total`, COUNT),
    diamond: readOptionalNumber(cutoffs.diamond, `${path}.diamond`),
    platinum: readOptionalNumber(cutoffs.platinum, `${path}.platinum`),
    gold: readOptionalNumber(cutoffs.gold, `${path}.gold`),
    silver: readOptionalNumber(cutoffs.silver, `${path}.silver`),
    bronze: readOptionalNumber(cutoffs.bronze, `${path}.bronze`),
  };
};

export const decodeAchievementInfo = (
  value: unknown,
  path: string,
): AchievementInfo => {
  const root = assertRecord(value, path);
  return {
    achievement: decodeAchievement(root.achievement, `${path}.achievement`),
    leaderboard: decodePartialCollection(
      assertArray(root.leaderboard, `${path}.leaderboard`),
      `${path}.leaderboard`,
      decodeLeaderboardEntry,
    ),
    cutoffs: decodeCutoffs(root.cutoffs, `${path}.cutoffs`),
  };
};
