import {
  REQUEST_ERROR_CODES,
  RequestError,
} from '../common/errors/client-error';
import {
  GAME_MODES,
  RECORD_LIST_TYPES_BY_MODE,
  type GameMode,
  type RecordListType,
} from '../records/record.constants';
import {
  COUNTRY_CODE_PATTERN,
  LEADERBOARD_MAX_LIMIT,
  LEADERBOARD_MIN_LIMIT,
  USER_LEADERBOARD_SORTS,
  type UserLeaderboardSort,
} from './leaderboard.constants';

export type QueryParams = Record<string, string>;

export type PaginationOptions = {
  limit?: number;
  /** 이 커서보다 뒤쪽 항목 (다음 페이지) */
  after?: string;
  /** 이 커서보다 앞쪽 항목 (이전 페이지) */
  before?: string;
};

export type UserLeaderboardOptions = PaginationOptions & {
  country?: string;
};

export type RecordLeaderboardOptions = PaginationOptions & {
  gamemode: GameMode;
  /** 생략하면 전체(global) 순위 */
  country?: string;
  /** zenith 주간 리더보드 등에서 쓰는 revolution ID (`@2024w31`) */
  revolution?: string;
};

const REVOLUTION_ID_PATTERN = /^@[A-Za-z0-9_-]+$/;

const RECORD_LEADERBOARD_MODES: readonly GameMode[] = GAME_MODES.filter(
  (mode) => mode !== 'league',
);

export const validateLimit = (limit: number | undefined): number | undefined => {
  if (limit === undefined) {
    return undefined;
  }

  if (!Number.isInteger(limit)) {
    throw new RequestError(
      REQUEST_ERROR_CODES.INVALID_LIMIT,
      'limit 값이 정수가 아닙니다.',
      { limit },
    );
  }

  if (limit < LEADERBOARD_MIN_LIMIT || limit > LEADERBOARD_MAX_LIMIT) {
    throw new RequestError(
      REQUEST_ERROR_CODES.INVALID_LIMIT,
      'limit 값이 허용 범위를 벗어났습니다.',
      { limit, min: LEADERBOARD_MIN_LIMIT, max: LEADERBOARD_MAX_LIMIT },
    );
  }

  return limit;
};

const assertCursor = (name: 'after' | 'before', cursor: string): string => {
  if (cursor.trim() === '') {
    throw new RequestError(
      REQUEST_ERROR_CODES.INVALID_BOUND,
      `${name} 커서는 비어 있을 수 없습니다.`,
      { [name]: cursor },
    );
  }
  return cursor;
};

/**
 * limit/after/before를 쿼리 파라미터로 만든다.
 * 커서는 해석하지 않고 그대로 전달한다.
 */
export const validatePagination = (options: PaginationOptions): QueryParams => {
  const { after, before } = options;
  if (after !== undefined && before !== undefined) {
    throw new RequestError(
      REQUEST_ERROR_CODES.INVALID_BOUND,
      'after와 before는 함께 사용할 수 없습니다.',
      { after, before },
    );
  }

  const params: QueryParams = {};
  const limit = validateLimit(options.limit);
  if (limit !== undefined) {
    params.limit = String(limit);
  }
  if (after !== undefined) {
    params.after = assertCursor('after', after);
  }
  if (before !== undefined) {
    params.before = assertCursor('before', before);
  }
  return params;
};

export const normalizeCountry = (country: string): string => {
  if (!COUNTRY_CODE_PATTERN.test(country)) {
    throw new RequestError(
      REQUEST_ERROR_CODES.INVALID_COUNTRY,
      'country 값은 ISO 3166-1 alpha-2 코드여야 합니다.',
      { country },
    );
  }
  return country.toUpperCase();
};

export const validateUserLeaderboardOptions = (
  options: UserLeaderboardOptions,
): QueryParams => {
  const params = validatePagination(options);
  if (options.country !== undefined) {
    params.country = normalizeCountry(options.country);
  }
  return params;
};

const isUserLeaderboardSort = (value: string): value is UserLeaderboardSort =>
  USER_LEADERBOARD_SORTS.some((sort) => sort === value);

export const validateUserLeaderboardSort = (
  sort: string,
): UserLeaderboardSort => {
  if (!isUserLeaderboardSort(sort)) {
    throw new RequestError(
      REQUEST_ERROR_CODES.UNSUPPORTED_SORT,
      '지원하지 않는 유저 리더보드 정렬 기준입니다.',
      { sort, supported: USER_LEADERBOARD_SORTS },
    );
  }
  return sort;
};

export const validateRecordListType = (
  gamemode: GameMode,
  type: RecordListType,
): RecordListType => {
  const supported = RECORD_LIST_TYPES_BY_MODE[gamemode];
  if (!supported.includes(type)) {
    throw new RequestError(
      REQUEST_ERROR_CODES.UNSUPPORTED_SORT,
      `${gamemode} 기록은 ${type} 정렬을 지원하지 않습니다.`,
      { gamemode, type, supported },
    );
  }
  return type;
};

/**
 * `40l_global`, `blitz_country_JP`, `zenith_global@2024w31` 형태의
 * 기록 리더보드 ID를 만든다.
 */
export const buildRecordLeaderboardId = (
  options: Pick<RecordLeaderboardOptions, 'gamemode' | 'country' | 'revolution'>,
): string => {
  const { gamemode, country, revolution } = options;
  if (!RECORD_LEADERBOARD_MODES.includes(gamemode)) {
    throw new RequestError(
      REQUEST_ERROR_CODES.UNSUPPORTED_SORT,
      `${gamemode} 모드는 기록 리더보드가 없습니다.`,
      { gamemode, supported: RECORD_LEADERBOARD_MODES },
    );
  }

  const scope =
    country === undefined ? 'global' : `country_${normalizeCountry(country)}`;
  if (revolution === undefined) {
    return `${gamemode}_${scope}`;
  }

  const revolutionId = revolution.startsWith('@') ? revolution : `@${revolution}`;
  if (!REVOLUTION_ID_PATTERN.test(revolutionId)) {
    throw new RequestError(
      REQUEST_ERROR_CODES.INVALID_IDENTIFIER,
      'revolution ID 형식이 올바르지 않습니다.',
      { revolution },
    );
  }
  return `${gamemode}_${scope}${revolutionId}`;
};
