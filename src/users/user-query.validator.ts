import {
  REQUEST_ERROR_CODES,
  RequestError,
} from '../common/errors/client-error';
import {
  SEARCHABLE_CONNECTIONS,
  USERNAME_PATTERN,
  USER_ID_PATTERN,
  type SearchableConnection,
} from './user.constants';

/**
 * 유저 ID(24자리 hex) 또는 유저명을 받아 소문자로 정규화한다.
 */
export const normalizeUserIdentifier = (user: string): string => {
  const normalized = user.trim().toLowerCase();
  if (!USER_ID_PATTERN.test(normalized) && !USERNAME_PATTERN.test(normalized)) {
    throw new RequestError(
      REQUEST_ERROR_CODES.INVALID_IDENTIFIER,
      '유저 ID 또는 유저명 형식이 올바르지 않습니다.',
      { user },
    );
  }
  return normalized;
};

const isSearchableConnection = (value: string): value is SearchableConnection =>
  SEARCHABLE_CONNECTIONS.some((connection) => connection === value);

/** `discord:724976600873041940` 형태의 검색 키를 만든다. */
export const buildSearchQuery = (provider: string, id: string): string => {
  if (!isSearchableConnection(provider)) {
    throw new RequestError(
      REQUEST_ERROR_CODES.INVALID_IDENTIFIER,
      '검색을 지원하지 않는 연동 서비스입니다.',
      { provider, supported: SEARCHABLE_CONNECTIONS },
    );
  }

  const trimmed = id.trim();
  if (trimmed === '' || /[:/?#\s]/.test(trimmed)) {
    throw new RequestError(
      REQUEST_ERROR_CODES.INVALID_IDENTIFIER,
      '연동 계정 ID 형식이 올바르지 않습니다.',
      { provider, id },
    );
  }
  return `${provider}:${trimmed}`;
};
