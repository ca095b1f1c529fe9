import {
  REQUEST_ERROR_CODES,
  RequestError,
} from '../common/errors/client-error';
import { normalizeUserIdentifier } from '../users/user-query.validator';
import { NEWS_MAX_LIMIT, NEWS_MIN_LIMIT } from './news.constants';
import type { NewsStream } from './news.types';

export const validateNewsLimit = (limit: number): number => {
  if (!Number.isInteger(limit) || limit < NEWS_MIN_LIMIT || limit > NEWS_MAX_LIMIT) {
    throw new RequestError(
      REQUEST_ERROR_CODES.INVALID_LIMIT,
      'limit 값이 허용 범위를 벗어났습니다.',
      { limit, min: NEWS_MIN_LIMIT, max: NEWS_MAX_LIMIT },
    );
  }
  return limit;
};

/** `global` 또는 `user_{userId}` */
export const toStreamId = (stream: NewsStream): string =>
  stream === 'global'
    ? 'global'
    : `user_${normalizeUserIdentifier(stream.userId)}`;
