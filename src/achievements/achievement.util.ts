import {
  REQUEST_ERROR_CODES,
  RequestError,
} from '../common/errors/client-error';
import { NEGATED_VALUE_TYPES } from './achievement.constants';
import type { Achievement } from './achievement.types';

/** 화면에 보여줄 값. 음수로 저장되는 유형은 부호를 되돌린다. */
export const achievementDisplayValue = (
  achievement: Pick<Achievement, 'value' | 'valueType'>,
): number | undefined => {
  const { value, valueType } = achievement;
  if (value === undefined) {
    return undefined;
  }
  return valueType.known && NEGATED_VALUE_TYPES.includes(valueType.value)
    ? -value
    : value;
};

export const validateAchievementId = (id: number): number => {
  if (!Number.isInteger(id) || id < 1) {
    throw new RequestError(
      REQUEST_ERROR_CODES.INVALID_IDENTIFIER,
      'achievement id는 1 이상의 정수여야 합니다.',
      { id },
    );
  }
  return id;
};
