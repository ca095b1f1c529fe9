import { RuntimeValidationError } from '../validation/runtime-validation';
import type { PayloadDecoder } from './envelope.decoder';

export interface EntryFailure {
  index: number;
  path: string;
  reason: string;
}

export interface PartialCollection<T> {
  entries: T[];
  failures: EntryFailure[];
}

/**
 * 컬렉션의 각 항목을 독립적으로 디코딩한다.
 * 항목 하나가 깨져도 나머지는 그대로 반환하고, 실패는 failures에 기록한다.
 * 검증 오류가 아닌 예외는 그대로 전파한다.
 */
export const decodePartialCollection = <T>(
  values: readonly unknown[],
  path: string,
  decodeEntry: PayloadDecoder<T>,
): PartialCollection<T> => {
  const entries: T[] = [];
  const failures: EntryFailure[] = [];

  values.forEach((value, index) => {
    const entryPath = `${path}[${index}]`;
    try {
      entries.push(decodeEntry(value, entryPath));
    } catch (error) {
      if (!(error instanceof RuntimeValidationError)) {
        throw error;
      }
      failures.push({
        index,
        path: error.path,
        reason: `expected ${error.expected}`,
      });
    }
  });

  return { entries, failures };
};
