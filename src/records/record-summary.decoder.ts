import {
  assertRecord,
  readOptionalNonNegative,
  type JsonRecord,
} from '../common/validation/runtime-validation';
import { decodeGameRecord } from './game-record.decoder';
import type { GameRecord, RecordSummary } from './record.types';

const readOptionalGameRecord = (
  value: unknown,
  path: string,
): GameRecord | undefined =>
  value === undefined || value === null
    ? undefined
    : decodeGameRecord(value, path);

const readRank = (value: unknown, path: string): number | undefined =>
  readOptionalNonNegative(value, path, { integer: true });

const decodeBest = (best: JsonRecord, path: string): RecordSummary['best'] => ({
  record: readOptionalGameRecord(best.record, `${path}.record`),
  rank: readRank(best.rank, `${path}.rank`),
});

/**
 * `users/:user/summaries/:mode`의 응답. zenith 계열은 주간 기록과 함께
 * 역대 최고 기록(best)을 추가로 갖는다.
 */
export const decodeRecordSummary = (
  value: unknown,
  path: string,
): RecordSummary => {
  const summary = assertRecord(value, path);
  const best =
    summary.best === undefined || summary.best === null
      ? undefined
      : decodeBest(assertRecord(summary.best, `${path}.best`), `${path}.best`);

  return {
    record: readOptionalGameRecord(summary.record, `${path}.record`),
    rank: readRank(summary.rank, `${path}.rank`),
    rankLocal: readRank(summary.rank_local, `${path}.rank_local`),
    ...(best ? { best } : {}),
  };
};
