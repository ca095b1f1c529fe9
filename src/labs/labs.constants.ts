import type { RecordResult } from '../records/record.constants';

// leagueflow 점의 두 번째 값
export const LEAGUEFLOW_RESULTS: Readonly<Record<number, RecordResult>> = {
  1: 'victory',
  2: 'defeat',
  3: 'victory by disqualification',
  4: 'defeat by disqualification',
  5: 'tie',
  6: 'no contest',
  7: 'nullified',
};

export const SCOREFLOW_POINT_LENGTH = 3;
export const LEAGUEFLOW_POINT_LENGTH = 4;
