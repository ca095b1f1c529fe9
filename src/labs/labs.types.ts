import type { OpenEnum } from '../common/validation/runtime-validation';
import type { RankTier } from '../league/league.constants';
import type { RecordResult } from '../records/record.constants';

export interface ScoreflowPoint {
  playedAt: Date;
  personalBest: boolean;
  /** 40l은 기록 시간이 음수로 들어온다. */
  score: number;
}

export interface Scoreflow {
  /** 가장 오래된 기록의 시각 */
  startTime: Date;
  points: ScoreflowPoint[];
}

export interface LeagueflowPoint {
  playedAt: Date;
  result: OpenEnum<RecordResult>;
  trAfter: number;
  /** 상대가 unranked였다면 trAfter와 같다. */
  opponentTrBefore: number;
}

export interface Leagueflow {
  startTime: Date;
  points: LeagueflowPoint[];
}

export interface LeagueRankData {
  tier: OpenEnum<RankTier>;
  position: number;
  percentile: number;
  tr: number;
  targetTr: number;
  apm?: number;
  pps?: number;
  vs?: number;
  count: number;
}

export interface LeagueRanks {
  id: string;
  streamId: string;
  createdAt: Date;
  total: number;
  ranks: LeagueRankData[];
}
