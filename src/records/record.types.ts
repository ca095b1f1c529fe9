import type { OpenEnum } from '../common/validation/runtime-validation';
import type { RankTier } from '../league/league.constants';
import type { RecordResult } from './record.constants';

/**
 * 줄 삭제 종류별 횟수. 구버전 기록에는 새 라벨(pentas 등)이 없으므로 전부 optional.
 */
export interface ClearCounts {
  singles?: number;
  doubles?: number;
  triples?: number;
  quads?: number;
  pentas?: number;
  realtspins?: number;
  minitspins?: number;
  minitspinsingles?: number;
  minitspindoubles?: number;
  minitspintriples?: number;
  minitspinquads?: number;
  tspinsingles?: number;
  tspindoubles?: number;
  tspintriples?: number;
  tspinquads?: number;
  tspinpentas?: number;
  allclear?: number;
}

export interface GarbageStats {
  sent?: number;
  received?: number;
  attack?: number;
  cleared?: number;
}

export interface FinesseStats {
  combo?: number;
  faults?: number;
  perfectPieces?: number;
}

export interface SinglePlayStats {
  finalTimeMs?: number;
  score?: number;
  lines?: number;
  level?: number;
  inputs?: number;
  holds?: number;
  piecesPlaced?: number;
  topCombo?: number;
  topBtb?: number;
  tspins?: number;
  kills?: number;
  clears: ClearCounts;
  garbage?: GarbageStats;
  finesse?: FinesseStats;
}

export interface RecordHolder {
  id: string;
  username: string;
  avatarRevision?: number;
  bannerRevision?: number;
  country?: string;
  supporter: boolean;
}

export interface RecordBase {
  id: string;
  replayId?: string;
  playedAt: Date;
  user?: RecordHolder;
  otherUsers: RecordHolder[];
  personalBest: boolean;
  oncePersonalBest: boolean;
  stub: boolean;
  disputed: boolean;
  revolution?: string;
  leaderboards: string[];
  cursor?: string;
}

export interface SprintRecord extends RecordBase {
  mode: '40l';
  stats: SinglePlayStats;
  gameOverReason?: string;
}

export interface BlitzRecord extends RecordBase {
  mode: 'blitz';
  stats: SinglePlayStats;
  gameOverReason?: string;
}

export interface ZenithRecord extends RecordBase {
  mode: 'zenith' | 'zenithex';
  stats: SinglePlayStats;
  altitude: number;
  peakRank?: number;
  floor?: number;
  mods: string[];
  gameOverReason?: string;
}

export interface VersusPlayerStats {
  apm?: number;
  pps?: number;
  vs?: number;
  garbageSent?: number;
  garbageReceived?: number;
  kills?: number;
}

export interface VersusPlayer {
  id: string;
  username: string;
  active: boolean;
  wins: number;
  stats: VersusPlayerStats;
}

export interface LeagueParticipant {
  userId: string;
  tr: number;
  glicko?: number;
  rd?: number;
  rank?: OpenEnum<RankTier>;
  placement?: number;
}

export interface LeagueRecord extends RecordBase {
  mode: 'league';
  players: VersusPlayer[];
  roundsPlayed: number;
  result?: OpenEnum<RecordResult>;
  participants: LeagueParticipant[];
}

/** 알 수 없는 gamemode. 원본 필드를 그대로 보존한다. */
export interface UnknownRecord extends RecordBase {
  mode: 'unknown';
  gamemode: string;
  results: unknown;
  raw: Record<string, unknown>;
}

export type GameRecord =
  | SprintRecord
  | BlitzRecord
  | ZenithRecord
  | LeagueRecord
  | UnknownRecord;

export type GameRecordMode = GameRecord['mode'];

export interface RecordSummary {
  record?: GameRecord;
  rank?: number;
  rankLocal?: number;
  best?: { record?: GameRecord; rank?: number };
}
