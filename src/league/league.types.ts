import type { OpenEnum } from '../common/validation/runtime-validation';
import type { RankTier } from './league.constants';

export type RankedStanding = {
  kind: 'ranked';
  tier: OpenEnum<RankTier>;
  rating: number;
  standing?: number;
  percentile?: number;
};

export type PlacementStanding = {
  kind: 'placement';
  gamesPlayedInPlacement: number;
};

export type UnrankedStanding = {
  kind: 'unranked';
};

export type RankStanding = RankedStanding | PlacementStanding | UnrankedStanding;

export type RankStandingKind = RankStanding['kind'];

/**
 * How to read a record whose tier is a sentinel ("z") while it still carries
 * a placement counter. Upstream does not document which one wins.
 */
export interface RankStandingPolicy {
  precedence: 'tier' | 'placement';
  sentinelTiers: readonly string[];
  placementGames: number;
}

export interface PastSeason {
  season: string;
  username: string;
  country?: string;
  placement?: number;
  ranked: boolean;
  gamesPlayed: number;
  gamesWon: number;
  glicko?: number;
  rd?: number;
  tr: number;
  gxe?: number;
  rank: OpenEnum<RankTier>;
  bestRank?: OpenEnum<RankTier>;
  apm?: number;
  pps?: number;
  vs?: number;
}

export interface LeagueSummary {
  standing: RankStanding;
  gamesPlayed: number;
  gamesWon: number;
  glicko?: number;
  rd?: number;
  gxe?: number;
  apm?: number;
  pps?: number;
  vs?: number;
  decaying: boolean;
  bestRank?: OpenEnum<RankTier>;
  standingLocal?: number;
  nextRank?: OpenEnum<RankTier>;
  prevRank?: OpenEnum<RankTier>;
  nextAt?: number;
  prevAt?: number;
  past: PastSeason[];
}
