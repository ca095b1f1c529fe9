import type { OpenEnum } from '../common/validation/runtime-validation';
import type { RankTier } from '../league/league.constants';
import type { GameMode } from '../records/record.constants';

export type NewsStream = 'global' | { userId: string };

/** 새 기록이 전체 리더보드에 진입했다. global 스트림에만 나온다. */
export type LeaderboardNews = {
  kind: 'leaderboard';
  username: string;
  gamemode: OpenEnum<GameMode>;
  rank: number;
  result: number;
  replayId: string;
};

export type PersonalBestNews = {
  kind: 'personalbest';
  username: string;
  gamemode: OpenEnum<GameMode>;
  result: number;
  replayId: string;
};

export type BadgeNews = {
  kind: 'badge';
  username: string;
  badgeId: string;
  label: string;
};

export type RankUpNews = {
  kind: 'rankup';
  username: string;
  rank: OpenEnum<RankTier>;
};

export type SupporterNews = {
  kind: 'supporter';
  username: string;
};

export type SupporterGiftNews = {
  kind: 'supporter_gift';
  username: string;
};

/** 새 뉴스 타입은 예고 없이 추가되므로 원본을 보존한다. */
export type UnknownNews = {
  kind: 'unknown';
  type: string;
  data: unknown;
};

export type NewsData =
  | LeaderboardNews
  | PersonalBestNews
  | BadgeNews
  | RankUpNews
  | SupporterNews
  | SupporterGiftNews
  | UnknownNews;

export interface NewsItem {
  id: string;
  stream: string;
  createdAt: Date;
  data: NewsData;
}
