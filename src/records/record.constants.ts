export const GAME_MODES = ['40l', 'blitz', 'zenith', 'zenithex', 'league'] as const;
export type GameMode = (typeof GAME_MODES)[number];

export const RECORD_LIST_TYPES = ['top', 'recent', 'progression'] as const;
export type RecordListType = (typeof RECORD_LIST_TYPES)[number];

// league 기록은 최신순 목록만 제공된다.
export const RECORD_LIST_TYPES_BY_MODE: Readonly<
  Record<GameMode, readonly RecordListType[]>
> = {
  '40l': RECORD_LIST_TYPES,
  blitz: RECORD_LIST_TYPES,
  zenith: RECORD_LIST_TYPES,
  zenithex: RECORD_LIST_TYPES,
  league: ['recent'],
};

export const RECORD_RESULTS = [
  'victory',
  'defeat',
  'victory by disqualification',
  'defeat by disqualification',
  'tie',
  'no contest',
  'nullified',
] as const;
export type RecordResult = (typeof RECORD_RESULTS)[number];

export const REPLAY_BASE_URL = 'https://tetr.io/#R:';

export const CLEAR_LABELS = [
  'singles',
  'doubles',
  'triples',
  'quads',
  'pentas',
  'realtspins',
  'minitspins',
  'minitspinsingles',
  'minitspindoubles',
  'minitspintriples',
  'minitspinquads',
  'tspinsingles',
  'tspindoubles',
  'tspintriples',
  'tspinquads',
  'tspinpentas',
  'allclear',
] as const;
