export const RANK_TIERS = [
  'd',
  'd+',
  'c-',
  'c',
  'c+',
  'b-',
  'b',
  'b+',
  'a-',
  'a',
  'a+',
  's-',
  's',
  's+',
  'ss',
  'u',
  'x',
  'x+',
  'z',
] as const;

export type RankTier = (typeof RANK_TIERS)[number];

export const RANK_TIER_DISPLAY: Readonly<
  Record<RankTier, { label: string; color: number }>
> = {
  d: { label: 'D', color: 0x907591 },
  'd+': { label: 'D+', color: 0x8e6091 },
  'c-': { label: 'C-', color: 0x79558c },
  c: { label: 'C', color: 0x733e8f },
  'c+': { label: 'C+', color: 0x552883 },
  'b-': { label: 'B-', color: 0x5650c7 },
  b: { label: 'B', color: 0x4f64c9 },
  'b+': { label: 'B+', color: 0x4f99c0 },
  'a-': { label: 'A-', color: 0x3bb687 },
  a: { label: 'A', color: 0x46ad51 },
  'a+': { label: 'A+', color: 0x46ad51 },
  's-': { label: 'S-', color: 0xb2972b },
  s: { label: 'S', color: 0xe0a71b },
  's+': { label: 'S+', color: 0xd8af0e },
  ss: { label: 'SS', color: 0xdb8b1f },
  u: { label: 'U', color: 0xff3813 },
  x: { label: 'X', color: 0xff45ff },
  'x+': { label: 'X+', color: 0xa763ea },
  z: { label: 'Unranked', color: 0x767671 },
};

export const UNKNOWN_RANK_COLOR = 0x767671 as const;

export const RANK_ICON_BASE_URL = 'https://tetr.io/res/league-ranks/';

// Tier codes upstream uses to mean "no rank yet".
export const DEFAULT_SENTINEL_TIERS: readonly string[] = ['z'];

export const PLACEMENT_GAMES = 10 as const;
