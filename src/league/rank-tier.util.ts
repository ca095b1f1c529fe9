import {
  openEnumText,
  type OpenEnum,
} from '../common/validation/runtime-validation';
import {
  RANK_ICON_BASE_URL,
  RANK_TIER_DISPLAY,
  UNKNOWN_RANK_COLOR,
  type RankTier,
} from './league.constants';

export const rankTierLabel = (tier: OpenEnum<RankTier>): string =>
  tier.known ? RANK_TIER_DISPLAY[tier.value].label : tier.raw.toUpperCase();

export const rankTierColor = (tier: OpenEnum<RankTier>): number =>
  tier.known ? RANK_TIER_DISPLAY[tier.value].color : UNKNOWN_RANK_COLOR;

export const rankTierIconUrl = (tier: OpenEnum<RankTier>): string =>
  `${RANK_ICON_BASE_URL}${openEnumText(tier)}.png`;
