import { decodeAchievementList } from '../achievements/achievement.decoder';
import {
  assertNumber,
  assertRecord,
} from '../common/validation/runtime-validation';
import { decodeLeagueSummary } from '../league/league-summary.decoder';
import type { RankStandingPolicy } from '../league/league.types';
import { DEFAULT_RANK_STANDING_POLICY } from '../league/rank-standing.decoder';
import { decodeRecordSummary } from '../records/record-summary.decoder';
import type { AllSummaries, ZenSummary } from './user.types';

export const decodeZenSummary = (value: unknown, path: string): ZenSummary => {
  const zen = assertRecord(value, path);
  return {
    level: assertNumber(zen.level, `${path}.level`, { integer: true, min: 0 }),
    score: assertNumber(zen.score, `${path}.score`),
  };
};

export const decodeAllSummaries = (
  value: unknown,
  path: string,
  policy: RankStandingPolicy = DEFAULT_RANK_STANDING_POLICY,
): AllSummaries => {
  const root = assertRecord(value, path);
  return {
    sprint: decodeRecordSummary(root['40l'], `${path}.40l`),
    blitz: decodeRecordSummary(root.blitz, `${path}.blitz`),
    zenith: decodeRecordSummary(root.zenith, `${path}.zenith`),
    zenithex: decodeRecordSummary(root.zenithex, `${path}.zenithex`),
    league: decodeLeagueSummary(root.league, `${path}.league`, policy),
    zen: decodeZenSummary(root.zen, `${path}.zen`),
    achievements: decodeAchievementList(
      root.achievements,
      `${path}.achievements`,
    ),
  };
};
