import {
  assertArray,
  assertIsoDateTime,
  assertNumber,
  assertRecord,
  assertString,
  readBooleanOrDefault,
  readOpenEnum,
  readOptionalNumber,
  readOptionalString,
  type JsonRecord,
} from '../common/validation/runtime-validation';
import { RANK_TIERS } from '../league/league.constants';
import {
  encodeCursor,
  readOptionalSortKey,
} from '../leaderboard/leaderboard-cursor.util';
import { CLEAR_LABELS, GAME_MODES, RECORD_RESULTS } from './record.constants';
import type {
  ClearCounts,
  FinesseStats,
  GameRecord,
  GarbageStats,
  LeagueParticipant,
  LeagueRecord,
  RecordBase,
  RecordHolder,
  SinglePlayStats,
  VersusPlayer,
  ZenithRecord,
} from './record.types';

const COUNT = { integer: true, min: 0 } as const;

const readOptionalRecord = (
  value: unknown,
  path: string,
): JsonRecord | undefined =>
  value === undefined || value === null ? undefined : assertRecord(value, path);

const readArrayOrEmpty = (value: unknown, path: string): unknown[] =>
  value === undefined || value === null ? [] : assertArray(value, path);

export const decodeClearCounts = (value: unknown, path: string): ClearCounts => {
  const clears = readOptionalRecord(value, path);
  const counts: ClearCounts = {};
  if (!clears) {
    return counts;
  }
  for (const label of CLEAR_LABELS) {
    const count = readOptionalNumber(clears[label], `${path}.${label}`, COUNT);
    if (count !== undefined) {
      counts[label] = count;
    }
  }
  return counts;
};

const decodeGarbage = (
  value: unknown,
  path: string,
): GarbageStats | undefined => {
  const garbage = readOptionalRecord(value, path);
  if (!garbage) {
    return undefined;
  }
  return {
    sent: readOptionalNumber(garbage.sent, `${path}.sent`),
    received: readOptionalNumber(garbage.received, `${path}.received`),
    attack: readOptionalNumber(garbage.attack, `${path}.attack`),
    cleared: readOptionalNumber(garbage.cleared, `${path}.cleared`),
  };
};

const decodeFinesse = (
  value: unknown,
  path: string,
): FinesseStats | undefined => {
  const finesse = readOptionalRecord(value, path);
  if (!finesse) {
    return undefined;
  }
  return {
    combo: readOptionalNumber(finesse.combo, `${path}.combo`, COUNT),
    faults: readOptionalNumber(finesse.faults, `${path}.faults`, COUNT),
    perfectPieces: readOptionalNumber(
      finesse.perfectpieces,
      `${path}.perfectpieces`,
      COUNT,
    ),
  };
};

export const decodeSinglePlayStats = (
  value: unknown,
  path: string,
): SinglePlayStats => {
  const stats = assertRecord(value, path);
  // 구버전 endcontext는 finalTime(camelCase)을 쓴다.
  const finalTimeMs =
    readOptionalNumber(stats.finaltime, `${path}.finaltime`, { min: 0 }) ??
    readOptionalNumber(stats.finalTime, `${path}.finalTime`, { min: 0 });

  return {
    finalTimeMs,
    score: readOptionalNumber(stats.score, `${path}.score`),
    lines: readOptionalNumber(stats.lines, `${path}.lines`, COUNT),
    level: readOptionalNumber(stats.level, `${path}.level`, COUNT),
    inputs: readOptionalNumber(stats.inputs, `${path}.inputs`, COUNT),
    holds: readOptionalNumber(stats.holds, `${path}.holds`, COUNT),
    piecesPlaced: readOptionalNumber(
      stats.piecesplaced,
      `${path}.piecesplaced`,
      COUNT,
    ),
    topCombo: readOptionalNumber(stats.topcombo, `${path}.topcombo`, COUNT),
    topBtb: readOptionalNumber(stats.topbtb, `${path}.topbtb`, COUNT),
    tspins: readOptionalNumber(stats.tspins, `${path}.tspins`, COUNT),
    kills: readOptionalNumber(stats.kills, `${path}.kills`, COUNT),
    clears: decodeClearCounts(stats.clears, `${path}.clears`),
    garbage: decodeGarbage(stats.garbage, `${path}.garbage`),
    finesse: decodeFinesse(stats.finesse, `${path}.finesse`),
  };
};

export const decodeRecordHolder = (
  value: unknown,
  path: string,
): RecordHolder => {
  const holder = assertRecord(value, path);
  return {
    id: assertString(holder.id, `${path}.id`, { minLength: 1 }),
    username: assertString(holder.username, `${path}.username`),
    avatarRevision: readOptionalNumber(
      holder.avatar_revision,
      `${path}.avatar_revision`,
    ),
    bannerRevision: readOptionalNumber(
      holder.banner_revision,
      `${path}.banner_revision`,
    ),
    country: readOptionalString(holder.country, `${path}.country`),
    supporter: readBooleanOrDefault(holder.supporter, `${path}.supporter`, false),
  };
};

const decodeRecordBase = (root: JsonRecord, path: string): RecordBase => {
  const sortKey = readOptionalSortKey(root.p, `${path}.p`);
  const user =
    root.user === undefined || root.user === null
      ? undefined
      : decodeRecordHolder(root.user, `${path}.user`);

  return {
    id: assertString(root._id, `${path}._id`, { minLength: 1 }),
    replayId: readOptionalString(root.replayid, `${path}.replayid`),
    playedAt: assertIsoDateTime(root.ts, `${path}.ts`),
    user,
    otherUsers: readArrayOrEmpty(root.otherusers, `${path}.otherusers`).map(
      (other, index) => decodeRecordHolder(other, `${path}.otherusers[${index}]`),
    ),
    personalBest: readBooleanOrDefault(root.pb, `${path}.pb`, false),
    oncePersonalBest: readBooleanOrDefault(root.oncepb, `${path}.oncepb`, false),
    stub: readBooleanOrDefault(root.stub, `${path}.stub`, false),
    disputed: readBooleanOrDefault(root.disputed, `${path}.disputed`, false),
    revolution: readOptionalString(root.revolution, `${path}.revolution`),
    leaderboards: readArrayOrEmpty(
      root.leaderboards,
      `${path}.leaderboards`,
    ).map((id, index) => assertString(id, `${path}.leaderboards[${index}]`)),
    cursor: sortKey ? encodeCursor(sortKey) : undefined,
  };
};

const decodeSinglePlayResults = (
  root: JsonRecord,
  path: string,
): { stats: SinglePlayStats; gameOverReason?: string } => {
  const results = assertRecord(root.results, `${path}.results`);
  return {
    stats: decodeSinglePlayStats(results.stats, `${path}.results.stats`),
    gameOverReason: readOptionalString(
      results.gameoverreason,
      `${path}.results.gameoverreason`,
    ),
  };
};

const decodeZenith = (
  base: RecordBase,
  mode: ZenithRecord['mode'],
  root: JsonRecord,
  path: string,
): ZenithRecord => {
  const results = assertRecord(root.results, `${path}.results`);
  const statsPath = `${path}.results.stats`;
  const rawStats = assertRecord(results.stats, statsPath);
  const zenith = assertRecord(rawStats.zenith, `${statsPath}.zenith`);
  const extras = readOptionalRecord(root.extras, `${path}.extras`);
  const extrasZenith = readOptionalRecord(
    extras?.zenith,
    `${path}.extras.zenith`,
  );

  return {
    ...base,
    mode,
    stats: decodeSinglePlayStats(rawStats, statsPath),
    altitude: assertNumber(zenith.altitude, `${statsPath}.zenith.altitude`),
    peakRank: readOptionalNumber(
      zenith.peakrank,
      `${statsPath}.zenith.peakrank`,
    ),
    floor: readOptionalNumber(zenith.floor, `${statsPath}.zenith.floor`),
    mods: readArrayOrEmpty(extrasZenith?.mods, `${path}.extras.zenith.mods`).map(
      (mod, index) =>
        assertString(mod, `${path}.extras.zenith.mods[${index}]`),
    ),
    gameOverReason: readOptionalString(
      results.gameoverreason,
      `${path}.results.gameoverreason`,
    ),
  };
};

const decodeVersusPlayer = (value: unknown, path: string): VersusPlayer => {
  const player = assertRecord(value, path);
  const stats = readOptionalRecord(player.stats, `${path}.stats`) ?? {};

  return {
    id: assertString(player.id, `${path}.id`, { minLength: 1 }),
    username: assertString(player.username, `${path}.username`),
    active: readBooleanOrDefault(player.active, `${path}.active`, true),
    wins: assertNumber(player.wins, `${path}.wins`, COUNT),
    stats: {
      apm: readOptionalNumber(stats.apm, `${path}.stats.apm`),
      pps: readOptionalNumber(stats.pps, `${path}.stats.pps`),
      vs: readOptionalNumber(stats.vsscore, `${path}.stats.vsscore`),
      garbageSent: readOptionalNumber(
        stats.garbagesent,
        `${path}.stats.garbagesent`,
      ),
      garbageReceived: readOptionalNumber(
        stats.garbagereceived,
        `${path}.stats.garbagereceived`,
      ),
      kills: readOptionalNumber(stats.kills, `${path}.stats.kills`, COUNT),
    },
  };
};

// extras.league: { [userId]: [경기 전, 경기 후] } 중 마지막 값을 사용한다.
const decodeParticipants = (
  value: unknown,
  path: string,
): LeagueParticipant[] => {
  const league = readOptionalRecord(value, path);
  if (!league) {
    return [];
  }

  const participants: LeagueParticipant[] = [];
  for (const [userId, snapshots] of Object.entries(league)) {
    const list = assertArray(snapshots, `${path}.${userId}`);
    const lastIndex = list.length - 1;
    if (lastIndex < 0) {
      continue;
    }
    const itemPath = `${path}.${userId}[${lastIndex}]`;
    const latest = assertRecord(list[lastIndex], itemPath);
    const rank = readOptionalString(latest.rank, `${itemPath}.rank`);
    participants.push({
      userId,
      tr: assertNumber(latest.tr, `${itemPath}.tr`),
      glicko: readOptionalNumber(latest.glicko, `${itemPath}.glicko`),
      rd: readOptionalNumber(latest.rd, `${itemPath}.rd`),
      rank: rank === undefined ? undefined : readOpenEnum(rank, RANK_TIERS),
      placement: readOptionalNumber(latest.placement, `${itemPath}.placement`),
    });
  }
  return participants;
};

const decodeLeague = (
  base: RecordBase,
  root: JsonRecord,
  path: string,
): LeagueRecord => {
  const results = assertRecord(root.results, `${path}.results`);
  const extras = readOptionalRecord(root.extras, `${path}.extras`);
  const result = readOptionalString(extras?.result, `${path}.extras.result`);

  return {
    ...base,
    mode: 'league',
    players: assertArray(
      results.leaderboard,
      `${path}.results.leaderboard`,
    ).map((player, index) =>
      decodeVersusPlayer(player, `${path}.results.leaderboard[${index}]`),
    ),
    roundsPlayed: readArrayOrEmpty(results.rounds, `${path}.results.rounds`)
      .length,
    result:
      result === undefined ? undefined : readOpenEnum(result, RECORD_RESULTS),
    participants: decodeParticipants(extras?.league, `${path}.extras.league`),
  };
};

/**
 * gamemode 값으로 분기해 기록을 디코딩한다.
 * 모르는 gamemode는 실패하지 않고 `unknown` variant로 원본을 보존한다.
 */
export const decodeGameRecord = (value: unknown, path: string): GameRecord => {
  const root = assertRecord(value, path);
  const gamemode = assertString(root.gamemode, `${path}.gamemode`);
  const base = decodeRecordBase(root, path);
  const mode = readOpenEnum(gamemode, GAME_MODES);

  if (!mode.known) {
    return {
      ...base,
      mode: 'unknown',
      gamemode,
      results: root.results,
      raw: root,
    };
  }

  switch (mode.value) {
    case '40l':
      return { ...base, mode: '40l', ...decodeSinglePlayResults(root, path) };
    case 'blitz':
      return { ...base, mode: 'blitz', ...decodeSinglePlayResults(root, path) };
    case 'zenith':
    case 'zenithex':
      return decodeZenith(base, mode.value, root, path);
    case 'league':
      return decodeLeague(base, root, path);
  }
};

export const isUnknownRecord = (
  record: GameRecord,
): record is Extract<GameRecord, { mode: 'unknown' }> =>
  record.mode === 'unknown';
