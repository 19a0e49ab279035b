/**
 * Player Leaderboard Calculator
 *
 * Ratings are not confidence-corrected: each player is rated by
 * skill - uncertainty from their latest rated appearance in the game mode.
 * Matches must be in snapshot order (start time, then match id).
 *
 * Country leaderboards rank the players whose latest known nation is the
 * country. A country needs minCountryPlayers qualified players; below that
 * its leaderboard is empty and totalPlayers still reports the count.
 *
 * @module rankings/calculators/player-leaderboard
 */

import type {
  MatchRecord,
  PlayerLeaderboard,
  PlayerLeaderboardEntry,
  ResolvedWindow,
} from "@nation-ladder/types";
import { compareStrings } from "../../../common/utils";
import { RANKING_CONFIG, fallbackPlayerName } from "../rankings.config";
import { resolveNationCode } from "./score-aggregator.calculator";

export interface PlayerLeaderboardInput {
  readonly matches: readonly MatchRecord[];
  readonly gameMode: string;
  readonly window: ResolvedWindow;
  readonly minPlayerGames: number;
  readonly factionCodes: ReadonlySet<string>;
  readonly limit?: number;
  /** Restrict to one nation; resolved code expected */
  readonly countryCode?: string | null;
  readonly minCountryPlayers?: number;
}

export interface CountryLeaderboardsInput extends Omit<PlayerLeaderboardInput, "countryCode"> {
  readonly minCountryPlayers: number;
}

interface PlayerRatingState {
  playerId: string;
  name: string | null;
  countryCode: string | null;
  games: number;
  skill: number | null;
  uncertainty: number | null;
}

type UnrankedEntry = Omit<PlayerLeaderboardEntry, "rank">;

export function comparePlayerEntries(a: UnrankedEntry, b: UnrankedEntry): number {
  if (a.rating !== b.rating) return b.rating - a.rating;
  if (a.games !== b.games) return b.games - a.games;
  return compareStrings(a.playerId, b.playerId);
}

export function buildPlayerLeaderboard(input: PlayerLeaderboardInput): PlayerLeaderboard {
  const countryCode = input.countryCode ?? null;
  const entries = collectQualifiedPlayers(input);

  if (countryCode === null) {
    return rankPlayers(entries, input, null);
  }

  const scoped = entries.filter((entry) => entry.countryCode === countryCode);
  if (scoped.length < (input.minCountryPlayers ?? 0)) {
    return { ...rankPlayers([], input, countryCode), totalPlayers: scoped.length };
  }
  return rankPlayers(scoped, input, countryCode);
}

/**
 * One leaderboard per nation with enough qualified players, sorted by code
 */
export function buildCountryPlayerLeaderboards(
  input: CountryLeaderboardsInput,
): PlayerLeaderboard[] {
  const byCountry = new Map<string, UnrankedEntry[]>();
  for (const entry of collectQualifiedPlayers(input)) {
    if (entry.countryCode === null) continue;
    const group = byCountry.get(entry.countryCode);
    if (group) group.push(entry);
    else byCountry.set(entry.countryCode, [entry]);
  }

  const leaderboards: PlayerLeaderboard[] = [];
  for (const countryCode of [...byCountry.keys()].sort(compareStrings)) {
    const group = byCountry.get(countryCode);
    if (!group || group.length < input.minCountryPlayers) continue;
    leaderboards.push(rankPlayers(group, input, countryCode));
  }
  return leaderboards;
}

// =============================================================================
// HELPERS
// =============================================================================

function collectQualifiedPlayers(input: PlayerLeaderboardInput): UnrankedEntry[] {
  const { matches, gameMode, minPlayerGames, factionCodes } = input;
  const states = new Map<string, PlayerRatingState>();

  for (const match of matches) {
    if (match.gameMode !== gameMode) continue;

    for (const result of match.players) {
      let state = states.get(result.playerId);
      if (!state) {
        state = {
          playerId: result.playerId,
          name: null,
          countryCode: null,
          games: 0,
          skill: null,
          uncertainty: null,
        };
        states.set(result.playerId, state);
      }

      state.games++;
      if (result.playerName) state.name = result.playerName;

      const nation = resolveNationCode(result.countryCode, factionCodes);
      if (nation !== null) state.countryCode = nation;

      // Latest rated appearance wins; unrated appearances keep the last rating
      if (result.skill !== null && result.uncertainty !== null) {
        state.skill = result.skill;
        state.uncertainty = result.uncertainty;
      }
    }
  }

  const qualified: UnrankedEntry[] = [];
  for (const state of states.values()) {
    if (state.games < minPlayerGames) continue;
    if (state.skill === null || state.uncertainty === null) continue;

    qualified.push({
      playerId: state.playerId,
      name: state.name ?? fallbackPlayerName(state.playerId),
      countryCode: state.countryCode,
      rating: state.skill - state.uncertainty,
      skill: state.skill,
      uncertainty: state.uncertainty,
      games: state.games,
    });
  }
  return qualified;
}

function rankPlayers(
  entries: UnrankedEntry[],
  input: PlayerLeaderboardInput,
  countryCode: string | null,
): PlayerLeaderboard {
  const limit = input.limit ?? RANKING_CONFIG.PLAYER_LEADERBOARD_LIMIT;
  const players = [...entries]
    .sort(comparePlayerEntries)
    .slice(0, limit)
    .map((entry, index) => ({ ...entry, rank: index + 1 }));

  return {
    gameMode: input.gameMode,
    window: input.window,
    countryCode,
    players,
    totalPlayers: entries.length,
  };
}
