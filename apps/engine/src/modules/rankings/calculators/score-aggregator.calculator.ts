/**
 * Score Aggregator - wins and losses per nation and per player
 *
 * Each player result increments its nation's counters for the game mode.
 * Draws are tallied separately and never count toward totalGames.
 * Results whose nation code does not resolve are left out of nation
 * aggregation; the player is still tallied.
 *
 * @module rankings/calculators/score-aggregator
 */

import type {
  MatchRecord,
  NationAggregate,
  Outcome,
  PlayerTally,
} from "@nation-ladder/types";
import { compareStrings } from "../../../common/utils";
import { RANKING_CONFIG, fallbackPlayerName } from "../rankings.config";

// =============================================================================
// TYPES
// =============================================================================

export interface ScoreAggregationInput {
  readonly matches: readonly MatchRecord[];
  readonly gameMode: string;
  /** Non-ISO codes accepted as nations */
  readonly factionCodes: ReadonlySet<string>;
}

export interface ScoreAggregation {
  readonly gameMode: string;
  /** Keyed by nation code, sorted */
  readonly nations: ReadonlyMap<string, NationAggregate>;
  /** Per-player tallies across all results in the game mode */
  readonly players: ReadonlyMap<string, PlayerTally>;
  /** Per-nation, per-player tallies; only results played for that nation */
  readonly contributions: ReadonlyMap<string, ReadonlyMap<string, PlayerTally>>;
  /** Player results left out of nation aggregation */
  readonly unresolvedResults: number;
}

interface MutableTally {
  playerId: string;
  name: string | null;
  countryCode: string | null;
  wins: number;
  losses: number;
  draws: number;
}

// =============================================================================
// NATION CODES
// =============================================================================

/**
 * Resolve a raw nation code. Returns null for anything that is not a
 * two-letter code or an allowed faction code.
 */
export function resolveNationCode(
  code: string | null,
  factionCodes: ReadonlySet<string>,
): string | null {
  if (code === null) return null;

  const normalized = code.trim().toUpperCase();
  if (factionCodes.has(normalized)) return normalized;

  return RANKING_CONFIG.NATION_CODE_PATTERN.test(normalized) ? normalized : null;
}

// =============================================================================
// AGGREGATION
// =============================================================================

/**
 * Aggregate wins and losses for one game mode
 */
export function aggregateScores(input: ScoreAggregationInput): ScoreAggregation {
  const { matches, gameMode, factionCodes } = input;

  const players = new Map<string, MutableTally>();
  const contributions = new Map<string, Map<string, MutableTally>>();
  let unresolvedResults = 0;

  for (const match of matches) {
    if (match.gameMode !== gameMode) continue;

    for (const result of match.players) {
      const nation = resolveNationCode(result.countryCode, factionCodes);

      const tally = getOrCreateTally(players, result.playerId);
      applyOutcome(tally, result.outcome);
      if (result.playerName) tally.name = result.playerName;
      if (nation !== null) tally.countryCode = nation;

      if (nation === null) {
        unresolvedResults++;
        continue;
      }

      let nationTallies = contributions.get(nation);
      if (!nationTallies) {
        nationTallies = new Map();
        contributions.set(nation, nationTallies);
      }
      const contribution = getOrCreateTally(nationTallies, result.playerId);
      applyOutcome(contribution, result.outcome);
      if (result.playerName) contribution.name = result.playerName;
      contribution.countryCode = nation;
    }
  }

  const nations = new Map<string, NationAggregate>();
  const frozenContributions = new Map<string, ReadonlyMap<string, PlayerTally>>();

  for (const code of [...contributions.keys()].sort(compareStrings)) {
    const nationTallies = contributions.get(code);
    if (!nationTallies) continue;

    let wins = 0;
    let losses = 0;
    let draws = 0;
    for (const tally of nationTallies.values()) {
      wins += tally.wins;
      losses += tally.losses;
      draws += tally.draws;
    }

    nations.set(code, {
      countryCode: code,
      gameMode,
      wins,
      losses,
      draws,
      totalGames: wins + losses,
      playerCount: nationTallies.size,
    });
    frozenContributions.set(code, freezeTallies(nationTallies, gameMode));
  }

  return {
    gameMode,
    nations,
    players: freezeTallies(players, gameMode),
    contributions: frozenContributions,
    unresolvedResults,
  };
}

// =============================================================================
// HELPERS
// =============================================================================

function getOrCreateTally(
  tallies: Map<string, MutableTally>,
  playerId: string,
): MutableTally {
  let tally = tallies.get(playerId);
  if (!tally) {
    tally = { playerId, name: null, countryCode: null, wins: 0, losses: 0, draws: 0 };
    tallies.set(playerId, tally);
  }
  return tally;
}

function applyOutcome(tally: MutableTally, outcome: Outcome): void {
  switch (outcome) {
    case "win":
      tally.wins++;
      break;
    case "loss":
      tally.losses++;
      break;
    case "draw":
      tally.draws++;
      break;
  }
}

function freezeTallies(
  tallies: ReadonlyMap<string, MutableTally>,
  gameMode: string,
): ReadonlyMap<string, PlayerTally> {
  const frozen = new Map<string, PlayerTally>();
  for (const id of [...tallies.keys()].sort(compareStrings)) {
    const tally = tallies.get(id);
    if (!tally) continue;
    frozen.set(id, {
      playerId: tally.playerId,
      name: tally.name ?? fallbackPlayerName(tally.playerId),
      countryCode: tally.countryCode,
      gameMode,
      wins: tally.wins,
      losses: tally.losses,
      draws: tally.draws,
      netWins: tally.wins - tally.losses,
    });
  }
  return frozen;
}
