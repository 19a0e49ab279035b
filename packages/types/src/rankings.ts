/**
 * Ranking record type definitions.
 *
 * These are derived records: every run recomputes them from the match
 * snapshot, nothing here is mutated incrementally.
 */

import type { ResolvedWindow } from "./common.js";

// ============================================================================
// Aggregates
// ============================================================================

export interface NationAggregate {
  readonly countryCode: string;
  readonly gameMode: string;
  readonly wins: number;
  readonly losses: number;
  readonly draws: number;
  /** Decided games only (wins + losses) */
  readonly totalGames: number;
  readonly playerCount: number;
}

export interface PlayerTally {
  readonly playerId: string;
  readonly name: string;
  readonly countryCode: string | null;
  readonly gameMode: string;
  readonly wins: number;
  readonly losses: number;
  readonly draws: number;
  readonly netWins: number;
}

export interface ConfidenceFactor {
  readonly gameMode: string;
  /** Nations with at least one decided game, before the activity gate */
  readonly nationCount: number;
  readonly averageGamesPerNation: number;
  readonly k: number;
  readonly confidenceFactor: number;
  /** Activity gate: k / 4 */
  readonly minGamesRequired: number;
}

// ============================================================================
// Nation Leaderboard
// ============================================================================

export interface TopContributor {
  readonly playerId: string;
  readonly name: string;
  readonly wins: number;
  readonly losses: number;
  readonly netWins: number;
}

export interface NationScore {
  readonly kind: "nation_score";
  readonly rank: number;
  readonly countryCode: string;
  readonly gameMode: string;
  readonly wins: number;
  readonly losses: number;
  readonly draws: number;
  readonly totalGames: number;
  readonly playerCount: number;
  /** wins - losses */
  readonly rawScore: number;
  /** rawScore / (totalGames + CF) * 10000 */
  readonly adjustedScore: number;
  readonly displayScore: number;
  /** rawScore / totalGames * 10000, without damping */
  readonly uncorrectedScore: number;
  readonly topContributors: readonly TopContributor[];
}

export interface NationLeaderboard {
  readonly gameMode: string;
  readonly window: ResolvedWindow;
  readonly nations: readonly NationScore[];
  readonly k: number;
  readonly confidenceFactor: number;
  readonly minGamesRequired: number;
  readonly averageGamesPerNation: number;
  /** Nations with games before the activity gate */
  readonly totalNations: number;
}

export interface PlayerContribution {
  readonly playerId: string;
  readonly name: string;
  readonly wins: number;
  readonly losses: number;
  readonly draws: number;
  readonly netWins: number;
  /** Share of the nation's raw score, 0 when the raw score is 0 */
  readonly shareOfRawScore: number;
}

export interface NationScoreBreakdown {
  readonly countryCode: string;
  readonly gameMode: string;
  readonly window: ResolvedWindow;
  readonly wins: number;
  readonly losses: number;
  readonly draws: number;
  readonly totalGames: number;
  readonly rawScore: number;
  readonly adjustedScore: number;
  readonly displayScore: number;
  readonly uncorrectedScore: number;
  readonly k: number;
  readonly confidenceFactor: number;
  readonly minGamesRequired: number;
  readonly meetsActivityGate: boolean;
  /** Rank on the filtered leaderboard, null when gated out */
  readonly rank: number | null;
  readonly contributions: readonly PlayerContribution[];
}

// ============================================================================
// Player Leaderboard
// ============================================================================

export interface PlayerLeaderboardEntry {
  readonly rank: number;
  readonly playerId: string;
  readonly name: string;
  readonly countryCode: string | null;
  /** skill - uncertainty from the latest rated appearance */
  readonly rating: number;
  readonly skill: number;
  readonly uncertainty: number;
  readonly games: number;
}

export interface PlayerLeaderboard {
  readonly gameMode: string;
  readonly window: ResolvedWindow;
  /** Nation the leaderboard is restricted to; null for the global one */
  readonly countryCode: string | null;
  readonly players: readonly PlayerLeaderboardEntry[];
  /** Qualifying players before truncation */
  readonly totalPlayers: number;
}
