/**
 * Nation Leaderboard Calculator
 *
 * Pure functions that gate, score, sort and rank nations.
 *
 * Ordering: adjustedScore desc, then totalGames desc, then country code
 * asc. Ranks are sequential 1..N with no shared positions.
 *
 * @module rankings/calculators/nation-leaderboard
 */

import type {
  ConfidenceFactor,
  NationAggregate,
  NationLeaderboard,
  NationScore,
  NationScoreBreakdown,
  PlayerContribution,
  PlayerTally,
  ResolvedWindow,
  TopContributor,
} from "@nation-ladder/types";
import { compareStrings, roundTo, safeRate } from "../../../common/utils";
import { RANKING_CONFIG } from "../rankings.config";
import {
  calculateAdjustedScore,
  calculateUncorrectedScore,
  meetsActivityGate,
} from "./confidence.calculator";
import type { ScoreAggregation } from "./score-aggregator.calculator";

type UnrankedNationScore = Omit<NationScore, "rank">;

// =============================================================================
// ORDERING
// =============================================================================

export function compareNationScores(
  a: Pick<NationScore, "adjustedScore" | "totalGames" | "countryCode">,
  b: Pick<NationScore, "adjustedScore" | "totalGames" | "countryCode">,
): number {
  if (a.adjustedScore !== b.adjustedScore) return b.adjustedScore - a.adjustedScore;
  if (a.totalGames !== b.totalGames) return b.totalGames - a.totalGames;
  return compareStrings(a.countryCode, b.countryCode);
}

/**
 * Contributor ordering: netWins desc, wins desc, player id asc
 */
export function compareContributors(a: PlayerTally, b: PlayerTally): number {
  if (a.netWins !== b.netWins) return b.netWins - a.netWins;
  if (a.wins !== b.wins) return b.wins - a.wins;
  return compareStrings(a.playerId, b.playerId);
}

// =============================================================================
// SCORING
// =============================================================================

export function scoreNation(
  nation: NationAggregate,
  factor: ConfidenceFactor,
  contributors: readonly TopContributor[],
): UnrankedNationScore {
  const adjustedScore = calculateAdjustedScore(
    nation.wins,
    nation.losses,
    nation.totalGames,
    factor.confidenceFactor,
  );

  return {
    kind: "nation_score",
    countryCode: nation.countryCode,
    gameMode: nation.gameMode,
    wins: nation.wins,
    losses: nation.losses,
    draws: nation.draws,
    totalGames: nation.totalGames,
    playerCount: nation.playerCount,
    rawScore: nation.wins - nation.losses,
    adjustedScore,
    displayScore: Math.round(adjustedScore),
    uncorrectedScore: calculateUncorrectedScore(nation.wins, nation.losses, nation.totalGames),
    topContributors: contributors,
  };
}

export function selectTopContributors(
  tallies: ReadonlyMap<string, PlayerTally> | undefined,
  limit: number = RANKING_CONFIG.TOP_CONTRIBUTORS_LIMIT,
): TopContributor[] {
  if (!tallies) return [];

  return [...tallies.values()]
    .sort(compareContributors)
    .slice(0, limit)
    .map((tally) => ({
      playerId: tally.playerId,
      name: tally.name,
      wins: tally.wins,
      losses: tally.losses,
      netWins: tally.netWins,
    }));
}

// =============================================================================
// LEADERBOARD
// =============================================================================

/**
 * Build the filtered, ranked nation leaderboard for one slice
 */
export function buildNationLeaderboard(
  aggregation: ScoreAggregation,
  factor: ConfidenceFactor,
  window: ResolvedWindow,
): NationLeaderboard {
  const scored: UnrankedNationScore[] = [];
  let totalNations = 0;

  for (const nation of aggregation.nations.values()) {
    if (nation.totalGames > 0) totalNations++;
    if (!meetsActivityGate(nation.totalGames, factor)) continue;

    scored.push(
      scoreNation(
        nation,
        factor,
        selectTopContributors(aggregation.contributions.get(nation.countryCode)),
      ),
    );
  }

  const nations: NationScore[] = scored
    .sort(compareNationScores)
    .map((score, index) => ({ ...score, rank: index + 1 }));

  return {
    gameMode: aggregation.gameMode,
    window,
    nations,
    k: factor.k,
    confidenceFactor: factor.confidenceFactor,
    minGamesRequired: factor.minGamesRequired,
    averageGamesPerNation: factor.averageGamesPerNation,
    totalNations,
  };
}

/**
 * Full breakdown of one nation's score, including nations the activity
 * gate removed from the leaderboard
 */
export function explainNation(
  nation: NationAggregate,
  aggregation: ScoreAggregation,
  factor: ConfidenceFactor,
  leaderboard: NationLeaderboard,
): NationScoreBreakdown {
  const score = scoreNation(nation, factor, []);
  const ranked = leaderboard.nations.find((entry) => entry.countryCode === nation.countryCode);
  const tallies = aggregation.contributions.get(nation.countryCode);

  const contributions: PlayerContribution[] = tallies
    ? [...tallies.values()].sort(compareContributors).map((tally) => ({
        playerId: tally.playerId,
        name: tally.name,
        wins: tally.wins,
        losses: tally.losses,
        draws: tally.draws,
        netWins: tally.netWins,
        shareOfRawScore: roundTo(safeRate(tally.netWins, score.rawScore), 4),
      }))
    : [];

  return {
    countryCode: nation.countryCode,
    gameMode: nation.gameMode,
    window: leaderboard.window,
    wins: score.wins,
    losses: score.losses,
    draws: score.draws,
    totalGames: score.totalGames,
    rawScore: score.rawScore,
    adjustedScore: score.adjustedScore,
    displayScore: score.displayScore,
    uncorrectedScore: score.uncorrectedScore,
    k: factor.k,
    confidenceFactor: factor.confidenceFactor,
    minGamesRequired: factor.minGamesRequired,
    meetsActivityGate: meetsActivityGate(nation.totalGames, factor),
    rank: ranked ? ranked.rank : null,
    contributions,
  };
}
