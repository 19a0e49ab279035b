/**
 * Confidence Corrector - damping of small samples
 *
 * Formula:
 *   k  = (average decided games per nation) / 2
 *   CF = 2k
 *   adjusted = (wins - losses) / (totalGames + CF) * 10000
 *
 * k is derived from every nation with at least one decided game, before
 * the k/4 activity gate is applied. Deriving it from the gated set would
 * make the gate depend on itself.
 *
 * Worked values:
 * - CF=120, 4W/2L over 6 games     -> 158.73
 * - CF=120, 200W/100L over 300     -> 2380.95
 * - CF=30, 10W/5L over 15          -> 1111.11 (3333.33 uncorrected)
 *
 * @module rankings/calculators/confidence
 */

import type { ConfidenceFactor, NationAggregate } from "@nation-ladder/types";
import {
  ConfidenceFactorUndefinedError,
  err,
  ok,
  type Result,
} from "../../../common/errors";
import { mean } from "../../../common/utils";
import { RANKING_CONFIG } from "../rankings.config";

/**
 * Derive k and CF for one (game mode, window) slice
 */
export function calculateConfidenceFactor(
  nations: Iterable<NationAggregate>,
  gameMode: string,
): Result<ConfidenceFactor, ConfidenceFactorUndefinedError> {
  const gamesPerNation = [...nations]
    .filter((nation) => nation.totalGames > 0)
    .map((nation) => nation.totalGames);

  if (gamesPerNation.length === 0) {
    return err(new ConfidenceFactorUndefinedError(gameMode));
  }

  const averageGamesPerNation = mean(gamesPerNation);
  const k = averageGamesPerNation / RANKING_CONFIG.K_DIVISOR;

  return ok({
    gameMode,
    nationCount: gamesPerNation.length,
    averageGamesPerNation,
    k,
    confidenceFactor: RANKING_CONFIG.CONFIDENCE_MULTIPLIER * k,
    minGamesRequired: k / RANKING_CONFIG.ACTIVITY_GATE_DIVISOR,
  });
}

/**
 * Confidence-corrected score, unrounded
 */
export function calculateAdjustedScore(
  wins: number,
  losses: number,
  totalGames: number,
  confidenceFactor: number,
): number {
  const denominator = totalGames + confidenceFactor;
  if (denominator <= 0) return 0;
  return ((wins - losses) / denominator) * RANKING_CONFIG.SCORE_SCALE;
}

/**
 * Score without damping, for comparison
 */
export function calculateUncorrectedScore(
  wins: number,
  losses: number,
  totalGames: number,
): number {
  if (totalGames <= 0) return 0;
  return ((wins - losses) / totalGames) * RANKING_CONFIG.SCORE_SCALE;
}

/**
 * Check the k/4 activity gate
 */
export function meetsActivityGate(
  totalGames: number,
  factor: Pick<ConfidenceFactor, "minGamesRequired">,
): boolean {
  return totalGames >= factor.minGamesRequired;
}
