/**
 * Stats Utilities - Core statistical helpers shared by calculators
 *
 * Pure functions. Everything here is deterministic so that two runs over
 * the same snapshot serialize to identical output.
 *
 * @module common/utils/stats
 */

import type { OutcomeStats } from "@nation-ladder/types";

// =============================================================================
// BASIC STATISTICS
// =============================================================================

/**
 * Calculate arithmetic mean
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Calculate rate safely (handles division by zero)
 */
export function safeRate(
  numerator: number,
  denominator: number,
  scale = 1,
): number {
  if (denominator === 0) return 0;
  return (numerator / denominator) * scale;
}

/**
 * Calculate percentage safely
 */
export function safePercentage(numerator: number, denominator: number): number {
  return safeRate(numerator, denominator, 100);
}

/**
 * Round to a fixed number of decimals
 */
export function roundTo(value: number, decimals: number): number {
  return Number(value.toFixed(decimals));
}

// =============================================================================
// COLLECTION HELPERS
// =============================================================================

export function groupBy<T, K extends string>(
  items: readonly T[],
  keySelector: (item: T) => K,
): Map<K, T[]> {
  const groups = new Map<K, T[]>();

  for (const item of items) {
    const key = keySelector(item);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }

  return groups;
}

/**
 * Locale-independent string ordering
 */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

// =============================================================================
// OUTCOME STATS
// =============================================================================

/**
 * Mutable accumulator for win/loss tallies
 */
export interface OutcomeTally {
  matches: number;
  wins: number;
  losses: number;
}

export function createOutcomeTally(): OutcomeTally {
  return { matches: 0, wins: 0, losses: 0 };
}

/**
 * Freeze a tally into published stats
 */
export function toOutcomeStats(tally: OutcomeTally): OutcomeStats {
  return {
    matches: tally.matches,
    wins: tally.wins,
    losses: tally.losses,
    winRate: roundTo(safeRate(tally.wins, tally.wins + tally.losses), 4),
  };
}

/**
 * Convert per-mode tallies to a record with keys in sorted order
 */
export function toStatsByMode(
  tallies: ReadonlyMap<string, OutcomeTally>,
): Record<string, OutcomeStats> {
  const byMode: Record<string, OutcomeStats> = {};
  for (const mode of [...tallies.keys()].sort(compareStrings)) {
    const tally = tallies.get(mode);
    if (tally) {
      byMode[mode] = toOutcomeStats(tally);
    }
  }
  return byMode;
}

/**
 * Sum per-mode tallies into an overall tally
 */
export function sumTallies(tallies: Iterable<OutcomeTally>): OutcomeTally {
  const total = createOutcomeTally();
  for (const tally of tallies) {
    total.matches += tally.matches;
    total.wins += tally.wins;
    total.losses += tally.losses;
  }
  return total;
}
