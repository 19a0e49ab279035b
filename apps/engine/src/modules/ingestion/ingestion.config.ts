/**
 * Ingestion Configuration
 *
 * Time window definitions and helpers. Windows resolve against the
 * snapshot's reference time, never the wall clock.
 *
 * @module ingestion/config
 */

import type {
  ResolvedWindow,
  TimeWindow,
  TimeWindowKey,
} from "@nation-ladder/types";

// =============================================================================
// TIME WINDOWS - Single source of truth
// =============================================================================

export const TIME_WINDOWS = {
  all_time: {
    id: "all_time",
    label: "All Time",
    days: null,
  },
  last_7d: {
    id: "last_7d",
    label: "Last 7 Days",
    days: 7,
  },
  last_30d: {
    id: "last_30d",
    label: "Last 30 Days",
    days: 30,
  },
  last_90d: {
    id: "last_90d",
    label: "Last 90 Days",
    days: 90,
  },
} as const satisfies Record<TimeWindowKey, { id: TimeWindowKey; label: string; days: number | null }>;

export const INGESTION_CONFIG = {
  /** Issues kept on the ingestion report; the skip count is always exact */
  MAX_REPORTED_ISSUES: 20,
} as const;

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Resolve a window to concrete ISO bounds
 */
export function resolveTimeWindow(window: TimeWindow, asOf: Date): ResolvedWindow {
  if (typeof window === "string") {
    const { days } = TIME_WINDOWS[window];
    if (days === null) {
      return { key: window, from: null, to: null };
    }
    return {
      key: window,
      from: new Date(asOf.getTime() - days * DAY_MS).toISOString(),
      to: asOf.toISOString(),
    };
  }

  return {
    key: "custom",
    from: window.from ? window.from.toISOString() : null,
    to: window.to ? window.to.toISOString() : null,
  };
}

/**
 * Check whether a timestamp falls inside a resolved window (inclusive)
 */
export function isWithinWindow(timestamp: Date, window: ResolvedWindow): boolean {
  const time = timestamp.getTime();
  if (window.from !== null && time < Date.parse(window.from)) return false;
  if (window.to !== null && time > Date.parse(window.to)) return false;
  return true;
}
