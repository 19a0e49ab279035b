/**
 * Match Snapshot - the immutable input of one run
 *
 * Threaded explicitly through every stage instead of a process-wide
 * "current dataset". Records are sorted by start time, then match id, so
 * every downstream iteration order is fixed.
 *
 * @module ingestion/snapshot
 */

import type {
  IngestionReport,
  MatchRecord,
  ResolvedWindow,
} from "@nation-ladder/types";
import { compareStrings } from "../../common/utils";
import { isWithinWindow } from "./ingestion.config";

export interface MatchSnapshot {
  readonly asOf: string;
  readonly window: ResolvedWindow;
  readonly records: readonly MatchRecord[];
  /** Distinct game modes present, sorted */
  readonly gameModes: readonly string[];
  readonly report: IngestionReport;
}

export function compareMatches(a: MatchRecord, b: MatchRecord): number {
  const byTime = a.startedAt.getTime() - b.startedAt.getTime();
  if (byTime !== 0) return byTime;
  return compareStrings(a.matchId, b.matchId);
}

export function createSnapshot(
  records: readonly MatchRecord[],
  window: ResolvedWindow,
  asOf: Date,
  report: IngestionReport,
): MatchSnapshot {
  const inWindow = records
    .filter((record) => isWithinWindow(record.startedAt, window))
    .sort(compareMatches);

  const gameModes = [...new Set(inWindow.map((record) => record.gameMode))].sort(
    compareStrings,
  );

  return Object.freeze({
    asOf: asOf.toISOString(),
    window,
    records: Object.freeze(inWindow),
    gameModes: Object.freeze(gameModes),
    report,
  });
}

/**
 * Records of one game mode, in snapshot order
 */
export function selectGameMode(
  snapshot: MatchSnapshot,
  gameMode: string,
): readonly MatchRecord[] {
  return snapshot.records.filter((record) => record.gameMode === gameMode);
}
