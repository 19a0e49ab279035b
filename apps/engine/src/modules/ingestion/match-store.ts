/**
 * Match Store - boundary to the match history source
 *
 * The engine reads raw records once at the start of a run. Records are
 * untrusted until MatchIngestionService validates them.
 *
 * @module ingestion/match-store
 */

import { Injectable } from "@nestjs/common";
import type { ResolvedWindow } from "@nation-ladder/types";

export interface MatchQuery {
  readonly window: ResolvedWindow;
}

/**
 * Injection token and contract for match sources. Implementations may
 * return records outside the query; the snapshot applies the window.
 * Game mode selection happens on validated records, never on raw ones.
 */
export abstract class MatchStore {
  abstract fetchMatches(query: MatchQuery): AsyncIterable<unknown>;
}

/**
 * In-process store used for batch runs over a loaded snapshot and in tests
 */
@Injectable()
export class InMemoryMatchStore extends MatchStore {
  private records: readonly unknown[] = [];

  replace(records: readonly unknown[]): void {
    this.records = [...records];
  }

  size(): number {
    return this.records.length;
  }

  async *fetchMatches(_query: MatchQuery): AsyncIterable<unknown> {
    yield* this.records;
  }
}
