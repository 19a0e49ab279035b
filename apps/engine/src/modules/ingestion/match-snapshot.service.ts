/**
 * Match Snapshot Service
 *
 * Reads the match store once, validates, and produces the snapshot a run
 * computes over.
 *
 * @module ingestion/match-snapshot
 */

import { Injectable, Logger } from "@nestjs/common";
import type { TimeWindow } from "@nation-ladder/types";
import { EngineConfigService } from "../../common/config";
import { resolveTimeWindow } from "./ingestion.config";
import { MatchIngestionService } from "./match-ingestion.service";
import { MatchStore } from "./match-store";
import { createSnapshot, type MatchSnapshot } from "./snapshot";

export interface SnapshotOptions {
  /** Reference time for rolling windows; configured value or now when omitted */
  readonly asOf?: Date | undefined;
  /** Keep one game mode, compared after validation */
  readonly gameMode?: string | undefined;
}

@Injectable()
export class MatchSnapshotService {
  private readonly logger = new Logger(MatchSnapshotService.name);

  constructor(
    private readonly store: MatchStore,
    private readonly ingestion: MatchIngestionService,
    private readonly config: EngineConfigService,
  ) {}

  async load(window?: TimeWindow, options: SnapshotOptions = {}): Promise<MatchSnapshot> {
    const asOf = options.asOf ?? this.config.getAsOf() ?? new Date();
    const resolved = resolveTimeWindow(window ?? this.config.getDefaultWindow(), asOf);

    const raw: unknown[] = [];
    for await (const record of this.store.fetchMatches({ window: resolved })) {
      raw.push(record);
    }

    const { records, report } = this.ingestion.ingest(raw);
    const gameMode = options.gameMode?.trim();
    const selected =
      gameMode === undefined ? records : records.filter((record) => record.gameMode === gameMode);
    const snapshot = createSnapshot(selected, resolved, asOf, report);

    this.logger.log(
      `Loaded snapshot (${resolved.key}): ${snapshot.records.length} matches in window, ` +
        `${snapshot.gameModes.length} game modes, ${report.skipped} records skipped`,
    );

    return snapshot;
  }
}
