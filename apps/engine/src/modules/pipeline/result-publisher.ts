/**
 * Result Publisher - destination of computed outputs
 *
 * The pipeline only publishes slices that computed successfully, so a
 * failed slice leaves the previously published one in place.
 *
 * @module pipeline/result-publisher
 */

import { Injectable } from "@nestjs/common";
import type { TeamDetectionReport } from "@nation-ladder/types";
import type { RankingSlice } from "./pipeline.types";

/**
 * Injection token and contract for output sinks
 */
export abstract class ResultPublisher {
  abstract publishSlice(slice: RankingSlice): Promise<void>;
  abstract publishTeams(report: TeamDetectionReport): Promise<void>;
}

/**
 * Keeps the latest published outputs in process
 */
@Injectable()
export class InMemoryResultPublisher extends ResultPublisher {
  private readonly slices = new Map<string, RankingSlice>();
  private teams: TeamDetectionReport | null = null;

  async publishSlice(slice: RankingSlice): Promise<void> {
    this.slices.set(slice.gameMode, slice);
  }

  async publishTeams(report: TeamDetectionReport): Promise<void> {
    this.teams = report;
  }

  getSlice(gameMode: string): RankingSlice | null {
    return this.slices.get(gameMode) ?? null;
  }

  getTeams(): TeamDetectionReport | null {
    return this.teams;
  }

  listGameModes(): string[] {
    return [...this.slices.keys()].sort();
  }

  clear(): void {
    this.slices.clear();
    this.teams = null;
  }
}
