/**
 * Pipeline types
 *
 * @module pipeline/types
 */

import type {
  IngestionReport,
  NationLeaderboard,
  PlayerLeaderboard,
  ResolvedWindow,
  TimeWindow,
} from "@nation-ladder/types";
import type { RankingOptions, TeamDetectionOptions } from "../../common/config";

/**
 * Output partition of one game mode
 */
export interface RankingSlice {
  readonly gameMode: string;
  readonly window: ResolvedWindow;
  readonly nationLeaderboard: NationLeaderboard;
  readonly playerLeaderboard: PlayerLeaderboard;
  /** Sorted by nation code */
  readonly countryLeaderboards: readonly PlayerLeaderboard[];
}

export interface PipelineRunOptions {
  readonly window?: TimeWindow;
  readonly asOf?: Date;
  /** Restrict the run to these game modes; every mode in the snapshot otherwise */
  readonly gameModes?: readonly string[];
  readonly rankingOverrides?: Partial<RankingOptions>;
  readonly teamOverrides?: Partial<TeamDetectionOptions>;
  /** Skip team detection */
  readonly skipTeams?: boolean;
}

export type SliceOutcome =
  | { readonly gameMode: string; readonly status: "published"; readonly nations: number }
  | {
      readonly gameMode: string;
      readonly status: "failed";
      readonly code: string;
      readonly message: string;
    };

export interface PipelineRunSummary {
  readonly asOf: string;
  readonly window: ResolvedWindow;
  readonly ingestion: IngestionReport;
  readonly slices: readonly SliceOutcome[];
  readonly teamsPublished: boolean;
}
