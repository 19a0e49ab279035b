/**
 * Pipeline Service - batch recomputation over one snapshot
 *
 * Flow:
 * 1. Load and validate the snapshot once
 * 2. Fan out one task per game mode (Promise.all); each task writes only
 *    its own slice
 * 3. Detect teams over the whole snapshot
 *
 * A slice that fails is reported and not published; its previous output
 * stays in place. No slice failure escapes run().
 *
 * @module pipeline
 */

import { Injectable, Logger } from "@nestjs/common";
import { RankingError, SliceComputationError, isErr } from "../../common/errors";
import { MatchSnapshotService, type MatchSnapshot } from "../ingestion";
import { RankingsService } from "../rankings";
import { TeamsService } from "../teams";
import type { PipelineRunOptions, PipelineRunSummary, SliceOutcome } from "./pipeline.types";
import { ResultPublisher } from "./result-publisher";

@Injectable()
export class PipelineService {
  private readonly logger = new Logger(PipelineService.name);

  constructor(
    private readonly snapshots: MatchSnapshotService,
    private readonly rankings: RankingsService,
    private readonly teams: TeamsService,
    private readonly publisher: ResultPublisher,
  ) {}

  async run(options: PipelineRunOptions = {}): Promise<PipelineRunSummary> {
    const startTime = Date.now();
    const snapshot = await this.snapshots.load(options.window, { asOf: options.asOf });
    const gameModes = options.gameModes ?? snapshot.gameModes;

    this.logger.log(
      `Starting run over ${snapshot.records.length} matches, ${gameModes.length} game modes`,
    );

    const slices = await Promise.all(
      gameModes.map((gameMode) => this.runSlice(snapshot, gameMode, options)),
    );

    const teamsPublished = options.skipTeams ? false : await this.runTeams(snapshot, options);

    const failed = slices.filter((slice) => slice.status === "failed").length;
    this.logger.log(
      `Run complete in ${Date.now() - startTime}ms: ` +
        `${slices.length - failed} slices published, ${failed} failed`,
    );

    return {
      asOf: snapshot.asOf,
      window: snapshot.window,
      ingestion: snapshot.report,
      slices,
      teamsPublished,
    };
  }

  // ===========================================================================
  // PRIVATE
  // ===========================================================================

  private async runSlice(
    snapshot: MatchSnapshot,
    gameMode: string,
    options: PipelineRunOptions,
  ): Promise<SliceOutcome> {
    try {
      const nationLeaderboard = this.rankings.computeNationLeaderboard(
        snapshot,
        gameMode,
        options.rankingOverrides,
      );

      if (isErr(nationLeaderboard)) {
        this.logger.warn(
          `Slice ${gameMode} not published, keeping previous output: ${nationLeaderboard.error.message}`,
        );
        return failedSlice(gameMode, nationLeaderboard.error);
      }

      const playerLeaderboard = this.rankings.computePlayerLeaderboard(
        snapshot,
        gameMode,
        options.rankingOverrides,
      );

      const countryLeaderboards = this.rankings.computeCountryPlayerLeaderboards(
        snapshot,
        gameMode,
        options.rankingOverrides,
      );

      await this.publisher.publishSlice({
        gameMode,
        window: snapshot.window,
        nationLeaderboard: nationLeaderboard.data,
        playerLeaderboard,
        countryLeaderboards,
      });

      this.logger.debug(
        `Slice ${gameMode}: ${nationLeaderboard.data.nations.length} nations, ` +
          `${playerLeaderboard.players.length} players, ` +
          `${countryLeaderboards.length} country leaderboards`,
      );

      return {
        gameMode,
        status: "published",
        nations: nationLeaderboard.data.nations.length,
      };
    } catch (error) {
      const failure =
        error instanceof RankingError ? error : new SliceComputationError(gameMode, error);
      this.logger.error(`Slice ${gameMode} failed: ${failure.message}`, failure.stack);
      return failedSlice(gameMode, failure);
    }
  }

  private async runTeams(snapshot: MatchSnapshot, options: PipelineRunOptions): Promise<boolean> {
    try {
      await this.publisher.publishTeams(
        this.teams.computeTeamReport(snapshot, options.teamOverrides),
      );
      return true;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Team detection failed, keeping previous output: ${message}`);
      return false;
    }
  }
}

function failedSlice(gameMode: string, error: RankingError): SliceOutcome {
  return { gameMode, status: "failed", code: error.code, message: error.message };
}
