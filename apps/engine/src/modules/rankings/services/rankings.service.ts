/**
 * Rankings Service
 *
 * Service layer over the ranking calculators.
 *
 * - compute* methods are synchronous and work on a given snapshot; the
 *   pipeline uses them so every slice of a run shares one snapshot
 * - build* / explain* methods load a fresh snapshot for the window first
 *
 * @module rankings/services/rankings
 */

import { Injectable, Logger } from "@nestjs/common";
import type {
  NationLeaderboard,
  NationScoreBreakdown,
  PlayerLeaderboard,
  TimeWindow,
} from "@nation-ladder/types";
import { EngineConfigService, type RankingOptions } from "../../../common/config";
import {
  ConfidenceFactorUndefinedError,
  InvalidInputError,
  NationNotFoundError,
  err,
  isErr,
  ok,
  type Result,
} from "../../../common/errors";
import {
  MatchSnapshotService,
  selectGameMode,
  type MatchSnapshot,
} from "../../ingestion";
import {
  aggregateScores,
  buildCountryPlayerLeaderboards,
  buildNationLeaderboard,
  buildPlayerLeaderboard,
  calculateConfidenceFactor,
  explainNation,
  resolveNationCode,
} from "../calculators";

export type NationLeaderboardResult = Result<
  NationLeaderboard,
  ConfidenceFactorUndefinedError
>;

export type CountryPlayerLeaderboardResult = Result<PlayerLeaderboard, InvalidInputError>;

export type NationScoreBreakdownResult = Result<
  NationScoreBreakdown,
  ConfidenceFactorUndefinedError | NationNotFoundError | InvalidInputError
>;

@Injectable()
export class RankingsService {
  private readonly logger = new Logger(RankingsService.name);

  constructor(
    private readonly snapshots: MatchSnapshotService,
    private readonly config: EngineConfigService,
  ) {}

  // ===========================================================================
  // PUBLIC API
  // ===========================================================================

  async buildNationLeaderboard(
    gameMode: string,
    window?: TimeWindow,
    overrides?: Partial<RankingOptions>,
  ): Promise<NationLeaderboardResult> {
    const snapshot = await this.snapshots.load(window, { gameMode });
    return this.computeNationLeaderboard(snapshot, gameMode, overrides);
  }

  /**
   * Player leaderboards default to all time: ratings are a current state,
   * not a per-window tally
   */
  async buildPlayerLeaderboard(
    gameMode: string,
    window: TimeWindow = "all_time",
    overrides?: Partial<RankingOptions>,
  ): Promise<PlayerLeaderboard> {
    const snapshot = await this.snapshots.load(window, { gameMode });
    return this.computePlayerLeaderboard(snapshot, gameMode, overrides);
  }

  async buildCountryPlayerLeaderboard(
    countryCode: string,
    gameMode: string,
    window: TimeWindow = "all_time",
    overrides?: Partial<RankingOptions>,
  ): Promise<CountryPlayerLeaderboardResult> {
    const snapshot = await this.snapshots.load(window, { gameMode });
    return this.computeCountryPlayerLeaderboard(snapshot, countryCode, gameMode, overrides);
  }

  async explainNationScore(
    countryCode: string,
    gameMode: string,
    window?: TimeWindow,
    overrides?: Partial<RankingOptions>,
  ): Promise<NationScoreBreakdownResult> {
    const snapshot = await this.snapshots.load(window, { gameMode });
    return this.computeNationScoreBreakdown(snapshot, countryCode, gameMode, overrides);
  }

  // ===========================================================================
  // SNAPSHOT COMPUTATIONS
  // ===========================================================================

  computeNationLeaderboard(
    snapshot: MatchSnapshot,
    gameMode: string,
    overrides?: Partial<RankingOptions>,
  ): NationLeaderboardResult {
    const options = this.config.mergeRankingOptions(overrides);
    const aggregation = aggregateScores({
      matches: selectGameMode(snapshot, gameMode),
      gameMode,
      factionCodes: options.factionCodes,
    });

    if (aggregation.unresolvedResults > 0) {
      this.logger.debug(
        `${gameMode}: ${aggregation.unresolvedResults} player results without a resolvable nation`,
      );
    }

    const factor = calculateConfidenceFactor(aggregation.nations.values(), gameMode);
    if (isErr(factor)) {
      this.logger.warn(factor.error.message);
      return factor;
    }

    const leaderboard = buildNationLeaderboard(aggregation, factor.data, snapshot.window);

    const gated = leaderboard.totalNations - leaderboard.nations.length;
    if (gated > 0) {
      this.logger.debug(
        `${gameMode}: ${gated} nations below ${leaderboard.minGamesRequired.toFixed(2)} games`,
      );
    }

    return ok(leaderboard);
  }

  computePlayerLeaderboard(
    snapshot: MatchSnapshot,
    gameMode: string,
    overrides?: Partial<RankingOptions>,
  ): PlayerLeaderboard {
    const options = this.config.mergeRankingOptions(overrides);
    return buildPlayerLeaderboard({
      matches: selectGameMode(snapshot, gameMode),
      gameMode,
      window: snapshot.window,
      minPlayerGames: options.minPlayerGames,
      factionCodes: options.factionCodes,
    });
  }

  computeCountryPlayerLeaderboard(
    snapshot: MatchSnapshot,
    countryCode: string,
    gameMode: string,
    overrides?: Partial<RankingOptions>,
  ): CountryPlayerLeaderboardResult {
    const options = this.config.mergeRankingOptions(overrides);
    const nationCode = resolveNationCode(countryCode, options.factionCodes);
    if (nationCode === null) {
      return err(
        new InvalidInputError(`"${countryCode}" is not a nation code`, "countryCode"),
      );
    }

    return ok(
      buildPlayerLeaderboard({
        matches: selectGameMode(snapshot, gameMode),
        gameMode,
        window: snapshot.window,
        minPlayerGames: options.minPlayerGames,
        factionCodes: options.factionCodes,
        countryCode: nationCode,
        minCountryPlayers: options.minCountryPlayers,
      }),
    );
  }

  /**
   * Every nation with enough qualified players gets its own leaderboard
   */
  computeCountryPlayerLeaderboards(
    snapshot: MatchSnapshot,
    gameMode: string,
    overrides?: Partial<RankingOptions>,
  ): PlayerLeaderboard[] {
    const options = this.config.mergeRankingOptions(overrides);
    return buildCountryPlayerLeaderboards({
      matches: selectGameMode(snapshot, gameMode),
      gameMode,
      window: snapshot.window,
      minPlayerGames: options.minPlayerGames,
      factionCodes: options.factionCodes,
      minCountryPlayers: options.minCountryPlayers,
    });
  }

  computeNationScoreBreakdown(
    snapshot: MatchSnapshot,
    countryCode: string,
    gameMode: string,
    overrides?: Partial<RankingOptions>,
  ): NationScoreBreakdownResult {
    const options = this.config.mergeRankingOptions(overrides);
    const nationCode = resolveNationCode(countryCode, options.factionCodes);
    if (nationCode === null) {
      return err(
        new InvalidInputError(`"${countryCode}" is not a nation code`, "countryCode"),
      );
    }

    const aggregation = aggregateScores({
      matches: selectGameMode(snapshot, gameMode),
      gameMode,
      factionCodes: options.factionCodes,
    });

    const factor = calculateConfidenceFactor(aggregation.nations.values(), gameMode);
    if (isErr(factor)) {
      return factor;
    }

    const nation = aggregation.nations.get(nationCode);
    if (!nation) {
      return err(new NationNotFoundError(nationCode, gameMode));
    }

    const leaderboard = buildNationLeaderboard(aggregation, factor.data, snapshot.window);
    return ok(explainNation(nation, aggregation, factor.data, leaderboard));
  }
}
