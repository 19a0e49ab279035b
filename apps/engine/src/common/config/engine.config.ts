/**
 * Engine Configuration - Centralized thresholds for ranking and team detection
 *
 * Configuration Hierarchy (lower overrides higher):
 * 1. Defaults below
 * 2. Environment variables (RANKING_*, TEAM_*)
 * 3. Call-level overrides (mergeTeamOptions / mergeRankingOptions)
 */

import { Injectable } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import {
  TimeWindowKeySchema,
  type TimeWindowKey,
} from "@nation-ladder/types";

export interface RankingOptions {
  /** Non-ISO nation codes accepted alongside two-letter codes */
  readonly factionCodes: ReadonlySet<string>;
  /** Games a player needs in a game mode to appear on the player leaderboard */
  readonly minPlayerGames: number;
  /** Qualified players a nation needs before it gets its own player leaderboard */
  readonly minCountryPlayers: number;
}

export interface TeamDetectionOptions {
  /** Edges lighter than this are dropped before community partitioning */
  readonly minEdgeWeight: number;
  /** Pairs must have played this many matches together to be reported */
  readonly minPairWeight: number;
  readonly minRosterSize: number;
  readonly maxRosterSize: number;
  /** Exact-roster matches a party candidate needs */
  readonly minTeamMatches: number;
}

export const DEFAULT_RANKING_OPTIONS = {
  factionCodes: ["EU", "UN"],
  minPlayerGames: 5,
  minCountryPlayers: 15,
} as const;

export const DEFAULT_TEAM_OPTIONS: TeamDetectionOptions = {
  minEdgeWeight: 5,
  minPairWeight: 5,
  minRosterSize: 2,
  maxRosterSize: 10,
  minTeamMatches: 1,
};

export const DEFAULT_TIME_WINDOW: TimeWindowKey = "last_7d";

@Injectable()
export class EngineConfigService {
  private readonly defaultWindow: TimeWindowKey;
  private readonly rankingOptions: RankingOptions;
  private readonly teamOptions: TeamDetectionOptions;

  constructor(private readonly configService: ConfigService) {
    const envWindow = this.configService.get<string>("RANKING_DEFAULT_WINDOW");
    this.defaultWindow = this.isValidWindow(envWindow) ? envWindow : DEFAULT_TIME_WINDOW;

    this.rankingOptions = {
      factionCodes: this.readCodeList(
        "RANKING_FACTION_CODES",
        DEFAULT_RANKING_OPTIONS.factionCodes,
      ),
      minPlayerGames: this.readInt(
        "RANKING_MIN_PLAYER_GAMES",
        DEFAULT_RANKING_OPTIONS.minPlayerGames,
      ),
      minCountryPlayers: this.readInt(
        "RANKING_MIN_COUNTRY_PLAYERS",
        DEFAULT_RANKING_OPTIONS.minCountryPlayers,
      ),
    };

    const minRosterSize = this.readInt("TEAM_MIN_ROSTER_SIZE", DEFAULT_TEAM_OPTIONS.minRosterSize);
    this.teamOptions = {
      minEdgeWeight: this.readInt("TEAM_MIN_EDGE_WEIGHT", DEFAULT_TEAM_OPTIONS.minEdgeWeight),
      minPairWeight: this.readInt("TEAM_MIN_PAIR_WEIGHT", DEFAULT_TEAM_OPTIONS.minPairWeight),
      minRosterSize,
      maxRosterSize: Math.max(
        minRosterSize,
        this.readInt("TEAM_MAX_ROSTER_SIZE", DEFAULT_TEAM_OPTIONS.maxRosterSize),
      ),
      minTeamMatches: this.readInt("TEAM_MIN_TEAM_MATCHES", DEFAULT_TEAM_OPTIONS.minTeamMatches),
    };
  }

  getDefaultWindow(): TimeWindowKey {
    return this.defaultWindow;
  }

  /**
   * Reference time for rolling windows. Pinning it makes reruns reproducible.
   */
  getAsOf(): Date | null {
    const raw = this.configService.get<string>("RANKING_AS_OF");
    if (!raw) return null;
    const parsed = new Date(raw);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }

  getSnapshotPath(): string | null {
    return this.configService.get<string>("MATCH_SNAPSHOT_PATH") ?? null;
  }

  getRankingOptions(): RankingOptions {
    return this.rankingOptions;
  }

  getTeamOptions(): TeamDetectionOptions {
    return { ...this.teamOptions };
  }

  /**
   * Merge call-level overrides with configured thresholds
   */
  mergeRankingOptions(overrides?: Partial<RankingOptions>): RankingOptions {
    if (!overrides) {
      return this.rankingOptions;
    }

    return {
      factionCodes: overrides.factionCodes ?? this.rankingOptions.factionCodes,
      minPlayerGames: overrides.minPlayerGames ?? this.rankingOptions.minPlayerGames,
      minCountryPlayers: overrides.minCountryPlayers ?? this.rankingOptions.minCountryPlayers,
    };
  }

  mergeTeamOptions(overrides?: Partial<TeamDetectionOptions>): TeamDetectionOptions {
    const base = this.getTeamOptions();

    if (!overrides) {
      return base;
    }

    return {
      minEdgeWeight: overrides.minEdgeWeight ?? base.minEdgeWeight,
      minPairWeight: overrides.minPairWeight ?? base.minPairWeight,
      minRosterSize: overrides.minRosterSize ?? base.minRosterSize,
      maxRosterSize: overrides.maxRosterSize ?? base.maxRosterSize,
      minTeamMatches: overrides.minTeamMatches ?? base.minTeamMatches,
    };
  }

  private readInt(key: string, fallback: number): number {
    const raw = this.configService.get<string | number>(key);
    if (raw === undefined || raw === "") return fallback;
    const parsed = typeof raw === "number" ? raw : Number.parseInt(raw, 10);
    return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
  }

  private readCodeList(key: string, fallback: readonly string[]): ReadonlySet<string> {
    const raw = this.configService.get<string>(key);
    const codes = raw === undefined ? fallback : raw.split(",");
    return new Set(
      codes.map((code) => code.trim().toUpperCase()).filter((code) => code.length > 0),
    );
  }

  private isValidWindow(window?: string): window is TimeWindowKey {
    return TimeWindowKeySchema.safeParse(window).success;
  }
}
