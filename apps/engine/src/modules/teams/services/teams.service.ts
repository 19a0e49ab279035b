/**
 * Teams Service
 *
 * Service layer over team detection.
 *
 * Features:
 * - Party teams from shared party ids
 * - Communities from the co-occurrence graph
 * - Frequent pairs with synergy
 * - Search by member name or id
 *
 * compute* methods work on a given snapshot; build* / search* load one.
 *
 * @module teams/services/teams
 */

import { Injectable, Logger } from "@nestjs/common";
import type {
  CommunityCluster,
  FrequentPairsReport,
  PartyTeamCandidate,
  TeamDetectionReport,
  TeamMember,
  TeamRecord,
  TeamSearchResult,
  TeamType,
  TeamsReport,
  TimeWindow,
} from "@nation-ladder/types";
import { EngineConfigService, type TeamDetectionOptions } from "../../../common/config";
import { MatchSnapshotService, type MatchSnapshot } from "../../ingestion";
import {
  buildPlayerDirectory,
  buildTeamGraph,
  collectPartyInstances,
  detectCommunities,
  detectFrequentPairs,
  detectPartyTeams,
} from "../calculators";

@Injectable()
export class TeamsService {
  private readonly logger = new Logger(TeamsService.name);

  constructor(
    private readonly snapshots: MatchSnapshotService,
    private readonly config: EngineConfigService,
  ) {}

  // ===========================================================================
  // PUBLIC API
  // ===========================================================================

  async buildTeams(
    teamType: TeamType,
    window?: TimeWindow,
    overrides?: Partial<TeamDetectionOptions>,
  ): Promise<TeamsReport> {
    const snapshot = await this.snapshots.load(window);
    return this.computeTeams(snapshot, teamType, overrides);
  }

  async buildFrequentPairs(
    window?: TimeWindow,
    overrides?: Partial<TeamDetectionOptions>,
  ): Promise<FrequentPairsReport> {
    const snapshot = await this.snapshots.load(window);
    return this.computeFrequentPairs(snapshot, overrides);
  }

  /**
   * Case-insensitive substring match on member names, or exact player id
   */
  async searchTeams(
    playerName: string,
    teamType: TeamType,
    window?: TimeWindow,
  ): Promise<TeamSearchResult> {
    const query = playerName.trim();
    if (query.length === 0) {
      this.logger.debug("Empty team search query");
      return { query, teamType, teams: [] };
    }

    const report = await this.buildTeams(teamType, window);
    const needle = query.toLowerCase();
    const teams = report.teams.filter((team) =>
      membersOf(team).some(
        (member) => member.playerId === query || member.name.toLowerCase().includes(needle),
      ),
    );

    return { query, teamType, teams };
  }

  // ===========================================================================
  // SNAPSHOT COMPUTATIONS
  // ===========================================================================

  computeTeams(
    snapshot: MatchSnapshot,
    teamType: TeamType,
    overrides?: Partial<TeamDetectionOptions>,
  ): TeamsReport {
    return teamType === "party"
      ? this.computePartyTeams(snapshot, overrides)
      : this.computeCommunities(snapshot, overrides);
  }

  computePartyTeams(
    snapshot: MatchSnapshot,
    overrides?: Partial<TeamDetectionOptions>,
  ): TeamsReport<PartyTeamCandidate> {
    const options = this.config.mergeTeamOptions(overrides);
    const instances = collectPartyInstances(snapshot.records);
    const teams = detectPartyTeams(instances, this.directoryOf(snapshot), options);

    this.logger.debug(
      `Found ${instances.length} party instances, ${teams.length} party teams`,
    );

    return { teamType: "party", window: snapshot.window, teams };
  }

  computeCommunities(
    snapshot: MatchSnapshot,
    overrides?: Partial<TeamDetectionOptions>,
  ): TeamsReport<CommunityCluster> {
    const options = this.config.mergeTeamOptions(overrides);
    const graph = buildTeamGraph(snapshot.records);
    const teams = detectCommunities(
      graph,
      snapshot.records,
      this.directoryOf(snapshot),
      options,
    );

    this.logger.debug(
      `Co-occurrence graph: ${graph.adjacency.size} players, ${graph.edges.size} edges, ` +
        `${teams.length} communities`,
    );

    return { teamType: "community", window: snapshot.window, teams };
  }

  computeFrequentPairs(
    snapshot: MatchSnapshot,
    overrides?: Partial<TeamDetectionOptions>,
  ): FrequentPairsReport {
    const options = this.config.mergeTeamOptions(overrides);
    const pairs = detectFrequentPairs(
      buildTeamGraph(snapshot.records),
      this.directoryOf(snapshot),
      options.minPairWeight,
    );

    return { window: snapshot.window, minWeight: options.minPairWeight, pairs };
  }

  /**
   * All team outputs of one run, sharing one graph and directory
   */
  computeTeamReport(
    snapshot: MatchSnapshot,
    overrides?: Partial<TeamDetectionOptions>,
  ): TeamDetectionReport {
    const options = this.config.mergeTeamOptions(overrides);
    const graph = buildTeamGraph(snapshot.records);
    const directory = this.directoryOf(snapshot);

    const report: TeamDetectionReport = {
      window: snapshot.window,
      parties: {
        teamType: "party",
        window: snapshot.window,
        teams: detectPartyTeams(collectPartyInstances(snapshot.records), directory, options),
      },
      communities: {
        teamType: "community",
        window: snapshot.window,
        teams: detectCommunities(graph, snapshot.records, directory, options),
      },
      pairs: {
        window: snapshot.window,
        minWeight: options.minPairWeight,
        pairs: detectFrequentPairs(graph, directory, options.minPairWeight),
      },
    };

    this.logger.log(
      `Team detection: ${report.parties.teams.length} parties, ` +
        `${report.communities.teams.length} communities, ${report.pairs.pairs.length} pairs`,
    );

    return report;
  }

  // ===========================================================================
  // PRIVATE
  // ===========================================================================

  private directoryOf(snapshot: MatchSnapshot): ReadonlyMap<string, TeamMember> {
    return buildPlayerDirectory(snapshot.records, this.config.getRankingOptions().factionCodes);
  }
}

function membersOf(team: TeamRecord): readonly TeamMember[] {
  return team.kind === "party" ? team.members : team.roster;
}
