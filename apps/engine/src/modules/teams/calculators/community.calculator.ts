/**
 * Community Detector - threshold connected components
 *
 * Algorithm:
 * 1. Drop edges lighter than minEdgeWeight
 * 2. Take connected components, visiting nodes in id order
 * 3. Keep components of minRosterSize..maxRosterSize members
 *
 * Components are ordered by size desc, then first member id. Statistics
 * are re-derived from the match records: a match counts for a community
 * when at least two members shared a side, using the side with the most
 * members.
 *
 * @module teams/calculators/community
 */

import type {
  CommunityCluster,
  Lineup,
  MatchRecord,
  Outcome,
  RosterMember,
  TeamMember,
} from "@nation-ladder/types";
import {
  compareStrings,
  createOutcomeTally,
  groupBy,
  roundTo,
  safePercentage,
  safeRate,
  sumTallies,
  toOutcomeStats,
  toStatsByMode,
  type OutcomeTally,
} from "../../../common/utils";
import { TEAMS_CONFIG, communityTeamName } from "../teams.config";
import {
  compareIdLists,
  filterTeamGraph,
  lookupMember,
  memberKey,
  type TeamGraph,
} from "./team-graph.calculator";

export interface CommunityDetectionOptions {
  readonly minEdgeWeight: number;
  readonly minRosterSize: number;
  readonly maxRosterSize: number;
  readonly minTeamMatches: number;
}

export interface CommunityMatchStats {
  readonly teamMatches: number;
  readonly byMode: ReadonlyMap<string, OutcomeTally>;
  readonly attendance: ReadonlyMap<string, number>;
  /** Most frequent member lineups, count desc */
  readonly lineups: readonly Omit<Lineup, "names">[];
}

// =============================================================================
// PARTITIONING
// =============================================================================

/**
 * Connected components of the graph, members sorted
 */
export function connectedComponents(graph: TeamGraph): string[][] {
  const visited = new Set<string>();
  const components: string[][] = [];

  for (const start of [...graph.adjacency.keys()].sort(compareStrings)) {
    if (visited.has(start)) continue;

    const component: string[] = [];
    const queue = [start];
    visited.add(start);

    while (queue.length > 0) {
      const node = queue.shift();
      if (node === undefined) break;
      component.push(node);

      for (const neighbour of graph.adjacency.get(node) ?? []) {
        if (visited.has(neighbour)) continue;
        visited.add(neighbour);
        queue.push(neighbour);
      }
    }

    components.push(component.sort(compareStrings));
  }

  return components.sort((a, b) => {
    if (a.length !== b.length) return b.length - a.length;
    return compareStrings(a[0] ?? "", b[0] ?? "");
  });
}

// =============================================================================
// STATISTICS
// =============================================================================

export function deriveCommunityStats(
  members: readonly string[],
  matches: readonly MatchRecord[],
): CommunityMatchStats {
  const memberSet = new Set(members);
  const byMode = new Map<string, OutcomeTally>();
  const attendance = new Map<string, number>();
  const lineupCounts = new Map<string, { playerIds: string[]; count: number }>();
  let teamMatches = 0;

  for (const match of matches) {
    const side = largestMemberSide(match, memberSet);
    if (!side) continue;

    teamMatches++;
    let tally = byMode.get(match.gameMode);
    if (!tally) {
      tally = createOutcomeTally();
      byMode.set(match.gameMode, tally);
    }
    tally.matches++;
    if (side.outcome === "win") tally.wins++;
    else if (side.outcome === "loss") tally.losses++;

    for (const id of side.playerIds) {
      attendance.set(id, (attendance.get(id) ?? 0) + 1);
    }

    const key = memberKey(side.playerIds);
    const lineup = lineupCounts.get(key);
    if (lineup) lineup.count++;
    else lineupCounts.set(key, { playerIds: side.playerIds, count: 1 });
  }

  const lineups = [...lineupCounts.entries()]
    .sort(([, a], [, b]) => b.count - a.count || compareIdLists(a.playerIds, b.playerIds))
    .slice(0, TEAMS_CONFIG.LINEUP_LIMIT)
    .map(([, lineup]) => lineup);

  return { teamMatches, byMode, attendance, lineups };
}

/**
 * Side holding the most members (ties: lowest side id), or null when no
 * side holds two
 */
function largestMemberSide(
  match: MatchRecord,
  members: ReadonlySet<string>,
): { playerIds: string[]; outcome: Outcome } | null {
  const sides = groupBy(
    match.players.filter((result) => members.has(result.playerId)),
    (result) => result.teamSide,
  );

  let best: { playerIds: string[]; outcome: Outcome; side: string } | null = null;
  for (const [side, results] of sides) {
    const playerIds = [...new Set(results.map((result) => result.playerId))].sort(compareStrings);
    const first = results[0];
    if (playerIds.length < 2 || !first) continue;

    if (
      !best ||
      playerIds.length > best.playerIds.length ||
      (playerIds.length === best.playerIds.length && compareStrings(side, best.side) < 0)
    ) {
      best = { playerIds, outcome: first.outcome, side };
    }
  }

  return best ? { playerIds: best.playerIds, outcome: best.outcome } : null;
}

// =============================================================================
// DETECTION
// =============================================================================

export function detectCommunities(
  graph: TeamGraph,
  matches: readonly MatchRecord[],
  directory: ReadonlyMap<string, TeamMember>,
  options: CommunityDetectionOptions,
): CommunityCluster[] {
  const strong = filterTeamGraph(graph, options.minEdgeWeight);
  const clusters: CommunityCluster[] = [];

  for (const members of connectedComponents(strong)) {
    if (members.length < options.minRosterSize || members.length > options.maxRosterSize) {
      continue;
    }

    const stats = deriveCommunityStats(members, matches);
    if (stats.teamMatches < options.minTeamMatches) continue;

    const memberSet = new Set(members);
    let edgeCount = 0;
    let totalWeight = 0;
    for (const edge of strong.edges.values()) {
      if (memberSet.has(edge.playerA) && memberSet.has(edge.playerB)) {
        edgeCount++;
        totalWeight += edge.weight;
      }
    }

    const roster: RosterMember[] = members
      .map((id) => {
        const matchesPlayed = stats.attendance.get(id) ?? 0;
        return {
          ...lookupMember(directory, id),
          matchesPlayed,
          attendancePercent: roundTo(
            safePercentage(matchesPlayed, stats.teamMatches),
            TEAMS_CONFIG.DECIMALS.ATTENDANCE,
          ),
        };
      })
      .sort((a, b) => b.matchesPlayed - a.matchesPlayed || compareStrings(a.playerId, b.playerId));

    const possibleEdges = (members.length * (members.length - 1)) / 2;
    const leader = roster[0];

    clusters.push({
      kind: "community",
      clusterId: `community_${clusters.length + 1}`,
      teamName: communityTeamName(leader ? leader.name : "Unknown"),
      playerIds: members,
      roster,
      edgeCount,
      density: roundTo(safeRate(edgeCount, possibleEdges), TEAMS_CONFIG.DECIMALS.DENSITY),
      avgConnectionStrength: roundTo(
        safeRate(totalWeight, edgeCount),
        TEAMS_CONFIG.DECIMALS.STRENGTH,
      ),
      statsOverall: toOutcomeStats(sumTallies(stats.byMode.values())),
      statsByMode: toStatsByMode(stats.byMode),
      mostCommonLineups: stats.lineups.map((lineup) => ({
        ...lineup,
        names: lineup.playerIds.map((id) => lookupMember(directory, id).name),
      })),
    });
  }

  return clusters;
}
