/**
 * Team Graph Builder - co-occurrence graph of teammates
 *
 * Nodes are players, an edge links two players each time they appear on the
 * same side of the same match. Edge weight only grows. Players who never
 * shared a side with anyone are not nodes.
 *
 * Joint wins and losses count matches where both players won or both lost.
 * Per-player records over every result feed the solo win rates.
 *
 * @module teams/calculators/team-graph
 */

import type { MatchRecord, Outcome, TeamMember } from "@nation-ladder/types";
import { compareStrings, groupBy } from "../../../common/utils";
import { resolveNationCode } from "../../rankings/calculators/score-aggregator.calculator";
import { fallbackPlayerName } from "../../rankings/rankings.config";
import { TEAMS_CONFIG } from "../teams.config";

// =============================================================================
// TYPES
// =============================================================================

export interface PairEdge {
  /** memberKey of the sorted pair */
  readonly key: string;
  /** Lexicographically smaller id */
  readonly playerA: string;
  readonly playerB: string;
  readonly weight: number;
  readonly wins: number;
  readonly losses: number;
}

export interface PlayerRecord {
  readonly playerId: string;
  readonly wins: number;
  readonly losses: number;
  readonly draws: number;
}

export interface TeamGraph {
  /** Keyed by pairKey, sorted by (playerA, playerB) */
  readonly edges: ReadonlyMap<string, PairEdge>;
  /** Neighbours per node; only players with at least one edge */
  readonly adjacency: ReadonlyMap<string, ReadonlySet<string>>;
  readonly records: ReadonlyMap<string, PlayerRecord>;
}

interface MutableEdge {
  playerA: string;
  playerB: string;
  weight: number;
  wins: number;
  losses: number;
}

// =============================================================================
// PAIR KEYS
// =============================================================================

/**
 * Map key of a sorted id list. Ids may contain any character, so the list
 * is encoded rather than joined.
 */
export function memberKey(playerIds: readonly string[]): string {
  return JSON.stringify(playerIds);
}

export function pairKey(first: string, second: string): string {
  return memberKey(compareStrings(first, second) <= 0 ? [first, second] : [second, first]);
}

/**
 * Display label of a pair, "a|b"
 */
export function pairLabel(edge: Pick<PairEdge, "playerA" | "playerB">): string {
  return `${edge.playerA}${TEAMS_CONFIG.PAIR_LABEL_SEPARATOR}${edge.playerB}`;
}

export function compareIdLists(a: readonly string[], b: readonly string[]): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const order = compareStrings(a[i] ?? "", b[i] ?? "");
    if (order !== 0) return order;
  }
  return a.length - b.length;
}

// =============================================================================
// GRAPH
// =============================================================================

export function buildTeamGraph(matches: readonly MatchRecord[]): TeamGraph {
  const edges = new Map<string, MutableEdge>();
  const records = new Map<string, { wins: number; losses: number; draws: number }>();

  for (const match of matches) {
    for (const result of match.players) {
      let record = records.get(result.playerId);
      if (!record) {
        record = { wins: 0, losses: 0, draws: 0 };
        records.set(result.playerId, record);
      }
      if (result.outcome === "win") record.wins++;
      else if (result.outcome === "loss") record.losses++;
      else record.draws++;
    }

    const sides = groupBy(match.players, (result) => result.teamSide);
    for (const side of sides.values()) {
      const ids = uniqueSorted(side.map((result) => result.playerId));
      const outcomes = new Map<string, Outcome>();
      for (const result of side) outcomes.set(result.playerId, result.outcome);

      for (let i = 0; i < ids.length; i++) {
        for (let j = i + 1; j < ids.length; j++) {
          const playerA = ids[i];
          const playerB = ids[j];
          if (playerA === undefined || playerB === undefined) continue;

          const key = pairKey(playerA, playerB);
          let edge = edges.get(key);
          if (!edge) {
            edge = { playerA, playerB, weight: 0, wins: 0, losses: 0 };
            edges.set(key, edge);
          }

          edge.weight++;
          const outcomeA = outcomes.get(playerA);
          if (outcomeA !== "draw" && outcomeA === outcomes.get(playerB)) {
            if (outcomeA === "win") edge.wins++;
            else edge.losses++;
          }
        }
      }
    }
  }

  const sortedEdges = new Map<string, PairEdge>();
  const adjacency = new Map<string, Set<string>>();
  const ordered = [...edges.entries()].sort(([, a], [, b]) =>
    compareIdLists([a.playerA, a.playerB], [b.playerA, b.playerB]),
  );
  for (const [key, edge] of ordered) {
    sortedEdges.set(key, { key, ...edge });
    addNeighbour(adjacency, edge.playerA, edge.playerB);
    addNeighbour(adjacency, edge.playerB, edge.playerA);
  }

  const frozenRecords = new Map<string, PlayerRecord>();
  for (const id of [...records.keys()].sort(compareStrings)) {
    const record = records.get(id);
    if (record) frozenRecords.set(id, { playerId: id, ...record });
  }

  return { edges: sortedEdges, adjacency, records: frozenRecords };
}

/**
 * Keep only edges at or above a weight; nodes left without edges drop out
 */
export function filterTeamGraph(graph: TeamGraph, minWeight: number): TeamGraph {
  const edges = new Map<string, PairEdge>();
  const adjacency = new Map<string, Set<string>>();

  for (const [key, edge] of graph.edges) {
    if (edge.weight < minWeight) continue;
    edges.set(key, edge);
    addNeighbour(adjacency, edge.playerA, edge.playerB);
    addNeighbour(adjacency, edge.playerB, edge.playerA);
  }

  return { edges, adjacency, records: graph.records };
}

// =============================================================================
// PLAYER DIRECTORY
// =============================================================================

/**
 * Latest known name and nation per player. Matches must be in snapshot order.
 * Nations resolve the same way as in score aggregation, so placeholders
 * such as "??" never reach a member record.
 */
export function buildPlayerDirectory(
  matches: readonly MatchRecord[],
  factionCodes: ReadonlySet<string> = new Set(),
): ReadonlyMap<string, TeamMember> {
  const names = new Map<string, string>();
  const countries = new Map<string, string>();
  const ids = new Set<string>();

  for (const match of matches) {
    for (const result of match.players) {
      ids.add(result.playerId);
      if (result.playerName) names.set(result.playerId, result.playerName);
      const country = resolveNationCode(result.countryCode, factionCodes);
      if (country !== null) countries.set(result.playerId, country);
    }
  }

  const directory = new Map<string, TeamMember>();
  for (const id of [...ids].sort(compareStrings)) {
    directory.set(id, {
      playerId: id,
      name: names.get(id) ?? fallbackPlayerName(id),
      countryCode: countries.get(id) ?? null,
    });
  }
  return directory;
}

export function lookupMember(
  directory: ReadonlyMap<string, TeamMember>,
  playerId: string,
): TeamMember {
  return (
    directory.get(playerId) ?? {
      playerId,
      name: fallbackPlayerName(playerId),
      countryCode: null,
    }
  );
}

// =============================================================================
// HELPERS
// =============================================================================

function uniqueSorted(ids: Iterable<string>): string[] {
  return [...new Set(ids)].sort(compareStrings);
}

function addNeighbour(adjacency: Map<string, Set<string>>, from: string, to: string): void {
  let neighbours = adjacency.get(from);
  if (!neighbours) {
    neighbours = new Set();
    adjacency.set(from, neighbours);
  }
  neighbours.add(to);
}
