/**
 * Pair Synergy Calculator
 *
 * synergy = jointWinRate - mean(soloWinRateA, soloWinRateB)
 * lift    = jointWinRate / mean(soloWinRateA, soloWinRateB)
 *
 * Solo win rates cover every decided game of the player in the window,
 * including the ones played together.
 *
 * @module teams/calculators/pair-synergy
 */

import type { PlayerPairEdge, TeamMember } from "@nation-ladder/types";
import { mean, roundTo, safeRate } from "../../../common/utils";
import { TEAMS_CONFIG } from "../teams.config";
import {
  compareIdLists,
  lookupMember,
  pairLabel,
  type PlayerRecord,
  type TeamGraph,
} from "./team-graph.calculator";

export function soloWinRate(record: PlayerRecord | undefined): number {
  if (!record) return 0;
  return safeRate(record.wins, record.wins + record.losses);
}

export function comparePairs(a: PlayerPairEdge, b: PlayerPairEdge): number {
  if (a.weight !== b.weight) return b.weight - a.weight;
  if (a.synergy !== b.synergy) return b.synergy - a.synergy;
  return compareIdLists(
    [a.playerA.playerId, a.playerB.playerId],
    [b.playerA.playerId, b.playerB.playerId],
  );
}

export function detectFrequentPairs(
  graph: TeamGraph,
  directory: ReadonlyMap<string, TeamMember>,
  minWeight: number,
): PlayerPairEdge[] {
  const pairs: PlayerPairEdge[] = [];
  const { RATE } = TEAMS_CONFIG.DECIMALS;

  for (const edge of graph.edges.values()) {
    if (edge.weight < minWeight) continue;

    const jointWinRate = safeRate(edge.wins, edge.wins + edge.losses);
    const soloA = soloWinRate(graph.records.get(edge.playerA));
    const soloB = soloWinRate(graph.records.get(edge.playerB));
    const baseline = mean([soloA, soloB]);

    pairs.push({
      kind: "pair",
      pairKey: pairLabel(edge),
      playerA: lookupMember(directory, edge.playerA),
      playerB: lookupMember(directory, edge.playerB),
      weight: edge.weight,
      wins: edge.wins,
      losses: edge.losses,
      jointWinRate: roundTo(jointWinRate, RATE),
      soloWinRateA: roundTo(soloA, RATE),
      soloWinRateB: roundTo(soloB, RATE),
      synergy: roundTo(jointWinRate - baseline, RATE),
      lift: roundTo(safeRate(jointWinRate, baseline), RATE),
    });
  }

  return pairs.sort(comparePairs);
}
