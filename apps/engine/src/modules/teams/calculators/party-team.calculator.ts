/**
 * Party Team Detector
 *
 * A party instance is the set of players sharing a party id in one match.
 * Each distinct roster of two or more players is a candidate team.
 *
 * Stability:
 *   exactMatches / matches in which any member played in a party
 *
 * A triad with 10 exact matches and 2 more matches with a fourth player
 * scores 10/12.
 *
 * @module teams/calculators/party-team
 */

import type {
  MatchRecord,
  Outcome,
  PartyTeamCandidate,
  TeamMember,
} from "@nation-ladder/types";
import {
  compareStrings,
  createOutcomeTally,
  safeRate,
  sumTallies,
  toOutcomeStats,
  toStatsByMode,
  type OutcomeTally,
} from "../../../common/utils";
import { partyTeamName } from "../teams.config";
import { compareIdLists, lookupMember, memberKey } from "./team-graph.calculator";

// =============================================================================
// TYPES
// =============================================================================

export interface PartyInstance {
  readonly matchId: string;
  readonly partyId: string;
  readonly gameMode: string;
  /** Sorted member ids */
  readonly playerIds: readonly string[];
  readonly rosterKey: string;
  readonly outcome: Outcome;
}

export interface PartyDetectionOptions {
  readonly minRosterSize: number;
  readonly maxRosterSize: number;
  readonly minTeamMatches: number;
}

interface CandidateAccumulator {
  playerIds: readonly string[];
  matchIds: Set<string>;
  byMode: Map<string, OutcomeTally>;
}

type UnnumberedCandidate = Omit<PartyTeamCandidate, "teamId">;

// =============================================================================
// PARTY INSTANCES
// =============================================================================

/**
 * Group results by (match, party). Solo players never form an instance.
 */
export function collectPartyInstances(matches: readonly MatchRecord[]): PartyInstance[] {
  const instances: PartyInstance[] = [];

  for (const match of matches) {
    const parties = new Map<string, { ids: Set<string>; outcome: Outcome }>();

    for (const result of match.players) {
      if (result.partyId === null) continue;
      const party = parties.get(result.partyId);
      if (party) {
        party.ids.add(result.playerId);
      } else {
        parties.set(result.partyId, { ids: new Set([result.playerId]), outcome: result.outcome });
      }
    }

    for (const partyId of [...parties.keys()].sort(compareStrings)) {
      const party = parties.get(partyId);
      if (!party || party.ids.size < 2) continue;

      const playerIds = [...party.ids].sort(compareStrings);
      instances.push({
        matchId: match.matchId,
        partyId,
        gameMode: match.gameMode,
        playerIds,
        rosterKey: memberKey(playerIds),
        outcome: party.outcome,
      });
    }
  }

  return instances;
}

// =============================================================================
// DETECTION
// =============================================================================

export function comparePartyCandidates(
  a: UnnumberedCandidate,
  b: UnnumberedCandidate,
): number {
  if (a.exactMatches !== b.exactMatches) return b.exactMatches - a.exactMatches;
  if (a.stabilityScore !== b.stabilityScore) return b.stabilityScore - a.stabilityScore;
  return compareIdLists(a.playerIds, b.playerIds);
}

export function detectPartyTeams(
  instances: readonly PartyInstance[],
  directory: ReadonlyMap<string, TeamMember>,
  options: PartyDetectionOptions,
): PartyTeamCandidate[] {
  const candidates = new Map<string, CandidateAccumulator>();
  const partyMatchesByPlayer = new Map<string, Set<string>>();

  for (const instance of instances) {
    for (const playerId of instance.playerIds) {
      let matchIds = partyMatchesByPlayer.get(playerId);
      if (!matchIds) {
        matchIds = new Set();
        partyMatchesByPlayer.set(playerId, matchIds);
      }
      matchIds.add(instance.matchId);
    }

    const size = instance.playerIds.length;
    if (size < options.minRosterSize || size > options.maxRosterSize) continue;

    let candidate = candidates.get(instance.rosterKey);
    if (!candidate) {
      candidate = { playerIds: instance.playerIds, matchIds: new Set(), byMode: new Map() };
      candidates.set(instance.rosterKey, candidate);
    }

    // One party per roster per match
    if (candidate.matchIds.has(instance.matchId)) continue;
    candidate.matchIds.add(instance.matchId);

    let tally = candidate.byMode.get(instance.gameMode);
    if (!tally) {
      tally = createOutcomeTally();
      candidate.byMode.set(instance.gameMode, tally);
    }
    tally.matches++;
    if (instance.outcome === "win") tally.wins++;
    else if (instance.outcome === "loss") tally.losses++;
  }

  const detected: UnnumberedCandidate[] = [];

  for (const candidate of candidates.values()) {
    const exactMatches = candidate.matchIds.size;
    if (exactMatches < options.minTeamMatches) continue;

    const memberMatches = new Set<string>();
    for (const playerId of candidate.playerIds) {
      for (const matchId of partyMatchesByPlayer.get(playerId) ?? []) {
        memberMatches.add(matchId);
      }
    }

    const members = candidate.playerIds.map((id) => lookupMember(directory, id));
    const leader = members[0];

    detected.push({
      kind: "party",
      teamName: partyTeamName(leader ? leader.name : "Unknown"),
      playerIds: candidate.playerIds,
      members,
      exactMatches,
      memberPartyMatches: memberMatches.size,
      stabilityScore: safeRate(exactMatches, memberMatches.size),
      statsOverall: toOutcomeStats(sumTallies(candidate.byMode.values())),
      statsByMode: toStatsByMode(candidate.byMode),
    });
  }

  return detected
    .sort(comparePartyCandidates)
    .map((candidate, index) => ({ teamId: `party_${index + 1}`, ...candidate }));
}
