/**
 * Team, community and pair record type definitions.
 */

import type { OutcomeStats, ResolvedWindow, TeamType } from "./common.js";

export interface TeamMember {
  readonly playerId: string;
  readonly name: string;
  readonly countryCode: string | null;
}

export interface RosterMember extends TeamMember {
  readonly matchesPlayed: number;
  /** Percentage of the cluster's matches this member attended (0-100) */
  readonly attendancePercent: number;
}

export interface Lineup {
  readonly playerIds: readonly string[];
  readonly names: readonly string[];
  readonly count: number;
}

// ============================================================================
// Party Teams
// ============================================================================

export interface PartyTeamCandidate {
  readonly kind: "party";
  readonly teamId: string;
  readonly teamName: string;
  /** Sorted member ids, the identity of the candidate */
  readonly playerIds: readonly string[];
  readonly members: readonly TeamMember[];
  /** Matches played with exactly this roster */
  readonly exactMatches: number;
  /** Matches in which any member played in any party */
  readonly memberPartyMatches: number;
  /** exactMatches / memberPartyMatches */
  readonly stabilityScore: number;
  readonly statsOverall: OutcomeStats;
  readonly statsByMode: Readonly<Record<string, OutcomeStats>>;
}

// ============================================================================
// Communities
// ============================================================================

export interface CommunityCluster {
  readonly kind: "community";
  readonly clusterId: string;
  readonly teamName: string;
  readonly playerIds: readonly string[];
  readonly roster: readonly RosterMember[];
  readonly edgeCount: number;
  /** edges / possible edges among members, in [0, 1] */
  readonly density: number;
  /** Mean edge weight within the cluster */
  readonly avgConnectionStrength: number;
  readonly statsOverall: OutcomeStats;
  readonly statsByMode: Readonly<Record<string, OutcomeStats>>;
  readonly mostCommonLineups: readonly Lineup[];
}

export type TeamRecord = PartyTeamCandidate | CommunityCluster;

// ============================================================================
// Pairs
// ============================================================================

export interface PlayerPairEdge {
  readonly kind: "pair";
  /** Display label "<playerA>|<playerB>"; not unique when ids contain "|" */
  readonly pairKey: string;
  readonly playerA: TeamMember;
  readonly playerB: TeamMember;
  /** Matches played together on the same side */
  readonly weight: number;
  readonly wins: number;
  readonly losses: number;
  readonly jointWinRate: number;
  readonly soloWinRateA: number;
  readonly soloWinRateB: number;
  /** jointWinRate - mean(soloWinRateA, soloWinRateB) */
  readonly synergy: number;
  /** jointWinRate / mean(soloWinRateA, soloWinRateB), 0 without a baseline */
  readonly lift: number;
}

// ============================================================================
// Reports
// ============================================================================

export interface TeamsReport<T extends TeamRecord = TeamRecord> {
  readonly teamType: TeamType;
  readonly window: ResolvedWindow;
  readonly teams: readonly T[];
}

export interface TeamSearchResult {
  readonly query: string;
  readonly teamType: TeamType;
  readonly teams: readonly TeamRecord[];
}

export interface FrequentPairsReport {
  readonly window: ResolvedWindow;
  readonly minWeight: number;
  readonly pairs: readonly PlayerPairEdge[];
}

/**
 * Everything team detection publishes for one run
 */
export interface TeamDetectionReport {
  readonly window: ResolvedWindow;
  readonly parties: TeamsReport<PartyTeamCandidate>;
  readonly communities: TeamsReport<CommunityCluster>;
  readonly pairs: FrequentPairsReport;
}
