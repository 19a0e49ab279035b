/**
 * Test fixtures - match record builders shared by unit and e2e specs
 */

import type {
  IngestionReport,
  MatchRecord,
  PlayerResult,
} from "@nation-ladder/types";
import { createSnapshot, type MatchSnapshot } from "../src/modules/ingestion/snapshot";

export const TEST_AS_OF = new Date("2026-03-15T12:00:00.000Z");

export function createPlayerResult(overrides: Partial<PlayerResult> = {}): PlayerResult {
  return {
    playerId: "p1",
    partyId: null,
    teamSide: "1",
    outcome: "win",
    playerName: null,
    countryCode: null,
    skill: null,
    uncertainty: null,
    ...overrides,
  };
}

export function createMatch(overrides: Partial<MatchRecord> = {}): MatchRecord {
  return {
    matchId: "m1",
    gameMode: "1v1",
    startedAt: new Date("2026-03-14T12:00:00.000Z"),
    isRanked: true,
    players: [createPlayerResult()],
    ...overrides,
  };
}

export interface SideSpec {
  readonly players: readonly string[];
  readonly outcome: PlayerResult["outcome"];
  /** Party id shared by every player on the side, null for solo queue */
  readonly partyId?: string | null;
  readonly countryCode?: string | null;
}

/**
 * Two-sided match where each side's players share an outcome
 */
export function createTeamMatch(
  matchId: string,
  sides: readonly [SideSpec, SideSpec],
  overrides: Partial<MatchRecord> = {},
): MatchRecord {
  const players = sides.flatMap((side, index) =>
    side.players.map((playerId) =>
      createPlayerResult({
        playerId,
        playerName: `Name ${playerId}`,
        teamSide: String(index + 1),
        outcome: side.outcome,
        partyId: side.partyId ?? null,
        countryCode: side.countryCode ?? null,
      }),
    ),
  );

  return createMatch({ matchId, gameMode: "2v2", players, ...overrides });
}

/**
 * Single-nation results: each game is one player result for the nation
 */
export function createNationResults(
  countryCode: string,
  wins: number,
  losses: number,
  gameMode = "1v1",
): MatchRecord[] {
  const records: MatchRecord[] = [];
  const outcomes = [
    ...Array.from({ length: wins }, () => "win" as const),
    ...Array.from({ length: losses }, () => "loss" as const),
  ];

  outcomes.forEach((outcome, index) => {
    records.push(
      createMatch({
        matchId: `${gameMode}-${countryCode}-${index}`,
        gameMode,
        players: [
          createPlayerResult({
            playerId: `${countryCode.toLowerCase()}-player`,
            countryCode,
            outcome,
          }),
        ],
      }),
    );
  });

  return records;
}

export function createReport(accepted: number): IngestionReport {
  return {
    received: accepted,
    accepted,
    skipped: 0,
    duplicates: 0,
    unranked: 0,
    issues: [],
  };
}

export function createTestSnapshot(records: readonly MatchRecord[]): MatchSnapshot {
  return createSnapshot(
    records,
    { key: "all_time", from: null, to: null },
    TEST_AS_OF,
    createReport(records.length),
  );
}
