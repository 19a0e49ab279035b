/**
 * Match Ingestion Service Tests
 */

import { MatchIngestionService } from "./match-ingestion.service";

describe("MatchIngestionService", () => {
  const service = new MatchIngestionService();

  it("should normalize identifiers and default optional fields", () => {
    const { records, report } = service.ingest([
      {
        matchId: 42,
        gameMode: "1v1",
        startedAt: "2026-03-01T10:00:00Z",
        players: [{ playerId: 7, teamSide: 1, outcome: "win" }],
      },
    ]);

    expect(report.accepted).toBe(1);
    expect(records[0]).toEqual({
      matchId: "42",
      gameMode: "1v1",
      startedAt: new Date("2026-03-01T10:00:00Z"),
      isRanked: true,
      players: [
        {
          playerId: "7",
          partyId: null,
          teamSide: "1",
          outcome: "win",
          playerName: null,
          countryCode: null,
          skill: null,
          uncertainty: null,
        },
      ],
    });
  });

  it("should skip malformed records and keep going", () => {
    const { records, report } = service.ingest([
      { gameMode: "1v1", startedAt: "2026-03-01T10:00:00Z", players: [] },
      {
        matchId: "m2",
        gameMode: "1v1",
        startedAt: "2026-03-01T10:00:00Z",
        players: [{ playerId: "a", teamSide: "1" }],
      },
      {
        matchId: "m3",
        gameMode: "1v1",
        startedAt: "2026-03-01T10:00:00Z",
        players: [{ playerId: "a", teamSide: "1", outcome: "loss" }],
      },
    ]);

    expect(records.map((record) => record.matchId)).toEqual(["m3"]);
    expect(report.received).toBe(3);
    expect(report.skipped).toBe(2);
    expect(report.issues.map((issue) => [issue.index, issue.matchId])).toEqual([
      [0, null],
      [1, "m2"],
    ]);
    expect(report.issues[1]?.message).toContain("players.0.outcome");
  });

  it("should keep the first of duplicate match ids", () => {
    const first = createRaw("dup", "win");
    const second = createRaw("dup", "loss");

    const { records, report } = service.ingest([first, second]);

    expect(records).toHaveLength(1);
    expect(records[0]?.players[0]?.outcome).toBe("win");
    expect(report.duplicates).toBe(1);
    expect(report.skipped).toBe(1);
  });

  it("should set aside unranked matches without counting them as skipped", () => {
    const { records, report } = service.ingest([
      { ...createRaw("casual", "win"), isRanked: false },
      createRaw("ranked", "win"),
    ]);

    expect(records.map((record) => record.matchId)).toEqual(["ranked"]);
    expect(report.unranked).toBe(1);
    expect(report.skipped).toBe(0);
  });

  it("should cap reported issues but count every skip", () => {
    const raw = Array.from({ length: 25 }, () => ({ matchId: "broken" }));

    const { report } = service.ingest(raw);

    expect(report.skipped).toBe(25);
    expect(report.issues).toHaveLength(20);
  });

  it("should freeze accepted records", () => {
    const { records } = service.ingest([createRaw("m1", "win")]);

    expect(Object.isFrozen(records[0])).toBe(true);
    expect(Object.isFrozen(records[0]?.players)).toBe(true);
    expect(Object.isFrozen(records[0]?.players[0])).toBe(true);
  });
});

// ==============================================================================
// Test Helpers
// ==============================================================================

function createRaw(matchId: string, outcome: string): Record<string, unknown> {
  return {
    matchId,
    gameMode: "1v1",
    startedAt: "2026-03-01T10:00:00Z",
    players: [{ playerId: "a", teamSide: "1", outcome }],
  };
}
