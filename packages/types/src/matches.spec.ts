import { MatchRecordSchema, PlayerResultSchema } from "./matches.js";

describe("MatchRecordSchema", () => {
  const valid = {
    matchId: "m1",
    gameMode: "1v1",
    startedAt: 1767225600000,
    players: [{ playerId: "a", teamSide: "1", outcome: "draw", countryCode: "DE" }],
  };

  it("should coerce epoch milliseconds to a date", () => {
    const parsed = MatchRecordSchema.parse(valid);

    expect(parsed.startedAt.toISOString()).toBe("2026-01-01T00:00:00.000Z");
  });

  it("should reject a match without player results", () => {
    expect(MatchRecordSchema.safeParse({ ...valid, players: [] }).success).toBe(false);
  });

  it("should reject unparseable timestamps", () => {
    expect(MatchRecordSchema.safeParse({ ...valid, startedAt: "yesterday" }).success).toBe(false);
  });

  it("should reject a blank game mode", () => {
    expect(MatchRecordSchema.safeParse({ ...valid, gameMode: "  " }).success).toBe(false);
  });
});

describe("PlayerResultSchema", () => {
  it("should reject unknown outcomes", () => {
    const result = PlayerResultSchema.safeParse({ playerId: "a", teamSide: "1", outcome: "forfeit" });

    expect(result.success).toBe(false);
  });

  it("should reject fractional and negative identifiers", () => {
    expect(PlayerResultSchema.safeParse({ playerId: 1.5, teamSide: "1", outcome: "win" }).success).toBe(false);
    expect(PlayerResultSchema.safeParse({ playerId: -1, teamSide: "1", outcome: "win" }).success).toBe(false);
  });
});
