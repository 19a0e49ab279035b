/**
 * Player Leaderboard Unit Tests
 */

import type { MatchRecord, PlayerResult } from "@nation-ladder/types";
import {
  buildCountryPlayerLeaderboards,
  buildPlayerLeaderboard,
} from "./player-leaderboard.calculator";
import { createMatch, createPlayerResult } from "../../../../test/fixtures";

describe("Player Leaderboard", () => {
  const base = {
    gameMode: "1v1",
    window: { key: "all_time", from: null, to: null },
    factionCodes: new Set<string>(),
  } as const;

  it("should rate players by skill minus uncertainty from their latest rated game", () => {
    const matches = [
      ...createGames("alice", 4, { skill: 30, uncertainty: 2 }),
      ...createGames("alice", 1, { skill: 28, uncertainty: 1 }, 4),
    ];

    const leaderboard = buildPlayerLeaderboard({ ...base, matches, minPlayerGames: 5 });

    expect(leaderboard.players).toEqual([
      {
        rank: 1,
        playerId: "alice",
        name: "Name alice",
        countryCode: "CA",
        rating: 27,
        skill: 28,
        uncertainty: 1,
        games: 5,
      },
    ]);
  });

  it("should keep the last rating when later games are unrated", () => {
    const matches = [
      ...createGames("bob", 3, { skill: 25, uncertainty: 5 }),
      ...createGames("bob", 2, { skill: null, uncertainty: null }, 3),
    ];

    const [bob] = buildPlayerLeaderboard({ ...base, matches, minPlayerGames: 5 }).players;

    expect(bob?.rating).toBe(20);
    expect(bob?.games).toBe(5);
  });

  it("should leave out players below the games threshold or without a rating", () => {
    const matches = [
      ...createGames("busy", 5, { skill: 20, uncertainty: 1 }),
      ...createGames("casual", 4, { skill: 40, uncertainty: 1 }, 0, "c"),
      ...createGames("unrated", 6, { skill: null, uncertainty: null }, 0, "u"),
    ];

    const leaderboard = buildPlayerLeaderboard({ ...base, matches, minPlayerGames: 5 });

    expect(leaderboard.players.map((player) => player.playerId)).toEqual(["busy"]);
    expect(leaderboard.totalPlayers).toBe(1);
  });

  it("should break rating ties by games, then player id", () => {
    const matches = [
      ...createGames("zed", 6, { skill: 20, uncertainty: 2 }, 0, "z"),
      ...createGames("amy", 5, { skill: 20, uncertainty: 2 }, 0, "a"),
      ...createGames("ben", 5, { skill: 19, uncertainty: 1 }, 0, "b"),
    ];

    const leaderboard = buildPlayerLeaderboard({ ...base, matches, minPlayerGames: 5 });

    expect(leaderboard.players.map((player) => [player.playerId, player.rank])).toEqual([
      ["zed", 1],
      ["amy", 2],
      ["ben", 3],
    ]);
  });

  it("should truncate to the limit and count players before truncation", () => {
    const matches = [
      ...createGames("p1", 1, { skill: 10, uncertainty: 0 }, 0, "x"),
      ...createGames("p2", 1, { skill: 12, uncertainty: 0 }, 0, "y"),
      ...createGames("p3", 1, { skill: 11, uncertainty: 0 }, 0, "z"),
    ];

    const leaderboard = buildPlayerLeaderboard({
      ...base,
      matches,
      minPlayerGames: 1,
      limit: 2,
    });

    expect(leaderboard.players.map((player) => player.playerId)).toEqual(["p2", "p3"]);
    expect(leaderboard.totalPlayers).toBe(3);
    expect(leaderboard.countryCode).toBeNull();
  });

  describe("country scope", () => {
    const matches = [
      createRatedGame("fr-a", "FR", 30),
      createRatedGame("fr-b", "fr", 25),
      createRatedGame("fr-c", "FR", 20),
      createRatedGame("de-a", "DE", 35),
      createRatedGame("anon", "??", 40),
    ];

    it("should rank only the players of the nation", () => {
      const leaderboard = buildPlayerLeaderboard({
        ...base,
        matches,
        minPlayerGames: 1,
        countryCode: "FR",
        minCountryPlayers: 3,
      });

      expect(leaderboard.countryCode).toBe("FR");
      expect(leaderboard.players.map((player) => [player.playerId, player.rank])).toEqual([
        ["fr-a", 1],
        ["fr-b", 2],
        ["fr-c", 3],
      ]);
      expect(leaderboard.totalPlayers).toBe(3);
    });

    it("should leave a nation below the player gate empty", () => {
      const leaderboard = buildPlayerLeaderboard({
        ...base,
        matches,
        minPlayerGames: 1,
        countryCode: "FR",
        minCountryPlayers: 4,
      });

      expect(leaderboard.players).toEqual([]);
      expect(leaderboard.totalPlayers).toBe(3);
    });

    it("should build one leaderboard per nation meeting the gate", () => {
      const all = buildCountryPlayerLeaderboards({
        ...base,
        matches,
        minPlayerGames: 1,
        minCountryPlayers: 1,
      });
      const gated = buildCountryPlayerLeaderboards({
        ...base,
        matches,
        minPlayerGames: 1,
        minCountryPlayers: 3,
      });

      expect(all.map((leaderboard) => leaderboard.countryCode)).toEqual(["DE", "FR"]);
      expect(gated.map((leaderboard) => leaderboard.countryCode)).toEqual(["FR"]);
      expect(gated[0]?.players[0]?.playerId).toBe("fr-a");
    });
  });
});

// ==============================================================================
// Test Helpers
// ==============================================================================

function createGames(
  playerId: string,
  count: number,
  rating: Pick<PlayerResult, "skill" | "uncertainty">,
  offset = 0,
  prefix = "g",
): MatchRecord[] {
  return Array.from({ length: count }, (_, index) =>
    createMatch({
      matchId: `${prefix}-${playerId}-${offset + index}`,
      startedAt: new Date(Date.UTC(2026, 0, 1 + offset + index)),
      players: [
        createPlayerResult({
          playerId,
          playerName: `Name ${playerId}`,
          countryCode: "ca",
          ...rating,
        }),
      ],
    }),
  );
}

function createRatedGame(playerId: string, countryCode: string, skill: number): MatchRecord {
  return createMatch({
    matchId: `r-${playerId}`,
    players: [createPlayerResult({ playerId, countryCode, skill, uncertainty: 0 })],
  });
}
