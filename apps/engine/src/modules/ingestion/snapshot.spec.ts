/**
 * Match Snapshot Tests
 */

import { createSnapshot, selectGameMode } from "./snapshot";
import { resolveTimeWindow } from "./ingestion.config";
import { createMatch, createReport } from "../../../test/fixtures";

describe("Match snapshot", () => {
  const asOf = new Date("2026-03-15T12:00:00.000Z");

  it("should keep records inside the window, sorted by time then id", () => {
    const records = [
      createMatch({ matchId: "b", startedAt: new Date("2026-03-14T00:00:00.000Z") }),
      createMatch({ matchId: "old", startedAt: new Date("2026-01-01T00:00:00.000Z") }),
      createMatch({ matchId: "c", startedAt: new Date("2026-03-10T00:00:00.000Z"), gameMode: "ffa" }),
      createMatch({ matchId: "a", startedAt: new Date("2026-03-14T00:00:00.000Z") }),
    ];

    const snapshot = createSnapshot(
      records,
      resolveTimeWindow("last_7d", asOf),
      asOf,
      createReport(records.length),
    );

    expect(snapshot.records.map((record) => record.matchId)).toEqual(["c", "a", "b"]);
    expect(snapshot.gameModes).toEqual(["1v1", "ffa"]);
    expect(snapshot.asOf).toBe("2026-03-15T12:00:00.000Z");
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.records)).toBe(true);
  });

  it("should select one game mode in snapshot order", () => {
    const snapshot = createSnapshot(
      [
        createMatch({ matchId: "x", gameMode: "ffa" }),
        createMatch({ matchId: "y", gameMode: "1v1" }),
      ],
      resolveTimeWindow("all_time", asOf),
      asOf,
      createReport(2),
    );

    expect(selectGameMode(snapshot, "ffa").map((record) => record.matchId)).toEqual(["x"]);
  });
});
