/**
 * Pipeline Service Tests
 *
 * Covers idempotence and slice isolation.
 */

import { ConfigModule } from "@nestjs/config";
import { Test, type TestingModule } from "@nestjs/testing";
import { EngineConfigModule } from "../../common/config";
import { InMemoryMatchStore } from "../ingestion";
import { RankingsService } from "../rankings";
import { PipelineModule } from "./pipeline.module";
import { PipelineService } from "./pipeline.service";
import { InMemoryResultPublisher } from "./result-publisher";
import {
  TEST_AS_OF,
  createMatch,
  createNationResults,
  createPlayerResult,
  createTeamMatch,
} from "../../../test/fixtures";

describe("PipelineService", () => {
  let moduleRef: TestingModule;
  let pipeline: PipelineService;
  let store: InMemoryMatchStore;
  let publisher: InMemoryResultPublisher;

  const runOptions = { window: "all_time", asOf: TEST_AS_OF } as const;

  beforeEach(async () => {
    moduleRef = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true }),
        EngineConfigModule,
        PipelineModule,
      ],
    }).compile();

    pipeline = moduleRef.get(PipelineService);
    store = moduleRef.get(InMemoryMatchStore);
    publisher = moduleRef.get(InMemoryResultPublisher);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await moduleRef.close();
  });

  it("should publish one slice per game mode plus the team report", async () => {
    store.replace([
      ...createNationResults("DE", 3, 1, "1v1"),
      ...createNationResults("FR", 2, 2, "2v2"),
    ]);

    const summary = await pipeline.run(runOptions);

    expect(summary.slices).toEqual([
      { gameMode: "1v1", status: "published", nations: 1 },
      { gameMode: "2v2", status: "published", nations: 1 },
    ]);
    expect(summary.teamsPublished).toBe(true);
    expect(publisher.listGameModes()).toEqual(["1v1", "2v2"]);
    expect(publisher.getTeams()).not.toBeNull();
  });

  it("should publish country leaderboards for nations meeting the player gate", async () => {
    store.replace([
      ...createNationResults("DE", 3, 1, "1v1"),
      createMatch({
        matchId: "rated-1",
        players: [
          createPlayerResult({ playerId: "de-1", countryCode: "DE", skill: 30, uncertainty: 2 }),
          createPlayerResult({
            playerId: "at-1",
            teamSide: "2",
            outcome: "loss",
            countryCode: "AT",
            skill: 20,
            uncertainty: 2,
          }),
        ],
      }),
    ]);

    await pipeline.run({
      ...runOptions,
      rankingOverrides: { minPlayerGames: 1, minCountryPlayers: 1 },
    });

    const slice = publisher.getSlice("1v1");
    expect(slice?.countryLeaderboards.map((board) => board.countryCode)).toEqual(["AT", "DE"]);
    expect(slice?.countryLeaderboards[1]?.players.map((player) => player.playerId)).toEqual([
      "de-1",
    ]);
    expect(slice?.playerLeaderboard.countryCode).toBeNull();
  });

  it("should produce identical output for identical input", async () => {
    store.replace([
      ...createNationResults("DE", 30, 12, "1v1"),
      ...createNationResults("JP", 8, 9, "1v1"),
      ...Array.from({ length: 6 }, (_, i) =>
        createTeamMatch(`t${i}`, [
          { players: ["a", "b"], outcome: "win", partyId: "duo", countryCode: "DE" },
          { players: ["c", "d"], outcome: "loss", countryCode: "JP" },
        ]),
      ),
    ]);

    await pipeline.run(runOptions);
    const first = JSON.stringify({
      slices: publisher.listGameModes().map((mode) => publisher.getSlice(mode)),
      teams: publisher.getTeams(),
    });

    publisher.clear();
    await pipeline.run(runOptions);
    const second = JSON.stringify({
      slices: publisher.listGameModes().map((mode) => publisher.getSlice(mode)),
      teams: publisher.getTeams(),
    });

    expect(second).toBe(first);
  });

  it("should keep the previous slice when a game mode loses its confidence factor", async () => {
    store.replace([
      ...createNationResults("DE", 3, 1, "1v1"),
      ...createNationResults("FR", 2, 2, "2v2"),
    ]);
    await pipeline.run(runOptions);

    store.replace([
      createMatch({
        matchId: "unknown-nation",
        gameMode: "1v1",
        players: [createPlayerResult({ countryCode: "??" })],
      }),
      ...createNationResults("FR", 4, 0, "2v2"),
    ]);
    const summary = await pipeline.run(runOptions);

    expect(summary.slices[0]).toMatchObject({
      gameMode: "1v1",
      status: "failed",
      code: "CONFIDENCE_FACTOR_UNDEFINED",
    });
    expect(publisher.getSlice("1v1")?.nationLeaderboard.nations[0]?.countryCode).toBe("DE");
    expect(publisher.getSlice("2v2")?.nationLeaderboard.nations[0]?.wins).toBe(4);
  });

  it("should contain unexpected failures to their slice", async () => {
    store.replace([
      ...createNationResults("DE", 3, 1, "1v1"),
      ...createNationResults("FR", 2, 2, "2v2"),
    ]);
    const rankings = moduleRef.get(RankingsService);
    const original = rankings.computePlayerLeaderboard.bind(rankings);
    jest.spyOn(rankings, "computePlayerLeaderboard").mockImplementation((snapshot, gameMode) => {
      if (gameMode === "1v1") throw new Error("boom");
      return original(snapshot, gameMode);
    });

    const summary = await pipeline.run(runOptions);

    expect(summary.slices).toEqual([
      {
        gameMode: "1v1",
        status: "failed",
        code: "SLICE_COMPUTATION_FAILED",
        message: 'Computation failed for game mode "1v1": boom',
      },
      { gameMode: "2v2", status: "published", nations: 1 },
    ]);
    expect(publisher.getSlice("1v1")).toBeNull();
  });

  it("should report skipped records from ingestion", async () => {
    store.replace([{ matchId: "broken" }, ...createNationResults("DE", 1, 0, "1v1")]);

    const summary = await pipeline.run(runOptions);

    expect(summary.ingestion.received).toBe(2);
    expect(summary.ingestion.skipped).toBe(1);
    expect(summary.ingestion.issues[0]?.matchId).toBe("broken");
  });
});
