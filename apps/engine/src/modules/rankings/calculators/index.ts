export * from "./confidence.calculator";
export * from "./nation-leaderboard.calculator";
export * from "./player-leaderboard.calculator";
export * from "./score-aggregator.calculator";
