export * from "./community.calculator";
export * from "./pair-synergy.calculator";
export * from "./party-team.calculator";
export * from "./team-graph.calculator";
