export * from "./calculators";
export * from "./rankings.config";
export * from "./rankings.module";
export * from "./services";
