export * from "./calculators";
export * from "./services";
export * from "./teams.config";
export * from "./teams.module";
