export * from "./pipeline.module";
export * from "./pipeline.service";
export * from "./pipeline.types";
export * from "./result-publisher";
