export * from "./ingestion.config";
export * from "./ingestion.module";
export * from "./match-ingestion.service";
export * from "./match-snapshot.service";
export * from "./match-store";
export * from "./snapshot";
