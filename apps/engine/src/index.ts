/**
 * Nation Ladder Engine - library entry
 */

export * from "./app.module";
export * from "./common/config";
export * from "./common/errors";
export * from "./modules/ingestion";
export * from "./modules/pipeline";
export * from "./modules/rankings";
export * from "./modules/teams";
