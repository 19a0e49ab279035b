/**
 * Nation Ladder - Shared Types
 *
 * This package contains all shared type definitions and Zod schemas
 * used by the ranking and team detection engine.
 */

export * from "./common.js";
export * from "./matches.js";
export * from "./rankings.js";
export * from "./teams.js";
