/**
 * Common types and enums used across the engine.
 */

import { z } from "zod";

// ============================================================================
// Enums
// ============================================================================

export const OutcomeSchema = z.enum(["win", "loss", "draw"]);
export type Outcome = z.infer<typeof OutcomeSchema>;

export const TeamTypeSchema = z.enum(["party", "community"]);
export type TeamType = z.infer<typeof TeamTypeSchema>;

export const TimeWindowKeySchema = z.enum([
  "all_time",
  "last_7d",
  "last_30d",
  "last_90d",
]);
export type TimeWindowKey = z.infer<typeof TimeWindowKeySchema>;

// ============================================================================
// Common Schemas
// ============================================================================

/**
 * Identifiers arrive as strings or integers depending on the source;
 * both are normalized to strings.
 */
export const IdentifierSchema = z
  .union([z.string().trim().min(1), z.number().int().nonnegative()])
  .transform((value) => String(value));
export type Identifier = z.output<typeof IdentifierSchema>;

export const GameModeSchema = z.string().trim().min(1, "Game mode is required");
export type GameMode = z.infer<typeof GameModeSchema>;

export const TimestampSchema = z
  .union([z.string().min(1), z.number().finite(), z.date()])
  .pipe(z.coerce.date());

export const TimeRangeSchema = z.object({
  from: TimestampSchema.nullable(),
  to: TimestampSchema.nullable(),
});
export type TimeRange = z.output<typeof TimeRangeSchema>;

/**
 * A window is either a named rolling preset or an explicit range.
 */
export type TimeWindow = TimeWindowKey | TimeRange;

/**
 * Window after resolution against a reference time. Bounds are ISO strings
 * so that published records serialize identically across runs.
 */
export interface ResolvedWindow {
  readonly key: TimeWindowKey | "custom";
  readonly from: string | null;
  readonly to: string | null;
}

// ============================================================================
// Aggregate Stats
// ============================================================================

export interface OutcomeStats {
  readonly matches: number;
  readonly wins: number;
  readonly losses: number;
  /** wins / (wins + losses), 0 when nothing was decided */
  readonly winRate: number;
}
