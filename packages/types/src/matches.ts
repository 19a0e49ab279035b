/**
 * Match record type definitions and Zod schemas.
 *
 * A MatchRecord is immutable once stored. Optional fields default to null
 * so downstream code never checks for field presence.
 */

import { z } from "zod";
import {
  GameModeSchema,
  IdentifierSchema,
  OutcomeSchema,
  TimestampSchema,
} from "./common.js";

const nullableString = z
  .string()
  .nullish()
  .transform((value) => value ?? null);

const nullableNumber = z
  .number()
  .finite()
  .nullish()
  .transform((value) => value ?? null);

// ============================================================================
// Player Result
// ============================================================================

export const PlayerResultSchema = z.object({
  playerId: IdentifierSchema,
  partyId: IdentifierSchema.nullish().transform((value) => value ?? null),
  teamSide: IdentifierSchema,
  outcome: OutcomeSchema,
  playerName: nullableString,
  countryCode: nullableString,
  /** Post-match skill estimate, when the source tracks ratings */
  skill: nullableNumber,
  /** Post-match rating uncertainty */
  uncertainty: nullableNumber,
});
export type PlayerResult = z.output<typeof PlayerResultSchema>;
export type PlayerResultInput = z.input<typeof PlayerResultSchema>;

// ============================================================================
// Match Record
// ============================================================================

export const MatchRecordSchema = z.object({
  matchId: IdentifierSchema,
  gameMode: GameModeSchema,
  startedAt: TimestampSchema,
  isRanked: z.boolean().default(true),
  players: z.array(PlayerResultSchema).min(1, "Match has no player results"),
});
export type MatchRecord = z.output<typeof MatchRecordSchema>;
export type MatchRecordInput = z.input<typeof MatchRecordSchema>;

// ============================================================================
// Ingestion
// ============================================================================

export interface IngestionIssue {
  readonly index: number;
  readonly matchId: string | null;
  readonly message: string;
}

export interface IngestionReport {
  readonly received: number;
  readonly accepted: number;
  readonly skipped: number;
  readonly duplicates: number;
  readonly unranked: number;
  /** First issues encountered; the list is capped */
  readonly issues: readonly IngestionIssue[];
}
