/**
 * Match Ingestion Service
 *
 * Validates raw match records before any computation sees them.
 *
 * - Malformed records are rejected and counted, the run continues
 * - Duplicate match ids keep the first occurrence
 * - Unranked matches are set aside
 * - Accepted records are deep-frozen
 *
 * @module ingestion/match-ingestion
 */

import { Injectable, Logger } from "@nestjs/common";
import {
  MatchRecordSchema,
  type IngestionIssue,
  type IngestionReport,
  type MatchRecord,
} from "@nation-ladder/types";
import { INGESTION_CONFIG } from "./ingestion.config";

export interface IngestionResult {
  readonly records: readonly MatchRecord[];
  readonly report: IngestionReport;
}

@Injectable()
export class MatchIngestionService {
  private readonly logger = new Logger(MatchIngestionService.name);

  ingest(raw: Iterable<unknown>): IngestionResult {
    const records: MatchRecord[] = [];
    const issues: IngestionIssue[] = [];
    const seen = new Set<string>();
    let received = 0;
    let skipped = 0;
    let duplicates = 0;
    let unranked = 0;

    const recordIssue = (issue: IngestionIssue): void => {
      skipped++;
      if (issues.length < INGESTION_CONFIG.MAX_REPORTED_ISSUES) {
        issues.push(issue);
      }
    };

    for (const candidate of raw) {
      const index = received++;
      const parsed = MatchRecordSchema.safeParse(candidate);

      if (!parsed.success) {
        recordIssue({
          index,
          matchId: extractMatchId(candidate),
          message: parsed.error.issues
            .map((issue) => `${issue.path.join(".") || "record"}: ${issue.message}`)
            .join("; "),
        });
        continue;
      }

      const record = parsed.data;

      if (seen.has(record.matchId)) {
        duplicates++;
        recordIssue({
          index,
          matchId: record.matchId,
          message: "Duplicate match id",
        });
        continue;
      }
      seen.add(record.matchId);

      if (!record.isRanked) {
        unranked++;
        continue;
      }

      records.push(freezeRecord(record));
    }

    const report: IngestionReport = {
      received,
      accepted: records.length,
      skipped,
      duplicates,
      unranked,
      issues,
    };

    if (skipped > 0) {
      this.logger.warn(
        `Skipped ${skipped} of ${received} match records (${duplicates} duplicates)`,
      );
    }
    this.logger.debug(
      `Accepted ${records.length} ranked match records, set aside ${unranked} unranked`,
    );

    return { records, report };
  }
}

function extractMatchId(candidate: unknown): string | null {
  if (typeof candidate !== "object" || candidate === null || !("matchId" in candidate)) {
    return null;
  }
  const { matchId } = candidate;
  return typeof matchId === "string" || typeof matchId === "number" ? String(matchId) : null;
}

function freezeRecord(record: MatchRecord): MatchRecord {
  for (const player of record.players) {
    Object.freeze(player);
  }
  Object.freeze(record.players);
  return Object.freeze(record);
}
