/**
 * Ingestion Module - match store binding, validation, snapshots
 *
 * MatchStore defaults to the in-memory store; deployments override the
 * provider with their own adapter.
 *
 * @module ingestion
 */

import { Module } from "@nestjs/common";
import { InMemoryMatchStore, MatchStore } from "./match-store";
import { MatchIngestionService } from "./match-ingestion.service";
import { MatchSnapshotService } from "./match-snapshot.service";

@Module({
  providers: [
    InMemoryMatchStore,
    { provide: MatchStore, useExisting: InMemoryMatchStore },
    MatchIngestionService,
    MatchSnapshotService,
  ],
  exports: [MatchStore, InMemoryMatchStore, MatchIngestionService, MatchSnapshotService],
})
export class IngestionModule {}
