/**
 * Pipeline Module - batch runs over all game modes
 *
 * ResultPublisher defaults to the in-memory publisher; deployments override
 * the provider with their own sink.
 *
 * @module pipeline
 */

import { Module } from "@nestjs/common";
import { IngestionModule } from "../ingestion";
import { RankingsModule } from "../rankings";
import { TeamsModule } from "../teams";
import { PipelineService } from "./pipeline.service";
import { InMemoryResultPublisher, ResultPublisher } from "./result-publisher";

@Module({
  imports: [IngestionModule, RankingsModule, TeamsModule],
  providers: [
    InMemoryResultPublisher,
    { provide: ResultPublisher, useExisting: InMemoryResultPublisher },
    PipelineService,
  ],
  exports: [PipelineService, ResultPublisher, InMemoryResultPublisher],
})
export class PipelineModule {}
