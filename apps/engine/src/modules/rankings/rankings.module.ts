/**
 * Rankings Module - nation and player leaderboards
 *
 * Architecture:
 * - RankingsService: loads or receives a snapshot, runs the calculators
 * - Calculators: pure functions (aggregation, confidence correction, ordering)
 *
 * @module rankings
 */

import { Module } from "@nestjs/common";
import { IngestionModule } from "../ingestion";
import { RankingsService } from "./services";

@Module({
  imports: [IngestionModule],
  providers: [RankingsService],
  exports: [RankingsService],
})
export class RankingsModule {}
