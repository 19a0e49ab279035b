/**
 * Teams Module - party teams, communities and frequent pairs
 *
 * @module teams
 */

import { Module } from "@nestjs/common";
import { IngestionModule } from "../ingestion";
import { TeamsService } from "./services";

@Module({
  imports: [IngestionModule],
  providers: [TeamsService],
  exports: [TeamsService],
})
export class TeamsModule {}
