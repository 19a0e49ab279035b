/**
 * Nation Ladder Engine - Root Application Module
 */

import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";

import { EngineConfigModule, validateEnvironment } from "./common/config";
import { IngestionModule } from "./modules/ingestion";
import { PipelineModule } from "./modules/pipeline";
import { RankingsModule } from "./modules/rankings";
import { TeamsModule } from "./modules/teams";

@Module({
  imports: [
    // Configuration
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: [".env.local", ".env"],
      validate: validateEnvironment,
    }),
    EngineConfigModule,

    // Feature modules
    IngestionModule,
    RankingsModule,
    TeamsModule,
    PipelineModule,
  ],
})
export class AppModule {}
