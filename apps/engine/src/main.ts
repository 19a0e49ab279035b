/**
 * Nation Ladder Engine - Batch Entry Point
 *
 * Loads the match records at MATCH_SNAPSHOT_PATH (a JSON array), runs the
 * pipeline once and prints the run summary.
 */

import "reflect-metadata";
import { readFile } from "node:fs/promises";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "./app.module";
import { EngineConfigService } from "./common/config";
import { InvalidInputError } from "./common/errors";
import { InMemoryMatchStore } from "./modules/ingestion";
import { PipelineService } from "./modules/pipeline";

const logger = new Logger("Bootstrap");

async function loadMatchFile(path: string): Promise<unknown[]> {
  const parsed: unknown = JSON.parse(await readFile(path, "utf8"));
  if (!Array.isArray(parsed)) {
    throw new InvalidInputError(`${path} must contain a JSON array of match records`, "path");
  }
  return parsed;
}

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ["log", "warn", "error"],
  });

  try {
    const config = app.get(EngineConfigService);
    const path = process.argv[2] ?? config.getSnapshotPath();
    if (!path) {
      throw new InvalidInputError("No match file given: pass a path or set MATCH_SNAPSHOT_PATH");
    }

    const records = await loadMatchFile(path);
    app.get(InMemoryMatchStore).replace(records);
    logger.log(`Loaded ${records.length} match records from ${path}`);

    const summary = await app.get(PipelineService).run();
    process.stdout.write(`${JSON.stringify(summary, null, 2)}\n`);
  } finally {
    await app.close();
  }
}

bootstrap().catch((error) => {
  logger.error(`Run failed: ${error}`);
  process.exit(1);
});
