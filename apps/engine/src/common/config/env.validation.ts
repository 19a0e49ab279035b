/**
 * Environment validation for ConfigModule.forRoot({ validate })
 *
 * Unknown variables pass through untouched; known ones are converted and
 * checked so that a bad threshold fails at boot instead of mid-run.
 */

import { plainToInstance } from "class-transformer";
import {
  IsIn,
  IsInt,
  IsISO8601,
  IsOptional,
  IsString,
  Matches,
  Min,
  validateSync,
} from "class-validator";
import { TimeWindowKeySchema } from "@nation-ladder/types";

export class EnvironmentVariables {
  @IsOptional()
  @IsIn(TimeWindowKeySchema.options)
  RANKING_DEFAULT_WINDOW?: string;

  @IsOptional()
  @Matches(/^[A-Za-z]{2,8}(,[A-Za-z]{2,8})*$/, {
    message: "RANKING_FACTION_CODES must be a comma separated list of codes",
  })
  RANKING_FACTION_CODES?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  RANKING_MIN_PLAYER_GAMES?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  RANKING_MIN_COUNTRY_PLAYERS?: number;

  @IsOptional()
  @IsISO8601()
  RANKING_AS_OF?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  TEAM_MIN_EDGE_WEIGHT?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  TEAM_MIN_PAIR_WEIGHT?: number;

  @IsOptional()
  @IsInt()
  @Min(2)
  TEAM_MIN_ROSTER_SIZE?: number;

  @IsOptional()
  @IsInt()
  @Min(2)
  TEAM_MAX_ROSTER_SIZE?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  TEAM_MIN_TEAM_MATCHES?: number;

  @IsOptional()
  @IsString()
  MATCH_SNAPSHOT_PATH?: string;
}

export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    throw new Error(`Invalid environment configuration:\n${errors.toString()}`);
  }

  return validated;
}
