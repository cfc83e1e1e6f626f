import { plainToInstance } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  Matches,
  Min,
  validateSync,
} from 'class-validator';

/**
 * Shape of the environment accepted at startup.
 * Every key is optional; getters in env.config supply the defaults.
 */
export class EnvironmentVariables {
  @IsOptional()
  @IsInt()
  @Min(0)
  MATCHMAKING_MAX_RATING_DISTANCE?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  SIMULATION_JOIN_RATE_PER_MINUTE?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  SIMULATION_DURATION_SECONDS?: number;

  /** Empty string is allowed and means "unseeded". */
  @IsOptional()
  @Matches(/^(-?\d+)?$/, { message: 'SIMULATION_SEED must be an integer or empty' })
  SIMULATION_SEED?: string;

  @IsOptional()
  @IsIn(['fatal', 'error', 'warn', 'log', 'debug', 'verbose'])
  LOG_LEVEL?: string;
}

const NUMERIC_KEYS = [
  'MATCHMAKING_MAX_RATING_DISTANCE',
  'SIMULATION_JOIN_RATE_PER_MINUTE',
  'SIMULATION_DURATION_SECONDS',
] as const;

/**
 * ConfigModule `validate` hook.
 * Numeric keys are converted before validation; blank values count as unset.
 */
export function validateEnv(config: Record<string, unknown>): Record<string, unknown> {
  const plain: Record<string, unknown> = { ...config };
  for (const key of NUMERIC_KEYS) {
    const v = plain[key];
    if (typeof v === 'string') {
      plain[key] = v.trim() === '' ? undefined : Number(v);
    }
  }
  if (typeof plain.LOG_LEVEL === 'string') {
    plain.LOG_LEVEL = plain.LOG_LEVEL.trim().toLowerCase();
  }

  const env = plainToInstance(EnvironmentVariables, plain);
  const errors = validateSync(env, { skipMissingProperties: false });
  if (errors.length > 0) {
    const details = errors
      .map((e) => `${e.property}: ${Object.values(e.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return config;
}
