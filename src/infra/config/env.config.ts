import type { LogLevel } from '@nestjs/common';

/**
 * Centralized environment configuration.
 * All env keys and defaults in one place. Works with .env (local) and injected env.
 */

/** Env key constants (for reference and deployment manifests). */
export const EnvKeys = {
  MATCHMAKING_MAX_RATING_DISTANCE: 'MATCHMAKING_MAX_RATING_DISTANCE',
  SIMULATION_JOIN_RATE_PER_MINUTE: 'SIMULATION_JOIN_RATE_PER_MINUTE',
  SIMULATION_DURATION_SECONDS: 'SIMULATION_DURATION_SECONDS',
  SIMULATION_SEED: 'SIMULATION_SEED',
  LOG_LEVEL: 'LOG_LEVEL',
} as const;

/** Lowest-to-highest verbosity, as Nest names them. */
const LOG_LEVEL_ORDER: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

function getEnvInt(key: string, defaultValue: number): number {
  const v = process.env[key];
  if (v == null || v.trim() === '') return defaultValue;
  const n = parseInt(v, 10);
  return Number.isNaN(n) ? defaultValue : n;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const v = process.env[key];
  if (v == null || v.trim() === '') return defaultValue;
  const n = parseFloat(v);
  return Number.isNaN(n) ? defaultValue : n;
}

/** Max rating spread allowed inside one match. Negative values are rejected downstream. */
export function getMatchmakingMaxRatingDistance(): number {
  return getEnvInt(EnvKeys.MATCHMAKING_MAX_RATING_DISTANCE, 200);
}

/** Simulated arrivals per minute. */
export function getSimulationJoinRatePerMinute(): number {
  return getEnvNumber(EnvKeys.SIMULATION_JOIN_RATE_PER_MINUTE, 50);
}

/** Simulated time window (seconds) over which arrivals are spread. */
export function getSimulationDurationSeconds(): number {
  return getEnvNumber(EnvKeys.SIMULATION_DURATION_SECONDS, 240);
}

/**
 * Seed for the arrival generator.
 * Unset means 42; an explicitly empty value means unseeded (undefined).
 */
export function getSimulationSeed(): number | undefined {
  const v = process.env[EnvKeys.SIMULATION_SEED];
  if (v == null) return 42;
  if (v.trim() === '') return undefined;
  const n = parseInt(v, 10);
  return Number.isNaN(n) ? 42 : n;
}

/** Enabled Nest log levels for LOG_LEVEL (everything at or above it). */
export function getLogLevels(): LogLevel[] {
  const raw = process.env[EnvKeys.LOG_LEVEL]?.trim().toLowerCase() ?? 'log';
  const idx = LOG_LEVEL_ORDER.findIndex((l) => l === raw);
  return LOG_LEVEL_ORDER.slice(0, idx < 0 ? LOG_LEVEL_ORDER.indexOf('log') + 1 : idx + 1);
}
