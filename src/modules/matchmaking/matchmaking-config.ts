import { getMatchmakingMaxRatingDistance } from '../../infra/config/env.config';
import { InvalidMatchmakingConfigError } from './matchmaking-errors';

/** NestJS injection token for MatchmakingConfig. */
export const MATCHMAKING_CONFIG = 'MatchmakingConfig';

/** Matchmaking parameters. */
export interface MatchmakingConfig {
  /** Max allowed `max(rating) - min(rating)` within a match. */
  maxRatingDistance: number;
}

/** Optional overrides when building MatchmakingConfig. */
export interface MatchmakingConfigOverrides {
  maxRatingDistance?: number;
}

/**
 * Build and validate MatchmakingConfig. Unset fields fall back to env.
 * @throws InvalidMatchmakingConfigError when maxRatingDistance is negative or fractional
 */
export function createMatchmakingConfig(
  overrides?: MatchmakingConfigOverrides,
): MatchmakingConfig {
  const maxRatingDistance =
    overrides?.maxRatingDistance ?? getMatchmakingMaxRatingDistance();
  if (!Number.isInteger(maxRatingDistance)) {
    throw new InvalidMatchmakingConfigError(
      `maxRatingDistance must be an integer, got ${maxRatingDistance}`,
    );
  }
  if (maxRatingDistance < 0) {
    throw new InvalidMatchmakingConfigError(
      `maxRatingDistance must be >= 0, got ${maxRatingDistance}`,
    );
  }
  return { maxRatingDistance };
}
