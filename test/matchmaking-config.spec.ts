import { EnvKeys } from '../src/infra/config/env.config';
import { createMatchmakingConfig } from '../src/modules/matchmaking/matchmaking-config';
import { InvalidMatchmakingConfigError } from '../src/modules/matchmaking/matchmaking-errors';

describe('createMatchmakingConfig', () => {
  const saved = process.env[EnvKeys.MATCHMAKING_MAX_RATING_DISTANCE];

  afterEach(() => {
    if (saved === undefined) {
      delete process.env[EnvKeys.MATCHMAKING_MAX_RATING_DISTANCE];
    } else {
      process.env[EnvKeys.MATCHMAKING_MAX_RATING_DISTANCE] = saved;
    }
  });

  it('defaults maxRatingDistance to 200', () => {
    delete process.env[EnvKeys.MATCHMAKING_MAX_RATING_DISTANCE];
    expect(createMatchmakingConfig()).toEqual({ maxRatingDistance: 200 });
  });

  it('reads maxRatingDistance from env', () => {
    process.env[EnvKeys.MATCHMAKING_MAX_RATING_DISTANCE] = '350';
    expect(createMatchmakingConfig().maxRatingDistance).toBe(350);
  });

  it('prefers explicit overrides over env', () => {
    process.env[EnvKeys.MATCHMAKING_MAX_RATING_DISTANCE] = '350';
    expect(createMatchmakingConfig({ maxRatingDistance: 0 }).maxRatingDistance).toBe(0);
  });

  it('rejects a negative distance', () => {
    expect(() => createMatchmakingConfig({ maxRatingDistance: -1 })).toThrow(
      InvalidMatchmakingConfigError,
    );
  });

  it('rejects a negative distance coming from env', () => {
    process.env[EnvKeys.MATCHMAKING_MAX_RATING_DISTANCE] = '-50';
    expect(() => createMatchmakingConfig()).toThrow(
      'Invalid matchmaking config: maxRatingDistance must be >= 0, got -50',
    );
  });

  it('rejects a fractional distance', () => {
    let caught: unknown;
    try {
      createMatchmakingConfig({ maxRatingDistance: 12.5 });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InvalidMatchmakingConfigError);
    expect(caught).toHaveProperty('name', 'InvalidMatchmakingConfigError');
  });
});
