/**
 * Rejected matchmaking options (e.g. negative maxRatingDistance).
 * Thrown at construction; such a config can never admit a match.
 */
export class InvalidMatchmakingConfigError extends Error {
  constructor(message: string) {
    super(`Invalid matchmaking config: ${message}`);
    this.name = 'InvalidMatchmakingConfigError';
    Object.setPrototypeOf(this, InvalidMatchmakingConfigError.prototype);
  }
}

/**
 * Selection and removal disagreed about who was queued.
 * Internal invariant violation; callers must not catch and continue.
 */
export class QueueConsistencyError extends Error {
  constructor(
    readonly expected: number,
    readonly removed: number,
  ) {
    super(`Match removal desync: selected ${expected} players but removed ${removed}`);
    this.name = 'QueueConsistencyError';
    Object.setPrototypeOf(this, QueueConsistencyError.prototype);
  }
}
