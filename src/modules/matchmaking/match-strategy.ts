import { MatchmakingConfig } from './matchmaking-config';
import { Player } from './player';

/** Best match found in a snapshot, before any queue mutation. */
export interface MatchProposal {
  teamA: Player[];
  teamB: Player[];
  balanceScore: number;
  ratingSpan: number;
  formSumA: number;
  formSumB: number;
}

/** NestJS injection token for MatchStrategy. */
export const MATCH_STRATEGY = 'MatchStrategy';

/** Match strategy interface (decides which waiting players form the next match). */
export interface MatchStrategy {
  /**
   * Returns the best match in `waiting`, or null when none is eligible.
   * Pure: must not mutate `waiting`.
   */
  selectMatch(
    waiting: readonly Player[],
    config: MatchmakingConfig,
  ): MatchProposal | null;
}
