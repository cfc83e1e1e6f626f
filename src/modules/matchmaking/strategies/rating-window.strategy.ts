import { Injectable } from '@nestjs/common';
import { MATCH_SIZE } from '../match';
import { MatchProposal, MatchStrategy } from '../match-strategy';
import { MatchmakingConfig } from '../matchmaking-config';
import { Player } from '../player';
import { balanceTeams } from '../team-balancer';

/** Lowest rating first; equal ratings fall back to lower id. */
export function compareByRating(a: Player, b: Player): number {
  return a.rating - b.rating || a.id - b.id;
}

/**
 * Rating-window strategy: slide over rating-sorted players, take each run of
 * MATCH_SIZE consecutive players whose spread fits maxRatingDistance, balance it,
 * and keep the lowest balance score (earliest window wins ties).
 *
 * O(n * MATCH_SIZE log MATCH_SIZE) per call after the initial sort; fine for small live queues.
 */
@Injectable()
export class RatingWindowStrategy implements MatchStrategy {
  selectMatch(
    waiting: readonly Player[],
    config: MatchmakingConfig,
  ): MatchProposal | null {
    if (waiting.length < MATCH_SIZE) return null;

    const sorted = [...waiting].sort(compareByRating);
    let best: MatchProposal | null = null;

    for (let i = 0; i + MATCH_SIZE <= sorted.length; i++) {
      const window = this.collectWindow(sorted, i, config.maxRatingDistance);
      if (window.length !== MATCH_SIZE) continue;

      const ratingSpan = window[window.length - 1].rating - window[0].rating;
      if (ratingSpan > config.maxRatingDistance) continue;

      const split = balanceTeams(window);
      if (best === null || split.balanceScore < best.balanceScore) {
        best = {
          teamA: split.teamA,
          teamB: split.teamB,
          balanceScore: split.balanceScore,
          ratingSpan,
          formSumA: split.formSumA,
          formSumB: split.formSumB,
        };
        if (best.balanceScore === 0) break;
      }
    }
    return best;
  }

  /** Consecutive players from `start` within maxRatingDistance of sorted[start], capped at MATCH_SIZE. */
  private collectWindow(
    sorted: readonly Player[],
    start: number,
    maxRatingDistance: number,
  ): Player[] {
    const first = sorted[start];
    const window: Player[] = [];
    for (let j = start; j < sorted.length && window.length < MATCH_SIZE; j++) {
      if (sorted[j].rating - first.rating > maxRatingDistance) break;
      window.push(sorted[j]);
    }
    return window;
  }
}
