import { Inject, Injectable, Logger } from '@nestjs/common';
import { ArrivalOutcome, Match } from './match';
import { MATCH_STRATEGY, MatchStrategy } from './match-strategy';
import { MATCHMAKING_CONFIG, MatchmakingConfig } from './matchmaking-config';
import { QueueConsistencyError } from './matchmaking-errors';
import { Player } from './player';
import { PLAYER_QUEUE, PlayerQueue } from './player-queue';
import { SerialExecutor } from './serial-executor';

/**
 * Core matchmaking service.
 * Every operation touching the queue runs through one SerialExecutor, so a
 * selection's snapshot and its removal never interleave with another insert
 * or removal.
 */
@Injectable()
export class MatchmakingService {
  private readonly logger = new Logger(MatchmakingService.name);
  private readonly executor = new SerialExecutor();
  private matchCounter = 0;
  private clock = 0;

  constructor(
    @Inject(PLAYER_QUEUE) private readonly queue: PlayerQueue,
    @Inject(MATCH_STRATEGY) private readonly strategy: MatchStrategy,
    @Inject(MATCHMAKING_CONFIG) private readonly config: MatchmakingConfig,
  ) {}

  /** Adds a player to the queue. Always succeeds. */
  insert(rating: number, form: number, joinTime: number): Promise<Player> {
    return this.executor.run(() => this.insertUnlocked(rating, form, joinTime));
  }

  /**
   * Tries to form one match from the current queue.
   * Returns null when none is formable; otherwise the matched players are already removed.
   */
  attemptMatch(): Promise<Match | null> {
    return this.executor.run(() => this.matchUnlocked());
  }

  /**
   * Insert followed by one match attempt, as a single critical section.
   * Matches are formed in the order of the arrivals that trigger them.
   */
  submitArrival(
    rating: number,
    form: number,
    joinTime: number,
  ): Promise<ArrivalOutcome> {
    return this.executor.run(async () => {
      const player = await this.insertUnlocked(rating, form, joinTime);
      const match = await this.matchUnlocked();
      return { player, match };
    });
  }

  queueSize(): Promise<number> {
    return this.executor.run(() => this.queue.size());
  }

  /** Snapshot of waiting players (introspection only). */
  listWaiting(): Promise<Player[]> {
    return this.executor.run(() => this.queue.snapshot());
  }

  matchCount(): number {
    return this.matchCounter;
  }

  /** Latest joinTime seen; used as "now" for wait-time reporting. */
  currentTime(): number {
    return this.clock;
  }

  private async insertUnlocked(
    rating: number,
    form: number,
    joinTime: number,
  ): Promise<Player> {
    const player = await this.queue.insert(rating, form, joinTime);
    if (Number.isFinite(joinTime)) {
      this.clock = Math.max(this.clock, joinTime);
    }
    this.logger.debug(
      `player ${player.id} queued (rating=${rating}, form=${form}, t=${joinTime.toFixed(2)})`,
    );
    return player;
  }

  private async matchUnlocked(): Promise<Match | null> {
    const waiting = await this.queue.snapshot();
    const proposal = this.strategy.selectMatch(waiting, this.config);
    if (!proposal) return null;

    const matched = [...proposal.teamA, ...proposal.teamB];
    const removed = await this.queue.remove(matched);
    if (removed !== matched.length) {
      const err = new QueueConsistencyError(matched.length, removed);
      this.logger.error(err.message);
      throw err;
    }

    this.matchCounter += 1;
    const match: Match = {
      matchId: this.matchCounter,
      teamA: proposal.teamA,
      teamB: proposal.teamB,
      balanceScore: proposal.balanceScore,
      ratingSpan: proposal.ratingSpan,
      teamFormSums: { teamA: proposal.formSumA, teamB: proposal.formSumB },
      formedAt: this.clock,
    };
    this.logger.log(
      `match #${match.matchId} formed: balance=${match.balanceScore.toFixed(2)}, ` +
        `ratingSpan=${match.ratingSpan}, remaining=${waiting.length - matched.length}`,
    );
    return match;
  }
}
