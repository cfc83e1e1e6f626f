import { Injectable, Logger } from '@nestjs/common';
import { Match, MATCH_SIZE } from '../matchmaking/match';
import { MatchmakingService } from '../matchmaking/matchmaking.service';
import { Player } from '../matchmaking/player';
import { ArrivalGeneratorOptions, generateArrivals } from './arrival-generator';

export type SimulationOptions = ArrivalGeneratorOptions;

export interface SimulationSummary {
  totalPlayers: number;
  matchesCreated: number;
  playersMatched: number;
  playersInQueue: number;
  /** Service clock after the last arrival. */
  finalTime: number;
  matches: Match[];
}

const RULE = '='.repeat(70);

/**
 * Replays random arrivals through MatchmakingService, one arrival (insert + one
 * match attempt) at a time, and narrates the run through the logger.
 */
@Injectable()
export class SimulationService {
  private readonly logger = new Logger(SimulationService.name);

  constructor(private readonly matchmaking: MatchmakingService) {}

  async run(options: SimulationOptions): Promise<SimulationSummary> {
    this.logger.log(RULE);
    this.logger.log('5v5 MATCHMAKING SIMULATION');
    this.logger.log(
      `players=${options.playerCount} duration=${options.durationSeconds}s seed=${options.seed ?? 'random'}`,
    );
    this.logger.log(RULE);

    const matches: Match[] = [];
    for (const event of generateArrivals(options)) {
      const { player, match } = await this.matchmaking.submitArrival(
        event.rating,
        event.form,
        event.arrivalTime,
      );
      this.logger.debug(
        `[t=${event.arrivalTime.toFixed(2)}s] player ${player.id} joined (rating=${player.rating}, form=${player.form})`,
      );
      if (match) {
        matches.push(match);
        this.reportMatch(match);
      }
    }

    const matchesCreated = this.matchmaking.matchCount();
    const summary: SimulationSummary = {
      totalPlayers: options.playerCount,
      matchesCreated,
      playersMatched: matchesCreated * MATCH_SIZE,
      playersInQueue: await this.matchmaking.queueSize(),
      finalTime: this.matchmaking.currentTime(),
      matches,
    };
    this.reportSummary(summary);
    return summary;
  }

  private reportMatch(match: Match): void {
    this.logger.log(
      `MATCH #${match.matchId} at t=${match.formedAt.toFixed(2)}s ` +
        `(rating span ${match.ratingSpan}, balance score ${match.balanceScore.toFixed(2)})`,
    );
    this.logger.log(`  Team A (form sum ${match.teamFormSums.teamA}):`);
    for (const p of match.teamA) this.logger.log(this.describePlayer(p, match.formedAt));
    this.logger.log(`  Team B (form sum ${match.teamFormSums.teamB}):`);
    for (const p of match.teamB) this.logger.log(this.describePlayer(p, match.formedAt));
  }

  private describePlayer(p: Player, now: number): string {
    return `    #${p.id} rating=${p.rating} form=${p.form} waited=${(now - p.joinTime).toFixed(2)}s`;
  }

  private reportSummary(summary: SimulationSummary): void {
    this.logger.log(RULE);
    this.logger.log('SIMULATION SUMMARY');
    this.logger.log(`Total players: ${summary.totalPlayers}`);
    this.logger.log(`Matches created: ${summary.matchesCreated}`);
    this.logger.log(`Players matched: ${summary.playersMatched}`);
    this.logger.log(`Players still in queue: ${summary.playersInQueue}`);
    this.logger.log(`Final simulation time: ${summary.finalTime.toFixed(2)}s`);
    this.logger.log(RULE);
  }
}
