import { Player } from './player';

/** Players per team. */
export const TEAM_SIZE = 5;

/** Players per match (two full teams). */
export const MATCH_SIZE = TEAM_SIZE * 2;

/** A formed 5v5 match. Its players have already left the queue. */
export interface Match {
  matchId: number;
  teamA: Player[];
  teamB: Player[];
  /** |avg form A - avg form B|; lower is better. */
  balanceScore: number;
  ratingSpan: number;
  teamFormSums: { teamA: number; teamB: number };
  /** Service clock when the match formed (latest joinTime seen). */
  formedAt: number;
}

/** Result of one arrival: the inserted player and the match it triggered, if any. */
export interface ArrivalOutcome {
  player: Player;
  match: Match | null;
}
