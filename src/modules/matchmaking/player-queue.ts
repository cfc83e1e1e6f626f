import { Player } from './player';

/** NestJS injection token for PlayerQueue. */
export const PLAYER_QUEUE = 'PlayerQueue';

/**
 * Waiting-player store (insert, remove by identity, snapshot).
 * No locking and no business logic; MatchmakingService serializes access.
 */
export interface PlayerQueue {
  /** Allocates a fresh id and adds the player. Never fails. */
  insert(rating: number, form: number, joinTime: number): Promise<Player>;
  /**
   * Removes the given players by id. Absent ids are skipped.
   * Returns how many were actually removed.
   */
  remove(players: readonly Player[]): Promise<number>;
  size(): Promise<number>;
  /** Copy of waiting players in insertion order. */
  snapshot(): Promise<Player[]>;
}
