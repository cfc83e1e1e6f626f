import { Injectable } from '@nestjs/common';
import { Player } from '../player';
import { PlayerQueue } from '../player-queue';

/**
 * In-memory implementation of PlayerQueue.
 * Queue state is lost on restart. Ids start at 1 and are never reused.
 */
@Injectable()
export class InMemoryPlayerQueue implements PlayerQueue {
  private readonly players = new Map<number, Player>();
  private playerCounter = 0;

  async insert(rating: number, form: number, joinTime: number): Promise<Player> {
    this.playerCounter += 1;
    const player: Player = Object.freeze({
      id: this.playerCounter,
      rating,
      form,
      joinTime,
    });
    this.players.set(player.id, player);
    return player;
  }

  async remove(players: readonly Player[]): Promise<number> {
    let removed = 0;
    for (const p of players) {
      if (this.players.delete(p.id)) removed++;
    }
    return removed;
  }

  async size(): Promise<number> {
    return this.players.size;
  }

  async snapshot(): Promise<Player[]> {
    return Array.from(this.players.values());
  }
}
