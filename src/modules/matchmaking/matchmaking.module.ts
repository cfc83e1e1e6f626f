import { Module, type Provider } from '@nestjs/common';
import { MATCH_STRATEGY } from './match-strategy';
import { MATCHMAKING_CONFIG, createMatchmakingConfig } from './matchmaking-config';
import { MatchmakingService } from './matchmaking.service';
import { PLAYER_QUEUE } from './player-queue';
import { InMemoryPlayerQueue } from './storage/inmemory-player-queue';
import { RatingWindowStrategy } from './strategies/rating-window.strategy';

const providers: Provider[] = [
  {
    provide: MATCHMAKING_CONFIG,
    useFactory: () => createMatchmakingConfig(),
  },
  MatchmakingService,
  {
    provide: PLAYER_QUEUE,
    useClass: InMemoryPlayerQueue,
  },
  {
    provide: MATCH_STRATEGY,
    useClass: RatingWindowStrategy,
  },
];

/** Matchmaking module: in-memory player queue + rating-window strategy. */
@Module({
  providers,
  exports: [MatchmakingService],
})
export class MatchmakingModule {}
