import { Module } from '@nestjs/common';
import { ConfigModule } from './infra/config/config.module';
import { MatchmakingModule } from './modules/matchmaking/matchmaking.module';
import { SimulationModule } from './modules/simulation/simulation.module';

/** Root application module. ConfigModule loads and validates .env first. */
@Module({
  imports: [ConfigModule, MatchmakingModule, SimulationModule],
})
export class AppModule {}
