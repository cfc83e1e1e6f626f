import { Module } from '@nestjs/common';
import { MatchmakingModule } from '../matchmaking/matchmaking.module';
import { SimulationService } from './simulation.service';

@Module({
  imports: [MatchmakingModule],
  providers: [SimulationService],
  exports: [SimulationService],
})
export class SimulationModule {}
