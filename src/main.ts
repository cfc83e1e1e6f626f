import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import {
  getLogLevels,
  getSimulationDurationSeconds,
  getSimulationJoinRatePerMinute,
  getSimulationSeed,
} from './infra/config/env.config';
import { SimulationService } from './modules/simulation/simulation.service';

/**
 * Bootstrap a standalone application context (no HTTP listener) and run one simulation.
 */
async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: getLogLevels(),
  });
  try {
    const durationSeconds = getSimulationDurationSeconds();
    await app.get(SimulationService).run({
      playerCount: Math.floor((getSimulationJoinRatePerMinute() * durationSeconds) / 60),
      durationSeconds,
      seed: getSimulationSeed(),
    });
  } finally {
    await app.close();
  }
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').fatal(err instanceof Error ? (err.stack ?? err.message) : String(err));
  process.exitCode = 1;
});
