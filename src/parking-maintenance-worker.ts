import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { ParkingMaintenanceService } from './bookings/parking-maintenance.service';
import { PARKING_CONFIG_DEFAULTS, type ParkingConfig } from './common/config/parking.config';
import { CustomLoggerService } from './common/services/logger.service';
import { toError } from './common/utils/to-error';

/**
 * Periodic upkeep: marks overdue confirmed bookings as no-shows, then
 * reconciles capacity counters, slot holds and listing flags.
 */
async function main() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: false,
  });

  const maintenance = app.get(ParkingMaintenanceService);
  const logger = app.get(CustomLoggerService);
  const { maintenanceIntervalSeconds } =
    app.get(ConfigService).get<ParkingConfig>('parking') ?? PARKING_CONFIG_DEFAULTS;

  let running = false;
  const runMaintenance = async () => {
    if (running) return;
    running = true;
    try {
      await maintenance.runOnce();
    } catch (error) {
      logger.logError(toError(error), {
        method: 'runMaintenance',
        workerType: 'parking-maintenance',
      });
    } finally {
      running = false;
    }
  };

  await runMaintenance();

  const intervalId = setInterval(() => void runMaintenance(), maintenanceIntervalSeconds * 1000);

  const shutdown = async () => {
    logger.log('Parking maintenance worker shutting down');
    clearInterval(intervalId);
    await app.close();
    process.exit(0);
  };

  process.on('SIGINT', () => {
    void shutdown();
  });
  process.on('SIGTERM', () => {
    void shutdown();
  });
  process.on('uncaughtException', (error) => {
    logger.logError(error, {
      method: 'uncaughtException',
      workerType: 'parking-maintenance',
    });
    process.exit(1);
  });
  process.on('unhandledRejection', (reason) => {
    logger.logError(toError(reason), {
      method: 'unhandledRejection',
      workerType: 'parking-maintenance',
    });
    process.exit(1);
  });

  logger.log(`Parking maintenance worker running every ${maintenanceIntervalSeconds} seconds`);
}

main().catch((error: unknown) => {
  const logger = new CustomLoggerService();
  logger.setContext('ParkingMaintenanceWorker');
  logger.logError(toError(error), { stage: 'startup' });
  process.exit(1);
});
