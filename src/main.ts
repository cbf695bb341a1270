import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import helmet from '@fastify/helmet';
import fastifyCors from '@fastify/cors';
import { AppModule } from './app.module';
import { DatabaseClient } from './database/database.client';
import { CustomLoggerService } from './common/services/logger.service';
import { CorsConfig } from './common/config/cors.config';
import { SecurityConfigService } from './common/config/security.config';
import { toError } from './common/utils/to-error';

async function bootstrap() {
  const logger = new CustomLoggerService();
  logger.setContext('Bootstrap');

  try {
    CorsConfig.validateCorsConfig();
    SecurityConfigService.validateSecurityConfig();

    const dbClient = await DatabaseClient.initialize();

    const nestLogger = new CustomLoggerService();
    nestLogger.setContext('NestApplication');
    const app = await NestFactory.create<NestFastifyApplication>(
      AppModule,
      new FastifyAdapter(),
      { logger: nestLogger },
    );

    app.enableShutdownHooks();

    await app.register(helmet, SecurityConfigService.getHelmetOptions());
    await app.register(fastifyCors, CorsConfig.getCorsOptions());

    const shutdown = async (signal: string) => {
      logger.log(`Received ${signal}, starting graceful shutdown...`);

      try {
        await app.close();
        await dbClient.disconnect();
        logger.log('Graceful shutdown completed');
        process.exit(0);
      } catch (error) {
        logger.logError(toError(error), { signal });
        process.exit(1);
      }
    };

    process.once('SIGINT', () => void shutdown('SIGINT'));
    process.once('SIGTERM', () => void shutdown('SIGTERM'));

    const port = process.env.PORT ?? 3000;
    await app.listen(port, '0.0.0.0');

    logger.log('Application started successfully', {
      port,
      environment: process.env.NODE_ENV,
      nodeVersion: process.version,
      database: dbClient.databaseName,
    });
  } catch (error) {
    logger.logError(toError(error), {
      context: 'bootstrap',
    });
    process.exit(1);
  }
}

process.on('unhandledRejection', (reason: unknown) => {
  const logger = new CustomLoggerService();
  logger.setContext('UnhandledRejection');
  logger.logError(toError(reason), { context: 'unhandledRejection' });
  process.exit(1);
});

process.on('uncaughtException', (error) => {
  const logger = new CustomLoggerService();
  logger.setContext('UncaughtException');
  logger.logError(error, {
    context: 'uncaughtException',
  });
  process.exit(1);
});

void bootstrap();
