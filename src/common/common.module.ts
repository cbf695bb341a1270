import { Module } from '@nestjs/common';
import { ThrottlerModule } from '@nestjs/throttler';
import { CustomLoggerService } from './services/logger.service';
import { MetricsService } from './services/metrics.service';
import { MetricsController } from './controllers/metrics.controller';
import { LoggingInterceptor } from './interceptors/logging.interceptor';
import { DatabaseModule } from '../database/database.module';

@Module({
  imports: [
    ThrottlerModule.forRoot([
      {
        name: 'default',
        ttl: 60000,
        limit: 200,
      },
    ]),
    DatabaseModule,
  ],
  controllers: [MetricsController],
  providers: [
    CustomLoggerService,
    MetricsService,
    LoggingInterceptor,
  ],
  exports: [
    CustomLoggerService,
    MetricsService,
    LoggingInterceptor,
    ThrottlerModule,
    DatabaseModule,
  ],
})
export class CommonModule {}
