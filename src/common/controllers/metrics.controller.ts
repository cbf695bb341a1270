import { Controller, Get, HttpCode, HttpStatus, Inject, Res } from '@nestjs/common';
import { SkipThrottle } from '@nestjs/throttler';
import type { FastifyReply } from 'fastify';
import type { DatabaseClient } from '../../database/database.client';
import { DATABASE_CLIENT } from '../../database/database.module';
import { Public } from '../decorators/public.decorator';
import { MetricsService } from '../services/metrics.service';
import { CustomLoggerService } from '../services/logger.service';
import { toError } from '../utils/to-error';

export interface HealthResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
  checks: {
    database: { status: 'pass' | 'fail'; error?: string };
  };
}

@Controller()
@Public()
@SkipThrottle()
export class MetricsController {
  private readonly logger = new CustomLoggerService();

  constructor(
    private readonly metricsService: MetricsService,
    @Inject(DATABASE_CLIENT) private readonly db: DatabaseClient,
  ) {
    this.logger.setContext('MetricsController');
  }

  @Get('metrics')
  async getMetrics(@Res() reply: FastifyReply): Promise<void> {
    const metrics = await this.metricsService.getMetrics();
    await reply.header('Content-Type', this.metricsService.contentType).send(metrics);
  }

  @Get('health')
  @HttpCode(HttpStatus.OK)
  async getHealth(): Promise<HealthResponse> {
    const database: HealthResponse['checks']['database'] = { status: 'pass' };
    try {
      await this.db.query('SELECT 1');
    } catch (error) {
      const cause = toError(error);
      this.logger.logError(cause, { endpoint: '/health' });
      database.status = 'fail';
      database.error = cause.message;
    }

    return {
      status: database.status === 'pass' ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      checks: { database },
    };
  }
}
