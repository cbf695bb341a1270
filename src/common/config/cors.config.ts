import type { FastifyCorsOptions } from '@fastify/cors';
import { CustomLoggerService } from '../services/logger.service';

export class CorsConfig {
  private static logger = (() => {
    const logger = new CustomLoggerService();
    logger.setContext('CORS');
    return logger;
  })();

  static getCorsOptions(): FastifyCorsOptions {
    const isDevelopment = process.env.NODE_ENV === 'development';
    const allowedOrigins = CorsConfig.configuredOrigins();

    this.logger.log('CORS configured with origins', {
      environment: process.env.NODE_ENV,
      allowedOrigins,
    });

    return {
      origin: (origin, callback) => {
        // Native clients send no Origin header
        if (!origin || allowedOrigins.includes(origin)) {
          callback(null, true);
          return;
        }

        if (isDevelopment && (origin.startsWith('http://localhost:') || origin.startsWith('http://127.0.0.1:'))) {
          callback(null, true);
          return;
        }

        this.logger.logSecurityEvent('CORS_ORIGIN_BLOCKED', {
          origin,
          environment: process.env.NODE_ENV,
        });
        callback(new Error(`Origin ${origin} not allowed by CORS policy`), false);
      },
      methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
      allowedHeaders: [
        'Origin',
        'Content-Type',
        'Accept',
        'Authorization',
        'X-Request-Id',
        'Last-Event-ID',
      ],
      exposedHeaders: ['X-Request-Id'],
      credentials: true,
      maxAge: 86400,
    };
  }

  static validateCorsConfig(): void {
    if (process.env.NODE_ENV !== 'production') {
      return;
    }

    const origins = CorsConfig.configuredOrigins();
    if (origins.length === 0) {
      throw new Error('CORS_ALLOWED_ORIGINS environment variable is required in production');
    }
    if (origins.some(origin => origin.startsWith('http://'))) {
      this.logger.warn('Insecure HTTP origins detected in production CORS configuration', { origins });
    }
  }

  private static configuredOrigins(): string[] {
    return (process.env.CORS_ALLOWED_ORIGINS ?? '')
      .split(',')
      .map(origin => origin.trim())
      .filter(origin => origin.length > 0);
  }
}
