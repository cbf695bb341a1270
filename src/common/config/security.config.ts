import type { FastifyHelmetOptions } from '@fastify/helmet';
import { CustomLoggerService } from '../services/logger.service';

export class SecurityConfigService {
  private static logger = (() => {
    const logger = new CustomLoggerService();
    logger.setContext('SecurityConfig');
    return logger;
  })();

  /** JSON and event-stream API only; nothing is rendered in a browser. */
  static getHelmetOptions(): FastifyHelmetOptions {
    return {
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'none'"],
          frameAncestors: ["'none'"],
          baseUri: ["'none'"],
          formAction: ["'none'"],
        },
      },
      crossOriginEmbedderPolicy: false,
      crossOriginResourcePolicy: { policy: 'cross-origin' },
      frameguard: { action: 'deny' },
      hsts: {
        maxAge: 31536000,
        includeSubDomains: true,
        preload: true,
      },
      referrerPolicy: { policy: 'no-referrer' },
    };
  }

  static validateSecurityConfig(): void {
    const isProduction = process.env.NODE_ENV === 'production';

    if (isProduction && !process.env.JWT_SECRET) {
      throw new Error('JWT_SECRET environment variable is required in production');
    }

    this.logger.log('Security configuration validated', {
      environment: process.env.NODE_ENV,
    });
  }
}
