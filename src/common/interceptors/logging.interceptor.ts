import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  HttpException,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { tap, catchError } from 'rxjs/operators';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { DomainError } from '../../shared/domain/errors/domain.errors';
import type { AuthenticatedUser } from '../interfaces/authenticated-user.interface';
import { CustomLoggerService } from '../services/logger.service';
import { MetricsService } from '../services/metrics.service';
import { DOMAIN_ERROR_STATUS } from '../filters/http-exception.filter';

interface RequestWithUser extends FastifyRequest {
  user?: AuthenticatedUser;
  requestId?: string;
}

const SLOW_REQUEST_MS = 1000;

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new CustomLoggerService();

  constructor(private readonly metrics: MetricsService) {
    this.logger.setContext('HTTP');
  }

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<RequestWithUser>();
    const reply = context.switchToHttp().getResponse<FastifyReply>();
    const startTime = Date.now();

    const { method, url, ip } = request;
    const route = request.routeOptions.url ?? url;
    const requestId = request.requestId;
    const userId = request.user?.id;
    const userAgent = request.headers['user-agent'] ?? 'unknown';

    this.logger.logRequest({ requestId, method, url, ip, userAgent, userId });
    this.metrics.incrementHttpRequestsInFlight();

    // Event streams emit many times; the request is counted once
    let finished = false;
    const finish = (statusCode: number, extra: Record<string, unknown> = {}): void => {
      if (finished) return;
      finished = true;
      const responseTime = Date.now() - startTime;
      this.metrics.decrementHttpRequestsInFlight();
      this.metrics.recordHttpRequest(method, route, statusCode, responseTime);

      this.logger.logResponse({
        requestId,
        method,
        url,
        statusCode,
        responseTime,
        userId,
        ...extra,
      });

      if (responseTime > SLOW_REQUEST_MS) {
        this.logger.logPerformance(`${method} ${route}`, responseTime, { requestId, statusCode });
      }
    };

    return next.handle().pipe(
      tap(() => finish(reply.statusCode)),
      catchError((error: unknown) => {
        const statusCode = error instanceof DomainError
          ? DOMAIN_ERROR_STATUS[error.code]
          : error instanceof HttpException ? error.getStatus() : 500;
        finish(statusCode, {
          error: error instanceof Error ? error.message : String(error),
          code: error instanceof DomainError ? error.code : undefined,
        });
        throw error;
      }),
    );
  }
}
