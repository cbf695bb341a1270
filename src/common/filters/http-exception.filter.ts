import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { ThrottlerException } from '@nestjs/throttler';
import { DomainError, type DomainErrorCode } from '../../shared/domain/errors/domain.errors';
import type { AuthenticatedUser } from '../interfaces/authenticated-user.interface';
import { CustomLoggerService } from '../services/logger.service';

export interface ErrorResponse {
  code: string;
  message: string;
  details?: unknown;
  requestId: string;
  timestamp: string;
  path: string;
}

interface RequestWithUser extends FastifyRequest {
  user?: AuthenticatedUser;
  requestId?: string;
}

export const DOMAIN_ERROR_STATUS: Record<DomainErrorCode, HttpStatus> = {
  NOT_AUTHENTICATED: HttpStatus.UNAUTHORIZED,
  NOT_FOUND: HttpStatus.NOT_FOUND,
  NO_CAPACITY: HttpStatus.CONFLICT,
  INVALID_DATA: HttpStatus.INTERNAL_SERVER_ERROR,
  PARTIAL_FAILURE: HttpStatus.SERVICE_UNAVAILABLE,
  STALE_TRANSITION: HttpStatus.CONFLICT,
  INVALID_TRANSITION: HttpStatus.CONFLICT,
  SLOT_UNAVAILABLE: HttpStatus.CONFLICT,
  NOT_PERMITTED: HttpStatus.FORBIDDEN,
  INVALID_REQUEST: HttpStatus.BAD_REQUEST,
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new CustomLoggerService();

  constructor() {
    this.logger.setContext('HttpExceptionFilter');
  }

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const reply = ctx.getResponse<FastifyReply>();
    const request = ctx.getRequest<RequestWithUser>();

    const header = request.headers['x-request-id'];
    const requestId = request.requestId ?? (typeof header === 'string' ? header : 'unknown');
    const path = request.url;

    const { status, code, message, details } = this.describe(exception);

    const errorResponse: ErrorResponse = {
      code,
      message,
      details,
      requestId,
      timestamp: new Date().toISOString(),
      path,
    };

    const logContext = {
      requestId,
      path,
      method: request.method,
      userId: request.user?.id,
    };

    if (status >= 500) {
      if (exception instanceof Error) {
        this.logger.logError(exception, { ...logContext, code });
      } else {
        this.logger.error(`HTTP ${status} ${code}: ${String(exception)}`, undefined, logContext);
      }
    } else if (status === HttpStatus.TOO_MANY_REQUESTS || status === HttpStatus.UNAUTHORIZED) {
      this.logger.logSecurityEvent(code, { ...logContext, ip: request.ip });
    } else {
      this.logger.warn(`HTTP ${status} ${code}: ${message}`, logContext);
    }

    void reply.status(status).send(errorResponse);
  }

  private describe(exception: unknown): { status: number; code: string; message: string; details?: unknown } {
    if (exception instanceof DomainError) {
      const status = DOMAIN_ERROR_STATUS[exception.code];
      return {
        status,
        code: exception.code,
        // Corrupt rows and lost commits are not explained to clients
        message: status >= 500 ? this.publicMessage(exception.code) : exception.message,
        details: status >= 500 ? undefined : exception.details,
      };
    }

    if (exception instanceof ThrottlerException) {
      return {
        status: HttpStatus.TOO_MANY_REQUESTS,
        code: 'RATE_LIMITED',
        message: 'Rate limit exceeded',
      };
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const body = exception.getResponse();
      const message = isRecord(body) && typeof body.message === 'string' ? body.message : exception.message;
      return { status, code: this.getErrorCode(status), message };
    }

    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      code: 'INTERNAL_ERROR',
      message: 'Internal server error',
    };
  }

  private publicMessage(code: DomainErrorCode): string {
    return code === 'PARTIAL_FAILURE'
      ? 'The operation may not have completed; please check its result before retrying'
      : 'Stored data could not be read';
  }

  private getErrorCode(status: number): string {
    switch (status) {
      case HttpStatus.BAD_REQUEST:
        return 'INVALID_REQUEST';
      case HttpStatus.UNAUTHORIZED:
        return 'NOT_AUTHENTICATED';
      case HttpStatus.FORBIDDEN:
        return 'NOT_PERMITTED';
      case HttpStatus.NOT_FOUND:
        return 'NOT_FOUND';
      case HttpStatus.CONFLICT:
        return 'CONFLICT';
      case HttpStatus.TOO_MANY_REQUESTS:
        return 'RATE_LIMITED';
      default:
        return status >= 500 ? 'INTERNAL_ERROR' : 'UNKNOWN_ERROR';
    }
  }
}
