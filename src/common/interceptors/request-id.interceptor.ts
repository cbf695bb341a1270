import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import type { FastifyRequest, FastifyReply } from 'fastify';
import { randomUUID } from 'crypto';

interface RequestWithId extends FastifyRequest {
  requestId?: string;
}

@Injectable()
export class RequestIdInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<RequestWithId>();
    const reply = context.switchToHttp().getResponse<FastifyReply>();

    const header = request.headers['x-request-id'];
    const headerValue = Array.isArray(header) ? header[0] : header;

    const requestId = typeof headerValue === 'string' && headerValue.length > 0
      ? headerValue
      : randomUUID();

    void reply.header('X-Request-Id', requestId);
    request.requestId = requestId;

    return next.handle();
  }
}
