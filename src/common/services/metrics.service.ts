import { Injectable } from '@nestjs/common';
import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

/**
 * Prometheus metrics for the HTTP surface and the booking core. Each instance
 * owns its registry so that separate application contexts never collide.
 */
@Injectable()
export class MetricsService {
  readonly registry = new Registry();

  private readonly httpRequestsTotal: Counter<string>;
  private readonly httpRequestDuration: Histogram<string>;
  private readonly httpRequestsInFlight: Gauge<string>;
  private readonly bookingTransitionsTotal: Counter<string>;
  private readonly reconciliationFindingsTotal: Counter<string>;

  constructor() {
    if (process.env.NODE_ENV !== 'test') {
      collectDefaultMetrics({ register: this.registry });
    }

    this.httpRequestsTotal = new Counter({
      name: 'http_requests_total',
      help: 'Total number of HTTP requests',
      labelNames: ['method', 'route', 'status_code'],
      registers: [this.registry],
    });

    this.httpRequestDuration = new Histogram({
      name: 'http_request_duration_seconds',
      help: 'Duration of HTTP requests in seconds',
      labelNames: ['method', 'route', 'status_code'],
      buckets: [0.05, 0.1, 0.3, 0.5, 1, 3, 5],
      registers: [this.registry],
    });

    this.httpRequestsInFlight = new Gauge({
      name: 'http_requests_in_flight',
      help: 'Number of HTTP requests currently being processed',
      registers: [this.registry],
    });

    this.bookingTransitionsTotal = new Counter({
      name: 'booking_transitions_total',
      help: 'Booking lifecycle transitions by resulting status',
      labelNames: ['booking_type', 'status'],
      registers: [this.registry],
    });

    this.reconciliationFindingsTotal = new Counter({
      name: 'reconciliation_findings_total',
      help: 'Inconsistencies found by reconciliation runs',
      labelNames: ['kind', 'repaired'],
      registers: [this.registry],
    });
  }

  recordHttpRequest(method: string, route: string, statusCode: number, durationMs: number): void {
    const status = statusCode.toString();
    this.httpRequestsTotal.labels(method, route, status).inc();
    this.httpRequestDuration.labels(method, route, status).observe(durationMs / 1000);
  }

  incrementHttpRequestsInFlight(): void {
    this.httpRequestsInFlight.inc();
  }

  decrementHttpRequestsInFlight(): void {
    this.httpRequestsInFlight.dec();
  }

  recordBookingTransition(bookingType: string, status: string): void {
    this.bookingTransitionsTotal.labels(bookingType, status).inc();
  }

  recordReconciliationFinding(kind: string, repaired: boolean): void {
    this.reconciliationFindingsTotal.labels(kind, String(repaired)).inc();
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  get contentType(): string {
    return this.registry.contentType;
  }
}
