import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';
import type { MetricsConfig } from '../config/metrics';

type RequestLabelName = 'method' | 'route' | 'status_code' | 'service';
type InFlightLabelName = 'method' | 'service';

/** Monotonic clock reading in seconds. */
export type Clock = () => number;

export const UNMATCHED_ROUTE = 'unmatched';

export interface CompletedRequest {
  method: string;
  route: string;
  statusCode: number;
  elapsedSeconds: number;
}

export interface RequestOutcome {
  route: string;
  statusCode: number;
}

/**
 * Handle for a request counted in the in-flight gauge. `end` records the
 * request once; later calls are no-ops and return false.
 */
export interface InFlightRequest {
  readonly method: string;
  end(outcome: RequestOutcome): boolean;
}

export interface RedMetricsOptions {
  clock?: Clock;
}

const defaultClock: Clock = () => performance.now() / 1000;

/**
 * Owns the registry and the rate, errors and duration series for HTTP
 * requests. One instance is created at startup and handed to the app.
 */
export class RedMetricsCollector {
  readonly registry: Registry;
  readonly requestsTotal: Counter<RequestLabelName>;
  readonly requestDuration: Histogram<RequestLabelName>;
  readonly errorsTotal: Counter<RequestLabelName>;
  readonly requestsInFlight: Gauge<InFlightLabelName>;

  private readonly serviceLabel: string;
  private readonly clock: Clock;

  constructor(config: MetricsConfig, options: RedMetricsOptions = {}) {
    this.serviceLabel = config.serviceLabel;
    this.clock = options.clock ?? defaultClock;
    this.registry = new Registry();

    if (config.collectDefaultMetrics) {
      collectDefaultMetrics({ register: this.registry });
    }

    this.requestsTotal = new Counter({
      name: 'http_requests_total',
      help: 'Total number of HTTP requests',
      labelNames: ['method', 'route', 'status_code', 'service'],
      registers: [this.registry],
    });

    this.requestDuration = new Histogram({
      name: 'http_request_duration_seconds',
      help: 'Duration of HTTP requests in seconds',
      labelNames: ['method', 'route', 'status_code', 'service'],
      buckets: config.buckets,
      registers: [this.registry],
    });

    this.errorsTotal = new Counter({
      name: 'http_errors_total',
      help: 'Total number of HTTP requests answered with a 4xx or 5xx status',
      labelNames: ['method', 'route', 'status_code', 'service'],
      registers: [this.registry],
    });

    this.requestsInFlight = new Gauge({
      name: 'http_requests_in_flight',
      help: 'Number of HTTP requests currently being processed',
      labelNames: ['method', 'service'],
      registers: [this.registry],
    });
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  onRequestStart(method: string): void {
    this.requestsInFlight.inc({ method, service: this.serviceLabel });
  }

  onRequestEnd(request: CompletedRequest): void {
    const labels = {
      method: request.method,
      route: request.route || UNMATCHED_ROUTE,
      status_code: request.statusCode.toString(),
      service: this.serviceLabel,
    };

    try {
      this.requestsTotal.inc(labels);
      this.requestDuration.observe(labels, request.elapsedSeconds);

      if (request.statusCode >= 400) {
        this.errorsTotal.inc(labels);
      }
    } finally {
      this.requestsInFlight.dec({ method: request.method, service: this.serviceLabel });
    }
  }

  begin(method: string): InFlightRequest {
    const startedAt = this.clock();
    this.onRequestStart(method);

    let ended = false;

    return {
      method,
      end: ({ route, statusCode }) => {
        if (ended) {
          return false;
        }
        ended = true;

        this.onRequestEnd({
          method,
          route,
          statusCode,
          elapsedSeconds: Math.max(0, this.clock() - startedAt),
        });
        return true;
      },
    };
  }

  render(): Promise<string> {
    return this.registry.metrics();
  }
}
