import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { MetricsConfig } from '../config/metrics';
import {
  UNMATCHED_ROUTE,
  type InFlightRequest,
  type RedMetricsCollector,
} from '../services/red-metrics.service';
import { describeError, logWarning } from '../utils/logger';

/** Status recorded when the client hung up before the response finished. */
export const CLIENT_CLOSED_REQUEST = 499;

export interface InstrumentedRequest {
  method: string;
  path: string;
  baseUrl: string;
  route?: unknown;
}

export interface InstrumentedResponse {
  statusCode: number;
  readonly writableFinished: boolean;
  once(event: 'finish' | 'close', listener: () => void): unknown;
}

/**
 * Hooks around a request's lifecycle. `before` runs when the request
 * enters the chain and returns the state handed to `after`, or
 * `undefined` to leave the request alone. `after` runs exactly once,
 * when the response finishes or the connection closes.
 */
export interface RequestInstrumentation<TState> {
  before(req: InstrumentedRequest): TState | undefined;
  after(state: TState, req: InstrumentedRequest, res: InstrumentedResponse): void;
}

export function attachLifecycle<TState>(
  hooks: RequestInstrumentation<TState>,
  req: InstrumentedRequest,
  res: InstrumentedResponse
): void {
  let state: TState | undefined;
  try {
    state = hooks.before(req);
  } catch (error) {
    logWarning('Request instrumentation failed to start', {
      method: req.method,
      path: req.path,
      error: describeError(error),
    });
    return;
  }

  if (state === undefined) {
    return;
  }

  const started = state;
  let done = false;
  const complete = () => {
    if (done) {
      return;
    }
    done = true;

    try {
      hooks.after(started, req, res);
    } catch (error) {
      logWarning('Request instrumentation failed to record', {
        method: req.method,
        path: req.path,
        error: describeError(error),
      });
    }
  };

  res.once('finish', complete);
  res.once('close', complete);
}

export function instrument<TState>(hooks: RequestInstrumentation<TState>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    attachLifecycle(hooks, req, res);
    next();
  };
}

function isMatchedRoute(route: unknown): route is { path: string } {
  return typeof route === 'object' && route !== null && 'path' in route && typeof route.path === 'string';
}

export function resolveRouteTemplate(req: InstrumentedRequest): string {
  if (!isMatchedRoute(req.route)) {
    return UNMATCHED_ROUTE;
  }
  return `${req.baseUrl}${req.route.path}`;
}

// Express matches routes case-insensitively and ignores a trailing slash.
export function normalizePath(path: string): string {
  const trimmed = path.length > 1 && path.endsWith('/') ? path.slice(0, -1) : path;
  return trimmed.toLowerCase();
}

export function createRedMetricsInstrumentation(
  collector: RedMetricsCollector,
  config: Pick<MetricsConfig, 'enabled' | 'excludePaths'>
): RequestInstrumentation<InFlightRequest> {
  const excluded = new Set(config.excludePaths.map(normalizePath));

  return {
    before(req) {
      if (!config.enabled || excluded.has(normalizePath(req.path))) {
        return undefined;
      }
      return collector.begin(req.method);
    },

    after(inFlight, req, res) {
      inFlight.end({
        route: resolveRouteTemplate(req),
        statusCode: res.writableFinished ? res.statusCode : CLIENT_CLOSED_REQUEST,
      });
    },
  };
}

export function createMetricsMiddleware(
  collector: RedMetricsCollector,
  config: Pick<MetricsConfig, 'enabled' | 'excludePaths'>
): RequestHandler {
  return instrument(createRedMetricsInstrumentation(collector, config));
}
