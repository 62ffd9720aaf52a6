import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { RedMetricsCollector } from '../services/red-metrics.service';

export function createMetricsHandler(collector: RedMetricsCollector): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      const metrics = await collector.render();
      res.status(200);
      res.set('Content-Type', collector.contentType);
      res.end(metrics);
    } catch (error) {
      next(error);
    }
  };
}

export function healthCheck(req: Request, res: Response) {
  res.json({
    status: 'healthy',
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
  });
}
