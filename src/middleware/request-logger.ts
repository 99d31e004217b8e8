import { Request, Response, NextFunction } from 'express';
import { logger } from '../core/logger';
import { MetricsCollector } from '../utils/metrics';

export const requestLoggerMiddleware = (metrics: MetricsCollector) =>
  (req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();

    logger.info({
      method: req.method,
      url: req.originalUrl,
      requestId: req.id,
      userAgent: req.get('User-Agent'),
      ip: req.ip,
    }, 'Request started');

    res.on('finish', () => {
      logger.info({
        method: req.method,
        url: req.originalUrl,
        status: res.statusCode,
        durationMs: Date.now() - startTime,
        requestId: req.id,
        actorId: req.actor?.id ?? null,
        contentLength: res.get('Content-Length'),
      }, 'Request completed');

      metrics.increment('requests');
      if (res.statusCode >= 400) {
        metrics.increment('errors');
      }
    });

    next();
  };
