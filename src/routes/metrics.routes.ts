import { Router } from 'express';
import { logger } from '../core/logger';
import { requirePrivileged } from '../middleware/require-role';
import { Services } from '../services/container';

export function createMetricsRoutes(services: Services): Router {
  const router = Router();

  // GET /metrics - Return current metrics as JSON
  router.get('/', (req, res) => {
    logger.debug({ req: { id: req.id } }, 'Metrics requested');

    res.json({
      success: true,
      data: {
        ...services.metrics.getMetrics(),
        locks: services.uow.getLockStatus(),
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
      },
    });
  });

  // POST /metrics/reset - Reset all counters
  router.post('/reset', requirePrivileged('Resetting metrics'), (req, res) => {
    logger.info({ req: { id: req.id }, actorId: req.actor.id }, 'Metrics reset requested');

    services.metrics.reset();

    res.json({
      success: true,
      data: { message: 'Metrics reset successfully' },
    });
  });

  return router;
}
