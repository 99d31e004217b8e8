import { Router } from 'express';
import { logger } from '../core/logger';
import { Services } from '../services/container';

export function createHealthRoutes(services: Services): Router {
  const router = Router();

  // Basic health check
  router.get('/', (req, res) => {
    logger.debug({ req: { id: req.id } }, 'Health check requested');
    res.json({
      success: true,
      data: {
        status: 'healthy',
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
      },
    });
  });

  // Liveness probe - simple check if service is running
  router.get('/liveness', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  // Readiness probe - the ledger must have loaded
  router.get('/readiness', async (req, res) => {
    try {
      const entries = await services.audit.countEntries();
      res.json({ ready: true, auditEntries: entries, timestamp: new Date().toISOString() });
    } catch (error) {
      logger.error({ req: { id: req.id }, error }, 'Readiness check failed');
      res.status(503).json({
        ready: false,
        error: 'Ledger unavailable',
        timestamp: new Date().toISOString(),
      });
    }
  });

  return router;
}
