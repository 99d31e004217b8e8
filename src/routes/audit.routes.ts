import { Router, NextFunction, Request, Response } from 'express';
import { AuditHistoryParamsSchema, AuditQuerySchema } from '../core/types';
import { requirePrivileged } from '../middleware/require-role';
import { parseParams, parseQuery } from '../middleware/validate';
import { Services } from '../services/container';

export function createAuditRoutes({ audit }: Services): Router {
  const router = Router();

  router.use(requirePrivileged('Reading the audit log'));

  // GET / - filter by entity, actor, action and time range
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const filters = parseQuery(AuditQuerySchema, req);
      res.json({ success: true, data: await audit.queryAuditLog(filters) });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:entityType/:entityId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { entityType, entityId } = parseParams(AuditHistoryParamsSchema, req);
      res.json({ success: true, data: await audit.getEntityHistory(entityType, entityId) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
