import { Router, NextFunction, Request, Response } from 'express';
import { CreateClientRequestSchema, IdParamsSchema, UserIdParamsSchema } from '../core/types';
import { operationContext } from '../middleware/request-context';
import { parseBody, parseParams } from '../middleware/validate';
import { Services } from '../services/container';

export function createClientRoutes({ clients }: Services): Router {
  const router = Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseBody(CreateClientRequestSchema, req);
      const client = await clients.createClient(body, operationContext(req));
      res.status(201).json({ success: true, data: client });
    } catch (error) {
      next(error);
    }
  });

  router.get('/by-user/:userId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { userId } = parseParams(UserIdParamsSchema, req);
      const client = await clients.getClientByUserId(userId);
      res.json({ success: true, data: client });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = parseParams(IdParamsSchema, req);
      const client = await clients.getClient(id);
      res.json({ success: true, data: client });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
