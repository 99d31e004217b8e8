import { Router, NextFunction, Request, Response } from 'express';
import {
  CreateCategoryRequestSchema,
  IdParamsSchema,
  ListCategoriesQuerySchema,
  UpdateCategoryRequestSchema,
} from '../core/types';
import { operationContext } from '../middleware/request-context';
import { requirePrivileged } from '../middleware/require-role';
import { parseBody, parseParams, parseQuery } from '../middleware/validate';
import { Services } from '../services/container';

export function createCategoryRoutes({ catalog }: Services): Router {
  const router = Router();

  // GET / - active categories; ?includeInactive=true for admins
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = parseQuery(ListCategoriesQuerySchema, req);
      const categories = await catalog.listCategories(operationContext(req), query);
      res.json({ success: true, data: categories });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = parseParams(IdParamsSchema, req);
      const query = parseQuery(ListCategoriesQuerySchema, req);
      const category = await catalog.getCategory(id, operationContext(req), query);
      res.json({ success: true, data: category });
    } catch (error) {
      next(error);
    }
  });

  router.post('/', requirePrivileged('Creating categories'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseBody(CreateCategoryRequestSchema, req);
      const category = await catalog.createCategory(body, operationContext(req));
      res.status(201).json({ success: true, data: category });
    } catch (error) {
      next(error);
    }
  });

  router.patch('/:id', requirePrivileged('Updating categories'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = parseParams(IdParamsSchema, req);
      const body = parseBody(UpdateCategoryRequestSchema, req);
      const category = await catalog.updateCategory(id, body, operationContext(req));
      res.json({ success: true, data: category });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:id/activate', requirePrivileged('Activating categories'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = parseParams(IdParamsSchema, req);
      const category = await catalog.activateCategory(id, operationContext(req));
      res.json({ success: true, data: category });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:id/deactivate', requirePrivileged('Deactivating categories'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = parseParams(IdParamsSchema, req);
      const category = await catalog.deactivateCategory(id, operationContext(req));
      res.json({ success: true, data: category });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
