import { Router, NextFunction, Request, Response } from 'express';
import { logger } from '../core/logger';
import {
  CreateProductRequestSchema,
  IdParamsSchema,
  ListCategoriesQuerySchema,
  ListProductsQuerySchema,
  SetStockRequestSchema,
  UpdateProductRequestSchema,
} from '../core/types';
import { operationContext } from '../middleware/request-context';
import { requirePrivileged } from '../middleware/require-role';
import { parseBody, parseParams, parseQuery } from '../middleware/validate';
import { formatEtag, ifMatchMiddleware, resolveExpectedVersion } from '../middleware/versionPrecondition';
import { Services } from '../services/container';

export function createProductRoutes({ catalog }: Services): Router {
  const router = Router();

  // GET / - filter by category and name, paginated
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = parseQuery(ListProductsQuerySchema, req);
      const products = await catalog.listProducts(operationContext(req), query);
      res.json({ success: true, data: products });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = parseParams(IdParamsSchema, req);
      const query = parseQuery(ListCategoriesQuerySchema, req);
      const product = await catalog.getProduct(id, operationContext(req), query);
      res.set('ETag', formatEtag(product.version));
      res.json({ success: true, data: product });
    } catch (error) {
      next(error);
    }
  });

  // POST / - 201 for a new product, 200 when an identical one was restocked
  router.post('/', requirePrivileged('Creating products'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseBody(CreateProductRequestSchema, req);
      const { product, created } = await catalog.createProduct(body, operationContext(req));
      logger.info({ req: { id: req.id }, productId: product.id, created }, 'Product create handled');
      res.status(created ? 201 : 200).json({ success: true, data: { product, created } });
    } catch (error) {
      next(error);
    }
  });

  router.patch('/:id',
    requirePrivileged('Updating products'),
    ifMatchMiddleware,
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { id } = parseParams(IdParamsSchema, req);
        const body = parseBody(UpdateProductRequestSchema, req);
        const expectedVersion = resolveExpectedVersion(req.ifMatchVersion, body.expectedVersion);
        const product = await catalog.updateProduct(id, { ...body, expectedVersion }, operationContext(req));
        res.set('ETag', formatEtag(product.version));
        res.json({ success: true, data: product });
      } catch (error) {
        next(error);
      }
    }
  );

  // PUT /:id/stock - absolute stock correction
  router.put('/:id/stock', requirePrivileged('Setting stock'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = parseParams(IdParamsSchema, req);
      const { stock } = parseBody(SetStockRequestSchema, req);
      const product = await catalog.setProductStock(id, stock, operationContext(req));
      res.set('ETag', formatEtag(product.version));
      res.json({ success: true, data: product });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:id/activate', requirePrivileged('Activating products'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = parseParams(IdParamsSchema, req);
      const product = await catalog.activateProduct(id, operationContext(req));
      res.json({ success: true, data: product });
    } catch (error) {
      next(error);
    }
  });

  router.post('/:id/deactivate', requirePrivileged('Deactivating products'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = parseParams(IdParamsSchema, req);
      const product = await catalog.deactivateProduct(id, operationContext(req));
      res.json({ success: true, data: product });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
