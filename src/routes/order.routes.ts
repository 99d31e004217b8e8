import { Router, NextFunction, Request, Response } from 'express';
import {
  CreateOrderLineRequestSchema,
  CreateOrderRequestSchema,
  IdParamsSchema,
  LineParamsSchema,
  LineQuantityRequestSchema,
  ListOrdersQuerySchema,
  UpdateOrderStatusRequestSchema,
} from '../core/types';
import { operationContext } from '../middleware/request-context';
import { requirePrivileged } from '../middleware/require-role';
import { parseBody, parseParams, parseQuery } from '../middleware/validate';
import { Services } from '../services/container';

export function createOrderRoutes({ orders }: Services): Router {
  const router = Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseBody(CreateOrderRequestSchema, req);
      const order = await orders.createOrder(body, operationContext(req));
      res.status(201).json({ success: true, data: order });
    } catch (error) {
      next(error);
    }
  });

  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const filters = parseQuery(ListOrdersQuerySchema, req);
      res.json({ success: true, data: await orders.listOrders(filters) });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = parseParams(IdParamsSchema, req);
      res.json({ success: true, data: await orders.getOrder(id) });
    } catch (error) {
      next(error);
    }
  });

  // POST /:id/lines - reserves stock for the new line
  router.post('/:id/lines', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = parseParams(IdParamsSchema, req);
      const { productId, quantity } = parseBody(CreateOrderLineRequestSchema, req);
      const result = await orders.createOrderLine(id, productId, quantity, operationContext(req));
      res.status(201).json({ success: true, data: result });
    } catch (error) {
      next(error);
    }
  });

  router.patch('/:id/lines/:lineId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id, lineId } = parseParams(LineParamsSchema, req);
      const { quantity } = parseBody(LineQuantityRequestSchema, req);
      const result = await orders.updateOrderLineQuantity(id, lineId, quantity, operationContext(req));
      res.json({ success: true, data: result });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:id/lines/:lineId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id, lineId } = parseParams(LineParamsSchema, req);
      const order = await orders.removeOrderLine(id, lineId, operationContext(req));
      res.json({ success: true, data: order });
    } catch (error) {
      next(error);
    }
  });

  router.patch('/:id/status', requirePrivileged('Changing order status'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = parseParams(IdParamsSchema, req);
      const { status } = parseBody(UpdateOrderStatusRequestSchema, req);
      const order = await orders.updateOrderStatus(id, status, operationContext(req));
      res.json({ success: true, data: order });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
