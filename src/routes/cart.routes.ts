import { Router, NextFunction, Request, Response } from 'express';
import {
  AddToCartRequestSchema,
  CheckoutRequestSchema,
  CreateCartRequestSchema,
  IdParamsSchema,
  LineParamsSchema,
  LineQuantityRequestSchema,
  ListCartsQuerySchema,
} from '../core/types';
import { operationContext } from '../middleware/request-context';
import { parseBody, parseParams, parseQuery } from '../middleware/validate';
import { Services } from '../services/container';

export function createCartRoutes({ carts }: Services): Router {
  const router = Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { clientId } = parseBody(CreateCartRequestSchema, req);
      const cart = await carts.createCart(clientId, operationContext(req));
      res.status(201).json({ success: true, data: cart });
    } catch (error) {
      next(error);
    }
  });

  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const filters = parseQuery(ListCartsQuerySchema, req);
      res.json({ success: true, data: await carts.listCarts(filters) });
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = parseParams(IdParamsSchema, req);
      res.json({ success: true, data: await carts.getCart(id) });
    } catch (error) {
      next(error);
    }
  });

  // POST /:id/lines - add a product; merges into the existing line
  router.post('/:id/lines', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = parseParams(IdParamsSchema, req);
      const { productId, quantity } = parseBody(AddToCartRequestSchema, req);
      const line = await carts.addToCart(id, productId, quantity, operationContext(req));
      res.status(line.version === 1 ? 201 : 200).json({ success: true, data: line });
    } catch (error) {
      next(error);
    }
  });

  router.patch('/:id/lines/:lineId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id, lineId } = parseParams(LineParamsSchema, req);
      const { quantity } = parseBody(LineQuantityRequestSchema, req);
      const line = await carts.updateCartLineQuantity(id, lineId, quantity, operationContext(req));
      res.json({ success: true, data: line });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:id/lines/:lineId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id, lineId } = parseParams(LineParamsSchema, req);
      const line = await carts.removeCartLine(id, lineId, operationContext(req));
      res.json({ success: true, data: line });
    } catch (error) {
      next(error);
    }
  });

  // POST /:id/checkout - cart becomes an order, all or nothing
  router.post('/:id/checkout', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = parseParams(IdParamsSchema, req);
      const body = parseBody(CheckoutRequestSchema, req);
      const order = await carts.checkoutCart(id, body, operationContext(req));
      res.status(201).json({ success: true, data: order });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
