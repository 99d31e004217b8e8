import { describe, it, expect, beforeEach } from 'vitest';
import {
  InsufficientInventoryError,
  NotFoundError,
  OrderClosedError,
  ValidationError,
} from '../../src/core/errors';
import { Client, Order, Product } from '../../src/core/types';
import { Services } from '../../src/services/container';
import { adminCtx, createTestServices, customerCtx, seedClient, seedProduct, stockOf } from '../helpers/services';

const ctx = customerCtx('user-1');

describe('OrderService', () => {
  let services: Services;
  let client: Client;
  let product: Product;
  let order: Order;

  beforeEach(async () => {
    services = createTestServices();
    client = await seedClient(services, 'user-1');
    product = await seedProduct(services, { price: 4.5, stock: 10 });
    order = await services.orders.createOrder({
      clientId: client.id,
      shippingAddress: '12 Test Street',
      paymentMethod: 'paypal',
    }, ctx);
  });

  describe('createOrder', () => {
    it('should start pending with a zero total', () => {
      expect(order.status).toBe('pending');
      expect(order.total).toBe(0);
      expect(order.paymentMethod).toBe('paypal');
    });

    it('should require an existing client', async () => {
      await expect(services.orders.createOrder({
        clientId: '7f1e1d9a-0000-4000-8000-000000000000',
        shippingAddress: '12 Test Street',
        paymentMethod: 'card',
      }, ctx)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should require a usable shipping address', async () => {
      await expect(services.orders.createOrder({
        clientId: client.id,
        shippingAddress: ' 12  ',
        paymentMethod: 'card',
      }, ctx)).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('createOrderLine', () => {
    it('should reserve stock, snapshot the price and refresh the total', async () => {
      const { line, order: updated } = await services.orders.createOrderLine(order.id, product.id, 2, ctx);

      expect(line.unitPrice).toBe(4.5);
      expect(line.subtotal).toBe(9);
      expect(updated.total).toBe(9);
      expect(await stockOf(services, product.id)).toBe(8);
    });

    it('should let exactly one of two competing orders take the last units', async () => {
      const other = await services.orders.createOrder({
        clientId: client.id,
        shippingAddress: '34 Other Road',
        paymentMethod: 'card',
      }, ctx);

      const results = await Promise.allSettled([
        services.orders.createOrderLine(order.id, product.id, 6, ctx),
        services.orders.createOrderLine(other.id, product.id, 6, ctx),
      ]);

      const fulfilled = results.filter(r => r.status === 'fulfilled');
      const rejected = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
      expect(fulfilled).toHaveLength(1);
      expect(rejected).toHaveLength(1);
      expect(rejected[0]?.reason).toBeInstanceOf(InsufficientInventoryError);
      expect(await stockOf(services, product.id)).toBe(4);
    });

    it('should leave stock, lines and total untouched on insufficient stock', async () => {
      await services.orders.createOrderLine(order.id, product.id, 4, ctx);

      await expect(services.orders.createOrderLine(order.id, product.id, 7, ctx))
        .rejects.toBeInstanceOf(InsufficientInventoryError);

      const view = await services.orders.getOrder(order.id);
      expect(view.lines).toHaveLength(1);
      expect(view.order.total).toBe(18);
      expect(await stockOf(services, product.id)).toBe(6);
    });
  });

  describe('updateOrderLineQuantity', () => {
    it('should reserve or release the difference', async () => {
      const { line } = await services.orders.createOrderLine(order.id, product.id, 2, ctx);

      const grown = await services.orders.updateOrderLineQuantity(order.id, line.id, 5, ctx);
      expect(grown.line.subtotal).toBe(22.5);
      expect(grown.order.total).toBe(22.5);
      expect(await stockOf(services, product.id)).toBe(5);

      const shrunk = await services.orders.updateOrderLineQuantity(order.id, line.id, 1, ctx);
      expect(shrunk.order.total).toBe(4.5);
      expect(await stockOf(services, product.id)).toBe(9);
    });

    it('should keep the original unit price', async () => {
      const { line } = await services.orders.createOrderLine(order.id, product.id, 1, ctx);
      await services.catalog.updateProduct(product.id, { price: 9.99 }, adminCtx);

      const { line: updated } = await services.orders.updateOrderLineQuantity(order.id, line.id, 2, ctx);
      expect(updated.unitPrice).toBe(4.5);
      expect(updated.subtotal).toBe(9);
    });
  });

  describe('removeOrderLine', () => {
    it('should give back exactly the line quantity', async () => {
      const { line } = await services.orders.createOrderLine(order.id, product.id, 3, ctx);
      const updated = await services.orders.removeOrderLine(order.id, line.id, ctx);

      expect(updated.total).toBe(0);
      expect(await stockOf(services, product.id)).toBe(10);
      expect((await services.orders.getOrder(order.id)).lines).toEqual([]);
    });

    it('should report an unknown line', async () => {
      await expect(services.orders.removeOrderLine(order.id, '7f1e1d9a-0000-4000-8000-000000000000', ctx))
        .rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('updateOrderStatus', () => {
    it('should release all stock once on cancellation', async () => {
      const second = await seedProduct(services, { name: 'Iced Tea', stock: 5 });
      await services.orders.createOrderLine(order.id, product.id, 3, ctx);
      await services.orders.createOrderLine(order.id, second.id, 2, ctx);

      const cancelled = await services.orders.updateOrderStatus(order.id, 'cancelled', adminCtx);
      expect(cancelled.status).toBe('cancelled');
      expect(await stockOf(services, product.id)).toBe(10);
      expect(await stockOf(services, second.id)).toBe(5);

      await expect(services.orders.updateOrderStatus(order.id, 'cancelled', adminCtx))
        .rejects.toBeInstanceOf(OrderClosedError);
      expect(await stockOf(services, product.id)).toBe(10);
    });

    it('should freeze delivered orders', async () => {
      await services.orders.updateOrderStatus(order.id, 'delivered', adminCtx);

      await expect(services.orders.createOrderLine(order.id, product.id, 1, ctx))
        .rejects.toBeInstanceOf(OrderClosedError);
      await expect(services.orders.updateOrderStatus(order.id, 'preparing', adminCtx))
        .rejects.toBeInstanceOf(OrderClosedError);
    });

    it('should move through the open states', async () => {
      await services.orders.updateOrderStatus(order.id, 'payment_confirmed', adminCtx);
      const preparing = await services.orders.updateOrderStatus(order.id, 'preparing', adminCtx);
      expect(preparing.status).toBe('preparing');
    });
  });

  describe('getOrder', () => {
    it('should recompute a stale cached total', async () => {
      await services.orders.createOrderLine(order.id, product.id, 2, ctx);
      await services.store.transaction(async tx => tx.update('order', order.id, { total: 999 }));

      const view = await services.orders.getOrder(order.id);
      expect(view.order.total).toBe(9);
    });
  });

  describe('listOrders', () => {
    it('should filter by status', async () => {
      await services.orders.updateOrderStatus(order.id, 'cancelled', adminCtx);

      expect(await services.orders.listOrders({ status: 'pending' })).toEqual([]);
      expect((await services.orders.listOrders({ clientId: client.id })).map(o => o.id)).toEqual([order.id]);
    });
  });
});
