import { NotFoundError, OrderClosedError, ValidationError } from '../core/errors';
import { logger } from '../core/logger';
import { lineSubtotal, sumMoney } from '../core/money';
import {
  CreateOrderRequest,
  EntityId,
  FINAL_ORDER_STATUSES,
  OperationContext,
  Order,
  OrderLine,
  OrderStatus,
  Quantity,
} from '../core/types';
import { clientRepository } from '../repositories/client.repo';
import { LedgerTransaction } from '../repositories/ledger.store';
import { OrderFilters, orderRepository } from '../repositories/order.repo';
import { AuditRecorder } from './audit.recorder';
import { assertPositiveQuantity, InventoryService } from './inventory.service';
import { lockKey, UnitOfWork } from './unit-of-work';

export interface OrderView {
  order: Order;
  lines: OrderLine[];
}

export interface OrderLineResult {
  line: OrderLine;
  order: Order;
}

export interface OrderLimits {
  maxLineQuantity: number;
}

const MIN_ADDRESS_LENGTH = 5;

/**
 * Orders, their lines and the cached order total. Line changes move stock
 * through the inventory adjuster in the same transaction.
 */
export class OrderService {
  constructor(
    private readonly uow: UnitOfWork,
    private readonly audit: AuditRecorder,
    private readonly inventory: InventoryService,
    private readonly limits: OrderLimits
  ) {}

  async createOrder(input: CreateOrderRequest, ctx: OperationContext): Promise<Order> {
    return this.uow.run('createOrder', [], ctx, tx => this.openOrder(tx, input, ctx));
  }

  /**
   * Add a line, reserving its stock and refreshing the order total
   */
  async createOrderLine(
    orderId: EntityId,
    productId: EntityId,
    quantity: Quantity,
    ctx: OperationContext
  ): Promise<OrderLineResult> {
    assertPositiveQuantity(quantity, this.limits.maxLineQuantity);

    return this.uow.run('createOrderLine', [lockKey.order(orderId), lockKey.product(productId)], ctx, tx => {
      this.requireOpenOrder(tx, orderId);
      const line = this.appendLine(tx, orderId, productId, quantity, ctx);
      const order = this.refreshTotal(tx, orderId, ctx);
      return { line, order };
    });
  }

  /**
   * Set a line's quantity; the difference is reserved or released
   */
  async updateOrderLineQuantity(
    orderId: EntityId,
    lineId: EntityId,
    quantity: Quantity,
    ctx: OperationContext
  ): Promise<OrderLineResult> {
    assertPositiveQuantity(quantity, this.limits.maxLineQuantity);
    const productId = await this.productOfLine(orderId, lineId);

    return this.uow.run('updateOrderLineQuantity', [lockKey.order(orderId), lockKey.product(productId)], ctx, tx => {
      this.requireOpenOrder(tx, orderId);
      const current = this.requireLine(tx, orderId, lineId);

      const delta = quantity - current.quantity;
      if (delta > 0) {
        this.inventory.reserveStock(tx, current.productId, delta, ctx);
      } else if (delta < 0) {
        this.inventory.releaseStock(tx, current.productId, -delta, ctx);
      }

      const line = this.audit.recordUpdate(tx, 'orderLine', lineId, {
        quantity,
        subtotal: lineSubtotal(quantity, current.unitPrice),
      }, ctx);
      const order = this.refreshTotal(tx, orderId, ctx);
      return { line, order };
    });
  }

  /**
   * Delete a line and give its stock back
   */
  async removeOrderLine(orderId: EntityId, lineId: EntityId, ctx: OperationContext): Promise<Order> {
    const productId = await this.productOfLine(orderId, lineId);

    return this.uow.run('removeOrderLine', [lockKey.order(orderId), lockKey.product(productId)], ctx, tx => {
      this.requireOpenOrder(tx, orderId);
      const line = this.requireLine(tx, orderId, lineId);

      this.inventory.releaseStock(tx, line.productId, line.quantity, ctx);
      this.audit.recordDelete(tx, 'orderLine', lineId, ctx);
      return this.refreshTotal(tx, orderId, ctx);
    });
  }

  /**
   * Move an open order to `status`. Cancelling releases the stock of every line.
   */
  async updateOrderStatus(orderId: EntityId, status: OrderStatus, ctx: OperationContext): Promise<Order> {
    const lines = await this.uow.read(reader => orderRepository.linesOf(reader, orderId));
    const keys = [lockKey.order(orderId), ...lines.map(line => lockKey.product(line.productId))];

    return this.uow.run('updateOrderStatus', keys, ctx, tx => {
      this.requireOpenOrder(tx, orderId);

      if (status === 'cancelled') {
        for (const line of orderRepository.linesOf(tx, orderId)) {
          this.inventory.releaseStock(tx, line.productId, line.quantity, ctx);
        }
      }

      return this.audit.recordUpdate(tx, 'order', orderId, { status }, ctx);
    });
  }

  /**
   * Order with its lines. The total is recomputed from the lines; a stale
   * cached total is reported and replaced in the result.
   */
  async getOrder(orderId: EntityId): Promise<OrderView> {
    const view = await this.uow.read(reader => {
      const order = orderRepository.getOrder(reader, orderId);
      return order ? { order, lines: orderRepository.linesOf(reader, orderId) } : undefined;
    });
    if (!view) {
      throw NotFoundError.entity('order', orderId);
    }

    const total = sumMoney(view.lines.map(line => line.subtotal));
    if (total !== view.order.total) {
      logger.warn({ orderId, cached: view.order.total, computed: total }, 'Cached order total is stale');
      return { ...view, order: { ...view.order, total } };
    }
    return view;
  }

  async listOrders(filters: OrderFilters = {}): Promise<Order[]> {
    return this.uow.read(reader => orderRepository.listOrders(reader, filters));
  }

  /**
   * Create an empty pending order inside `tx`
   */
  openOrder(tx: LedgerTransaction, input: CreateOrderRequest, ctx: OperationContext): Order {
    if (!clientRepository.getClient(tx, input.clientId)) {
      throw NotFoundError.entity('client', input.clientId);
    }

    const shippingAddress = input.shippingAddress.trim();
    if (shippingAddress.length < MIN_ADDRESS_LENGTH) {
      throw new ValidationError(
        `Shipping address must be at least ${MIN_ADDRESS_LENGTH} characters`,
        'shippingAddress',
        input.shippingAddress
      );
    }

    return this.audit.recordCreate(tx, 'order', meta => ({
      ...meta,
      clientId: input.clientId,
      status: 'pending',
      shippingAddress,
      paymentMethod: input.paymentMethod,
      total: 0,
    }), ctx);
  }

  /**
   * Reserve stock and add a line priced at the product's current price
   */
  appendLine(
    tx: LedgerTransaction,
    orderId: EntityId,
    productId: EntityId,
    quantity: Quantity,
    ctx: OperationContext
  ): OrderLine {
    assertPositiveQuantity(quantity, this.limits.maxLineQuantity);
    const product = this.inventory.reserveStock(tx, productId, quantity, ctx);

    return this.audit.recordCreate(tx, 'orderLine', meta => ({
      ...meta,
      orderId,
      productId,
      quantity,
      unitPrice: product.price,
      subtotal: lineSubtotal(quantity, product.price),
    }), ctx);
  }

  refreshTotal(tx: LedgerTransaction, orderId: EntityId, ctx: OperationContext): Order {
    const total = sumMoney(orderRepository.linesOf(tx, orderId).map(line => line.subtotal));
    return this.audit.recordUpdate(tx, 'order', orderId, { total }, ctx);
  }

  private requireOpenOrder(tx: LedgerTransaction, orderId: EntityId): Order {
    const order = tx.get('order', orderId);
    if (!order) {
      throw NotFoundError.entity('order', orderId);
    }
    if (FINAL_ORDER_STATUSES.includes(order.status)) {
      throw new OrderClosedError(orderId, order.status);
    }
    return order;
  }

  private requireLine(tx: LedgerTransaction, orderId: EntityId, lineId: EntityId): OrderLine {
    const line = orderRepository.getLine(tx, orderId, lineId);
    if (!line) {
      throw NotFoundError.entity('orderLine', lineId);
    }
    return line;
  }

  private async productOfLine(orderId: EntityId, lineId: EntityId): Promise<EntityId> {
    const line = await this.uow.read(reader => orderRepository.getLine(reader, orderId, lineId));
    if (!line) {
      throw NotFoundError.entity('orderLine', lineId);
    }
    return line.productId;
  }
}
