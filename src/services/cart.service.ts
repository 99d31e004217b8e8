import { CartNotActiveError, InsufficientInventoryError, InvalidQuantityError, NotFoundError, ValidationError } from '../core/errors';
import { lineSubtotal, sumMoney } from '../core/money';
import {
  Cart,
  CartLine,
  CheckoutRequest,
  EntityId,
  Money,
  OperationContext,
  Product,
  Quantity,
} from '../core/types';
import { CartFilters, cartRepository } from '../repositories/cart.repo';
import { clientRepository } from '../repositories/client.repo';
import { LedgerTransaction } from '../repositories/ledger.store';
import { MetricsCollector } from '../utils/metrics';
import { AuditRecorder } from './audit.recorder';
import { assertPositiveQuantity } from './inventory.service';
import { OrderService, OrderView } from './order.service';
import { lockKey, UnitOfWork } from './unit-of-work';

export interface CartView {
  cart: Cart;
  lines: CartLine[];
  total: Money;
}

export interface CartLimits {
  maxLineQuantity: number;
}

/**
 * Cart merge engine. A cart holds at most one line per product; adding a
 * product that is already in the cart grows that line.
 */
export class CartService {
  constructor(
    private readonly uow: UnitOfWork,
    private readonly audit: AuditRecorder,
    private readonly orders: OrderService,
    private readonly metrics: MetricsCollector,
    private readonly limits: CartLimits
  ) {}

  async createCart(clientId: EntityId, ctx: OperationContext): Promise<Cart> {
    return this.uow.run('createCart', [], ctx, tx => {
      if (!clientRepository.getClient(tx, clientId)) {
        throw NotFoundError.entity('client', clientId);
      }
      return this.audit.recordCreate(tx, 'cart', meta => ({ ...meta, clientId, status: 'active' }), ctx);
    });
  }

  /**
   * Add `quantity` units of a product, merging into the existing line if any
   */
  async addToCart(cartId: EntityId, productId: EntityId, quantity: Quantity, ctx: OperationContext): Promise<CartLine> {
    assertPositiveQuantity(quantity, this.limits.maxLineQuantity);

    return this.uow.run('addToCart', [lockKey.cart(cartId), lockKey.product(productId)], ctx, tx => {
      this.requireActiveCart(tx, cartId);
      const product = this.requireActiveProduct(tx, productId);

      const existing = cartRepository.findLine(tx, cartId, productId);
      if (!existing) {
        this.checkLineQuantity(product, quantity);
        return this.audit.recordCreate(tx, 'cartLine', meta => ({
          ...meta,
          cartId,
          productId,
          quantity,
          unitPrice: product.price,
          subtotal: lineSubtotal(quantity, product.price),
        }), ctx);
      }

      const merged = existing.quantity + quantity;
      this.checkLineQuantity(product, merged);
      tx.afterCommit(() => this.metrics.increment('cartMerges'));

      return this.audit.recordUpdate(tx, 'cartLine', existing.id, {
        quantity: merged,
        unitPrice: product.price,
        subtotal: lineSubtotal(merged, product.price),
      }, ctx);
    });
  }

  /**
   * Set the absolute quantity of a line, re-pricing it
   */
  async updateCartLineQuantity(
    cartId: EntityId,
    lineId: EntityId,
    quantity: Quantity,
    ctx: OperationContext
  ): Promise<CartLine> {
    assertPositiveQuantity(quantity, this.limits.maxLineQuantity);
    const productId = await this.productOfLine(cartId, lineId);

    return this.uow.run('updateCartLineQuantity', [lockKey.cart(cartId), lockKey.product(productId)], ctx, tx => {
      this.requireActiveCart(tx, cartId);
      const line = this.requireLine(tx, cartId, lineId);
      const product = this.requireActiveProduct(tx, line.productId);
      this.checkLineQuantity(product, quantity);

      return this.audit.recordUpdate(tx, 'cartLine', lineId, {
        quantity,
        unitPrice: product.price,
        subtotal: lineSubtotal(quantity, product.price),
      }, ctx);
    });
  }

  async removeCartLine(cartId: EntityId, lineId: EntityId, ctx: OperationContext): Promise<CartLine> {
    return this.uow.run('removeCartLine', [lockKey.cart(cartId)], ctx, tx => {
      this.requireActiveCart(tx, cartId);
      this.requireLine(tx, cartId, lineId);
      return this.audit.recordDelete(tx, 'cartLine', lineId, ctx);
    });
  }

  async getCart(cartId: EntityId): Promise<CartView> {
    const view = await this.uow.read(reader => {
      const cart = cartRepository.getCart(reader, cartId);
      return cart ? { cart, lines: cartRepository.linesOf(reader, cartId) } : undefined;
    });
    if (!view) {
      throw NotFoundError.entity('cart', cartId);
    }
    return { ...view, total: sumMoney(view.lines.map(line => line.subtotal)) };
  }

  async listCarts(filters: CartFilters = {}): Promise<Cart[]> {
    return this.uow.read(reader => cartRepository.listCarts(reader, filters));
  }

  /**
   * Turn the cart into an order in one transaction: every line reserves its
   * stock, and the cart is completed only if all of them succeed.
   */
  async checkoutCart(cartId: EntityId, input: CheckoutRequest, ctx: OperationContext): Promise<OrderView> {
    const lines = await this.uow.read(reader => cartRepository.linesOf(reader, cartId));
    const keys = [lockKey.cart(cartId), ...lines.map(line => lockKey.product(line.productId))];

    return this.uow.run('checkoutCart', keys, ctx, tx => {
      const cart = this.requireActiveCart(tx, cartId);
      const cartLines = cartRepository.linesOf(tx, cartId);
      if (cartLines.length === 0) {
        throw ValidationError.emptyCart(cartId);
      }

      const opened = this.orders.openOrder(tx, {
        clientId: cart.clientId,
        shippingAddress: input.shippingAddress,
        paymentMethod: input.paymentMethod,
      }, ctx);
      const orderLines = cartLines.map(line =>
        this.orders.appendLine(tx, opened.id, line.productId, line.quantity, ctx)
      );
      const order = this.orders.refreshTotal(tx, opened.id, ctx);

      this.audit.recordUpdate(tx, 'cart', cartId, { status: 'completed' }, ctx);
      return { order, lines: orderLines };
    });
  }

  private checkLineQuantity(product: Product, quantity: Quantity): void {
    if (quantity > this.limits.maxLineQuantity) {
      throw new InvalidQuantityError(quantity, { min: 1, max: this.limits.maxLineQuantity });
    }
    if (quantity > product.stock) {
      throw InsufficientInventoryError.reserve(product.id, quantity, product.stock);
    }
  }

  private requireActiveCart(tx: LedgerTransaction, cartId: EntityId): Cart {
    const cart = cartRepository.getCart(tx, cartId);
    if (!cart) {
      throw NotFoundError.entity('cart', cartId);
    }
    if (cart.status !== 'active') {
      throw new CartNotActiveError(cartId, cart.status);
    }
    return cart;
  }

  private requireActiveProduct(tx: LedgerTransaction, productId: EntityId): Product {
    const product = tx.get('product', productId);
    if (!product) {
      throw NotFoundError.entity('product', productId);
    }
    if (!product.active) {
      throw NotFoundError.inactive('product', productId);
    }
    return product;
  }

  private requireLine(tx: LedgerTransaction, cartId: EntityId, lineId: EntityId): CartLine {
    const line = cartRepository.getLine(tx, cartId, lineId);
    if (!line) {
      throw NotFoundError.entity('cartLine', lineId);
    }
    return line;
  }

  private async productOfLine(cartId: EntityId, lineId: EntityId): Promise<EntityId> {
    const line = await this.uow.read(reader => cartRepository.getLine(reader, cartId, lineId));
    if (!line) {
      throw NotFoundError.entity('cartLine', lineId);
    }
    return line.productId;
  }
}
