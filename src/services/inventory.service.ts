import { InsufficientInventoryError, InvalidQuantityError, NotFoundError } from '../core/errors';
import { logger } from '../core/logger';
import { EntityId, OperationContext, Product, Quantity } from '../core/types';
import { LedgerTransaction } from '../repositories/ledger.store';
import { Metrics, MetricsCollector } from '../utils/metrics';
import { AuditRecorder } from './audit.recorder';

type StockCounter = Extract<keyof Metrics, 'reservations' | 'releases' | 'restocks'>;

export function assertPositiveQuantity(quantity: number, max?: number): void {
  if (!Number.isInteger(quantity) || quantity < 1 || (max !== undefined && quantity > max)) {
    throw new InvalidQuantityError(quantity, { min: 1, max });
  }
}

/**
 * Inventory adjuster. Every stock change in the system goes through
 * `applyStockChange`, inside the caller's transaction.
 */
export class InventoryService {
  constructor(
    private readonly audit: AuditRecorder,
    private readonly metrics: MetricsCollector
  ) {}

  /**
   * Take `quantity` units out of an active product's stock
   */
  reserveStock(tx: LedgerTransaction, productId: EntityId, quantity: Quantity, ctx: OperationContext): Product {
    assertPositiveQuantity(quantity);

    const product = this.requireProduct(tx, productId);
    if (!product.active) {
      throw NotFoundError.inactive('product', productId);
    }
    if (quantity > product.stock) {
      throw InsufficientInventoryError.reserve(productId, quantity, product.stock);
    }

    return this.applyStockChange(tx, product, product.stock - quantity, 'reservations', ctx);
  }

  /**
   * Put `quantity` units back. Inactive products take their stock back too.
   */
  releaseStock(tx: LedgerTransaction, productId: EntityId, quantity: Quantity, ctx: OperationContext): Product {
    assertPositiveQuantity(quantity);

    const product = this.requireProduct(tx, productId);
    return this.applyStockChange(tx, product, product.stock + quantity, 'releases', ctx);
  }

  /**
   * Add stock to an existing product when an identical one is created again
   */
  restockOnDuplicateCreate(
    tx: LedgerTransaction,
    existingProductId: EntityId,
    quantity: Quantity,
    ctx: OperationContext
  ): Product {
    if (!Number.isInteger(quantity) || quantity < 0) {
      throw new InvalidQuantityError(quantity, { min: 0 });
    }

    const product = this.requireProduct(tx, existingProductId);
    return this.applyStockChange(tx, product, product.stock + quantity, 'restocks', ctx);
  }

  /**
   * Absolute stock correction by an operator
   */
  setStock(tx: LedgerTransaction, productId: EntityId, stock: Quantity, ctx: OperationContext): Product {
    if (!Number.isInteger(stock) || stock < 0) {
      throw new InvalidQuantityError(stock, { min: 0 });
    }

    const product = this.requireProduct(tx, productId);
    const counter: StockCounter = stock < product.stock ? 'reservations' : 'restocks';
    return this.applyStockChange(tx, product, stock, counter, ctx);
  }

  private requireProduct(tx: LedgerTransaction, productId: EntityId): Product {
    const product = tx.get('product', productId);
    if (!product) {
      throw NotFoundError.entity('product', productId);
    }
    return product;
  }

  private applyStockChange(
    tx: LedgerTransaction,
    product: Product,
    stock: Quantity,
    counter: StockCounter,
    ctx: OperationContext
  ): Product {
    if (stock === product.stock) {
      return product;
    }

    const updated = this.audit.recordUpdate(tx, 'product', product.id, { stock }, ctx);

    tx.afterCommit(() => {
      this.metrics.increment(counter);
      logger.debug({ productId: product.id, from: product.stock, to: stock, counter }, 'Stock changed');
    });

    return updated;
  }
}
