import { ConflictError } from '../core/errors';
import { logger } from '../core/logger';
import { OperationContext } from '../core/types';
import { LedgerReader } from '../repositories/ledger.types';
import { LedgerStore, LedgerTransaction } from '../repositories/ledger.store';
import { MetricsCollector } from '../utils/metrics';
import { PerKeyMutex } from '../utils/perKeyMutex';
import { RetryPolicy, withRetry } from '../utils/retry';

// Mutex keys for the rows a unit of work serializes on
export const lockKey = {
  product: (productId: string) => `product:${productId}`,
  cart: (cartId: string) => `cart:${cartId}`,
  order: (orderId: string) => `order:${orderId}`,
  client: (userId: string) => `client:${userId}`,
};

/**
 * Runs one business operation as a single ledger transaction.
 *
 * The named keys are held for the whole attempt; a ConflictError from the
 * commit releases them, backs off and starts over from a fresh snapshot.
 */
export class UnitOfWork {
  private readonly mutex = new PerKeyMutex();

  constructor(
    private readonly store: LedgerStore,
    private readonly retryPolicy: RetryPolicy,
    private readonly metrics: MetricsCollector
  ) {}

  async run<T>(
    operationName: string,
    lockKeys: readonly string[],
    ctx: OperationContext,
    fn: (tx: LedgerTransaction) => Promise<T> | T
  ): Promise<T> {
    return withRetry(
      async () => {
        try {
          return await this.mutex.acquireMany(lockKeys, () =>
            this.store.transaction(async tx => fn(tx), { signal: ctx.signal })
          );
        } catch (error) {
          if (error instanceof ConflictError && error.retryable) {
            this.metrics.increment('conflicts');
            logger.debug({ operationName, lockKeys, error: error.message }, 'Commit conflict');
          }
          throw error;
        }
      },
      this.retryPolicy,
      error => error instanceof ConflictError && error.retryable,
      operationName,
      { lockKeys, actorId: ctx.actor.id }
    );
  }

  /**
   * Read from the latest committed state without locking
   */
  async read<T>(fn: (reader: LedgerReader) => T): Promise<T> {
    const snapshot = await this.store.snapshot();
    return fn(snapshot);
  }

  getLockStatus(): Record<string, boolean> {
    return this.mutex.getLockStatus();
  }
}
