import { AppConfig, IN_MEMORY_DATA_DIR } from '../core/config';
import { JsonFilePersistence, MemoryPersistence } from '../repositories/ledger.persistence';
import { LedgerStore } from '../repositories/ledger.store';
import { LedgerPersistence } from '../repositories/ledger.types';
import { MetricsCollector } from '../utils/metrics';
import { AuditRecorder } from './audit.recorder';
import { AuditLogService } from './audit.service';
import { CartService } from './cart.service';
import { CatalogService } from './catalog.service';
import { ClientService } from './client.service';
import { InventoryService } from './inventory.service';
import { OrderService } from './order.service';
import { UnitOfWork } from './unit-of-work';

export interface Services {
  config: AppConfig;
  store: LedgerStore;
  uow: UnitOfWork;
  metrics: MetricsCollector;
  recorder: AuditRecorder;
  audit: AuditLogService;
  inventory: InventoryService;
  catalog: CatalogService;
  clients: ClientService;
  carts: CartService;
  orders: OrderService;
}

export interface ServiceOverrides {
  persistence?: LedgerPersistence;
  clock?: () => Date;
}

export function createPersistence(config: AppConfig): LedgerPersistence {
  if (config.DATA_DIR === IN_MEMORY_DATA_DIR) {
    return new MemoryPersistence();
  }
  return new JsonFilePersistence(config.DATA_DIR, {
    retries: config.FS_RETRY_TIMES,
    baseDelayMs: config.FS_RETRY_BASE_MS,
    jitterMs: config.FS_RETRY_BASE_MS,
  });
}

/**
 * Wire the services for one ledger
 */
export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Services {
  const metrics = new MetricsCollector();
  const store = new LedgerStore(overrides.persistence ?? createPersistence(config), overrides.clock);
  const uow = new UnitOfWork(store, {
    retries: config.CONFLICT_RETRIES,
    baseDelayMs: config.CONFLICT_RETRY_BASE_MS,
    jitterMs: config.CONFLICT_RETRY_BASE_MS,
  }, metrics);

  const limits = { maxLineQuantity: config.MAX_LINE_QUANTITY };
  const recorder = new AuditRecorder(metrics);
  const inventory = new InventoryService(recorder, metrics);
  const orders = new OrderService(uow, recorder, inventory, limits);

  return {
    config,
    store,
    uow,
    metrics,
    recorder,
    audit: new AuditLogService(uow),
    inventory,
    catalog: new CatalogService(uow, recorder, inventory),
    clients: new ClientService(uow, recorder),
    carts: new CartService(uow, recorder, orders, metrics, limits),
    orders,
  };
}
