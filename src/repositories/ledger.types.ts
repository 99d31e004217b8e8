import { AuditLogEntry, EntityId, EntityRows, EntityType } from '../core/types';

// One record per watched entity type, keyed by id
export type Tables = { [K in EntityType]: Record<EntityId, EntityRows[K]> };

export interface LedgerData {
  schemaVersion: 1;
  tables: Tables;
  auditLog: AuditLogEntry[];
  lastSequence: number;
}

export const emptyLedger = (): LedgerData => ({
  schemaVersion: 1,
  tables: {
    category: {},
    product: {},
    client: {},
    cart: {},
    cartLine: {},
    order: {},
    orderLine: {},
  },
  auditLog: [],
  lastSequence: 0,
});

/**
 * Durable home of the ledger. `save` must replace the stored ledger
 * atomically: after a crash either the old or the new document is found.
 */
export interface LedgerPersistence {
  load(): Promise<LedgerData | null>;
  save(data: LedgerData): Promise<void>;
}

// Read access shared by transactions and snapshots
export interface LedgerReader {
  get<K extends EntityType>(entityType: K, id: EntityId): EntityRows[K] | undefined;
  find<K extends EntityType>(entityType: K, predicate?: (row: EntityRows[K]) => boolean): EntityRows[K][];
  auditLog(): readonly AuditLogEntry[];
}

// Column values a caller may set; id, version and timestamps belong to the store
export type RowInput<K extends EntityType> = Omit<EntityRows[K], 'id' | 'version' | 'createdAt' | 'updatedAt'>;
export type RowPatch<K extends EntityType> = Partial<RowInput<K>>;
