import { v4 as uuidv4 } from 'uuid';
import { ConflictError, PersistenceFailureError, RequestAbortedError } from '../core/errors';
import { productIdentityKey } from '../core/identity';
import { logger } from '../core/logger';
import {
  AuditLogEntry,
  ENTITY_TYPES,
  EntityId,
  EntityRows,
  EntityType,
  RowMeta,
  Version,
} from '../core/types';
import { PerKeyMutex } from '../utils/perKeyMutex';
import {
  emptyLedger,
  LedgerData,
  LedgerPersistence,
  LedgerReader,
  RowPatch,
  Tables,
} from './ledger.types';

type Writes = { [K in EntityType]: Map<EntityId, EntityRows[K] | null> };
type ReadMarks = { [K in EntityType]: Map<EntityId, Version | null> };

export type PendingAuditEntry = Omit<AuditLogEntry, 'sequence'>;

interface UniqueConstraint<K extends EntityType> {
  name: string;
  // null exempts the row from the constraint
  key: (row: EntityRows[K]) => string | null;
}

const UNIQUE_CONSTRAINTS: { [K in EntityType]?: UniqueConstraint<K> } = {
  cartLine: {
    name: 'cart_line_per_product',
    key: (line) => `${line.cartId}:${line.productId}`,
  },
  client: {
    name: 'client_per_user',
    key: (client) => client.userId,
  },
  product: {
    name: 'active_product_identity',
    key: (product) => (product.active ? productIdentityKey(product) : null),
  },
};

const emptyWrites = (): Writes => ({
  category: new Map(),
  product: new Map(),
  client: new Map(),
  cart: new Map(),
  cartLine: new Map(),
  order: new Map(),
  orderLine: new Map(),
});

const emptyReadMarks = (): ReadMarks => ({
  category: new Map(),
  product: new Map(),
  client: new Map(),
  cart: new Map(),
  cartLine: new Map(),
  order: new Map(),
  orderLine: new Map(),
});

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new RequestAbortedError();
  }
}

/**
 * Read-only view of one committed ledger state.
 */
export class LedgerSnapshot implements LedgerReader {
  constructor(protected readonly data: LedgerData) {}

  get<K extends EntityType>(entityType: K, id: EntityId): EntityRows[K] | undefined {
    const row = this.data.tables[entityType][id];
    return row === undefined ? undefined : { ...row };
  }

  find<K extends EntityType>(entityType: K, predicate: (row: EntityRows[K]) => boolean = () => true): EntityRows[K][] {
    return Object.values(this.data.tables[entityType])
      .filter(predicate)
      .map(row => ({ ...row }));
  }

  auditLog(): readonly AuditLogEntry[] {
    return this.data.auditLog;
  }
}

/**
 * Unit of work over a snapshot. Reads remember the version they saw, writes
 * are staged, and nothing reaches the store until `LedgerStore` commits it.
 */
export class LedgerTransaction implements LedgerReader {
  private readonly writes: Writes = emptyWrites();
  private readonly reads: ReadMarks = emptyReadMarks();
  private readonly pendingAudit: PendingAuditEntry[] = [];
  private readonly committedHooks: Array<() => void> = [];

  constructor(private readonly base: LedgerData, private readonly clock: () => Date) {}

  now(): string {
    return this.clock().toISOString();
  }

  get<K extends EntityType>(entityType: K, id: EntityId): EntityRows[K] | undefined {
    const staged = this.writes[entityType];
    if (staged.has(id)) {
      const row = staged.get(id);
      return row === null || row === undefined ? undefined : { ...row };
    }

    const row = this.base.tables[entityType][id];
    this.markRead(entityType, id, row === undefined ? null : row.version);
    return row === undefined ? undefined : { ...row };
  }

  find<K extends EntityType>(entityType: K, predicate: (row: EntityRows[K]) => boolean = () => true): EntityRows[K][] {
    const staged = this.writes[entityType];
    const result: EntityRows[K][] = [];

    for (const row of Object.values(this.base.tables[entityType])) {
      if (!staged.has(row.id) && predicate(row)) {
        this.markRead(entityType, row.id, row.version);
        result.push({ ...row });
      }
    }

    for (const row of staged.values()) {
      if (row !== null && predicate(row)) {
        result.push({ ...row });
      }
    }

    return result;
  }

  auditLog(): readonly AuditLogEntry[] {
    return this.base.auditLog;
  }

  /**
   * Stage a new row. `build` receives the store-assigned id, version and
   * timestamps and returns the complete row.
   */
  insert<K extends EntityType>(entityType: K, build: (meta: RowMeta) => EntityRows[K]): EntityRows[K] {
    const now = this.now();
    const row = build({ id: uuidv4(), version: 1, createdAt: now, updatedAt: now });

    this.markRead(entityType, row.id, null);
    this.writes[entityType].set(row.id, row);
    return { ...row };
  }

  update<K extends EntityType>(entityType: K, id: EntityId, patch: RowPatch<K>): EntityRows[K] | undefined {
    const current = this.get(entityType, id);
    if (current === undefined) {
      return undefined;
    }

    const next: EntityRows[K] = {
      ...current,
      ...patch,
      id: current.id,
      version: current.version + 1,
      createdAt: current.createdAt,
      updatedAt: this.now(),
    };

    this.writes[entityType].set(id, next);
    return { ...next };
  }

  delete<K extends EntityType>(entityType: K, id: EntityId): EntityRows[K] | undefined {
    const current = this.get(entityType, id);
    if (current === undefined) {
      return undefined;
    }

    this.writes[entityType].set(id, null);
    return current;
  }

  appendAudit(entry: Omit<PendingAuditEntry, 'id' | 'timestamp'>): PendingAuditEntry {
    const pending: PendingAuditEntry = { ...entry, id: uuidv4(), timestamp: this.now() };
    this.pendingAudit.push(pending);
    return pending;
  }

  /**
   * Run `hook` once this transaction has been committed. Discarded on rollback.
   */
  afterCommit(hook: () => void): void {
    this.committedHooks.push(hook);
  }

  hasChanges(): boolean {
    return this.pendingAudit.length > 0 || ENTITY_TYPES.some(type => this.writes[type].size > 0);
  }

  /** @internal */
  commitHooks(): readonly (() => void)[] {
    return this.committedHooks;
  }

  /** @internal */
  stagedAudit(): readonly PendingAuditEntry[] {
    return this.pendingAudit;
  }

  /** @internal */
  stagedWrites<K extends EntityType>(entityType: K): ReadonlyMap<EntityId, EntityRows[K] | null> {
    return this.writes[entityType];
  }

  /** @internal */
  readMarks<K extends EntityType>(entityType: K): ReadonlyMap<EntityId, Version | null> {
    return this.reads[entityType];
  }

  private markRead<K extends EntityType>(entityType: K, id: EntityId, version: Version | null): void {
    const marks = this.reads[entityType];
    if (!marks.has(id)) {
      marks.set(id, version);
    }
  }
}

export interface TransactionOptions {
  signal?: AbortSignal;
}

/**
 * In-process ledger with optimistic transactions.
 *
 * Commits are serialized by a single commit lock. A commit is accepted only
 * if every row the transaction read or wrote still has the version it saw;
 * the new state is persisted first and swapped in afterwards, so a failed
 * save leaves both the rows and the audit log untouched.
 */
export class LedgerStore {
  private data: LedgerData = emptyLedger();
  private loading: Promise<void> | null = null;
  private readonly commitLock = new PerKeyMutex();

  constructor(
    private readonly persistence: LedgerPersistence,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Load the persisted ledger once
   */
  async init(): Promise<void> {
    if (!this.loading) {
      this.loading = this.persistence.load()
        .then((loaded) => {
          if (loaded) {
            this.data = loaded;
          }
          logger.info({ auditEntries: this.data.auditLog.length }, 'Ledger loaded');
        })
        .catch((error: unknown) => {
          this.loading = null;
          logger.error({ error }, 'Failed to load ledger');
          throw new PersistenceFailureError('load', error);
        });
    }
    return this.loading;
  }

  async snapshot(): Promise<LedgerSnapshot> {
    await this.init();
    return new LedgerSnapshot(this.data);
  }

  /**
   * Run `fn` in a transaction and commit its staged writes atomically.
   * Throws whatever `fn` throws (nothing is committed), ConflictError when a
   * concurrent commit touched the same rows, RequestAbortedError when the
   * signal fired first, PersistenceFailureError when the save failed.
   */
  async transaction<T>(fn: (tx: LedgerTransaction) => Promise<T>, options: TransactionOptions = {}): Promise<T> {
    await this.init();
    throwIfAborted(options.signal);

    const tx = new LedgerTransaction(this.data, this.clock);
    const result = await fn(tx);

    if (tx.hasChanges()) {
      await this.commitLock.acquire('commit', () => this.commit(tx, options.signal));
    }
    return result;
  }

  private async commit(tx: LedgerTransaction, signal: AbortSignal | undefined): Promise<void> {
    throwIfAborted(signal);

    for (const entityType of ENTITY_TYPES) {
      this.validateReads(tx, entityType);
    }

    const next: LedgerData = {
      ...this.data,
      tables: { ...this.data.tables },
      auditLog: [...this.data.auditLog],
    };

    for (const entityType of ENTITY_TYPES) {
      this.applyWrites(tx, entityType, next.tables);
    }

    for (const entityType of ENTITY_TYPES) {
      this.checkUnique(tx, entityType, next.tables);
    }

    let sequence = next.lastSequence;
    for (const pending of tx.stagedAudit()) {
      sequence++;
      next.auditLog.push({ ...pending, sequence });
    }
    next.lastSequence = sequence;

    try {
      await this.persistence.save(next);
    } catch (error) {
      logger.error({ error }, 'Failed to persist ledger commit, rolling back');
      throw new PersistenceFailureError('commit', error);
    }

    this.data = next;

    for (const hook of tx.commitHooks()) {
      hook();
    }
  }

  private validateReads<K extends EntityType>(tx: LedgerTransaction, entityType: K): void {
    const table = this.data.tables[entityType];
    for (const [id, seen] of tx.readMarks(entityType)) {
      const current = table[id];
      const actual = current === undefined ? null : current.version;
      if (actual === seen) {
        continue;
      }
      if (seen === null) {
        throw ConflictError.alreadyExists(entityType, id);
      }
      throw ConflictError.versionMismatch(entityType, id, seen, actual ?? undefined);
    }
  }

  private applyWrites<K extends EntityType>(tx: LedgerTransaction, entityType: K, tables: { [P in K]: Record<EntityId, EntityRows[P]> }): void {
    const staged = tx.stagedWrites(entityType);
    if (staged.size === 0) {
      return;
    }

    const table: Record<EntityId, EntityRows[K]> = { ...tables[entityType] };
    for (const [id, row] of staged) {
      if (row === null) {
        delete table[id];
      } else {
        table[id] = row;
      }
    }
    tables[entityType] = table;
  }

  private checkUnique<K extends EntityType>(tx: LedgerTransaction, entityType: K, tables: Tables): void {
    const constraint: UniqueConstraint<K> | undefined = UNIQUE_CONSTRAINTS[entityType];
    const staged = tx.stagedWrites(entityType);
    if (!constraint || staged.size === 0) {
      return;
    }

    const changedKeys = new Set<string>();
    for (const row of staged.values()) {
      const key = row === null ? null : constraint.key(row);
      if (key !== null) {
        changedKeys.add(key);
      }
    }
    if (changedKeys.size === 0) {
      return;
    }

    const seen = new Set<string>();
    for (const row of Object.values(tables[entityType])) {
      const key = constraint.key(row);
      if (key === null || !changedKeys.has(key)) {
        continue;
      }
      if (seen.has(key)) {
        throw ConflictError.uniqueViolation(entityType, constraint.name, key);
      }
      seen.add(key);
    }
  }
}
