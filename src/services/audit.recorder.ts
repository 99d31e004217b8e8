import { NotFoundError } from '../core/errors';
import {
  AuditAction,
  EntityId,
  EntityRows,
  EntityType,
  OperationContext,
  RowMeta,
} from '../core/types';
import { RowPatch } from '../repositories/ledger.types';
import { LedgerTransaction } from '../repositories/ledger.store';
import { MetricsCollector } from '../utils/metrics';

const META_FIELDS: ReadonlySet<string> = new Set(['id', 'version', 'createdAt', 'updatedAt']);

type Snapshot = Record<string, unknown>;

function snapshotOf(row: object): Snapshot {
  const snapshot: Snapshot = {};
  for (const [key, value] of Object.entries(row)) {
    snapshot[key] = value;
  }
  return snapshot;
}

// Business fields whose value differs between two snapshots
export function changedFields(before: Snapshot | null, after: Snapshot | null): string[] {
  const keys = new Set([...Object.keys(before ?? {}), ...Object.keys(after ?? {})]);
  return [...keys]
    .filter(key => !META_FIELDS.has(key))
    .filter(key => before === null || after === null || !Object.is(before[key], after[key]))
    .sort();
}

/**
 * Writes watched rows and their audit entries in the same transaction, so an
 * entry exists exactly when its mutation was committed.
 */
export class AuditRecorder {
  constructor(private readonly metrics: MetricsCollector) {}

  recordCreate<K extends EntityType>(
    tx: LedgerTransaction,
    entityType: K,
    build: (meta: RowMeta) => EntityRows[K],
    ctx: OperationContext
  ): EntityRows[K] {
    const row = tx.insert(entityType, build);
    this.append(tx, entityType, row.id, 'create', null, snapshotOf(row), ctx);
    return row;
  }

  /**
   * Apply `patch` to a row. A patch that changes nothing is not written and
   * not recorded; the current row is returned as is.
   */
  recordUpdate<K extends EntityType>(
    tx: LedgerTransaction,
    entityType: K,
    id: EntityId,
    patch: RowPatch<K>,
    ctx: OperationContext
  ): EntityRows[K] {
    const current = tx.get(entityType, id);
    if (current === undefined) {
      throw NotFoundError.entity(entityType, id);
    }

    const before = snapshotOf(current);
    if (changedFields(before, { ...before, ...snapshotOf(patch) }).length === 0) {
      return current;
    }

    const updated = tx.update(entityType, id, patch);
    if (updated === undefined) {
      throw NotFoundError.entity(entityType, id);
    }

    this.append(tx, entityType, id, 'update', before, snapshotOf(updated), ctx);
    return updated;
  }

  recordDelete<K extends EntityType>(
    tx: LedgerTransaction,
    entityType: K,
    id: EntityId,
    ctx: OperationContext
  ): EntityRows[K] {
    const removed = tx.delete(entityType, id);
    if (removed === undefined) {
      throw NotFoundError.entity(entityType, id);
    }

    this.append(tx, entityType, id, 'delete', snapshotOf(removed), null, ctx);
    return removed;
  }

  private append(
    tx: LedgerTransaction,
    entityType: EntityType,
    entityId: EntityId,
    action: AuditAction,
    before: Snapshot | null,
    after: Snapshot | null,
    ctx: OperationContext
  ): void {
    tx.appendAudit({
      entityType,
      entityId,
      action,
      actorId: ctx.actor.id,
      before,
      after,
      changes: changedFields(before, after),
      context: { ...ctx.audit },
    });
    tx.afterCommit(() => this.metrics.increment('auditEntries'));
  }
}
