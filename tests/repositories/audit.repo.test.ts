import { describe, it, expect, beforeEach } from 'vitest';
import { AuditAction } from '../../src/core/types';
import { auditLogRepository } from '../../src/repositories/audit.repo';
import { MemoryPersistence } from '../../src/repositories/ledger.persistence';
import { LedgerSnapshot, LedgerStore } from '../../src/repositories/ledger.store';

describe('AuditLogRepository', () => {
  let snapshot: LedgerSnapshot;

  beforeEach(async () => {
    const times = ['2024-01-01T00:00:00.000Z', '2024-01-02T00:00:00.000Z', '2024-01-03T00:00:00.000Z'];
    let tick = 0;
    const store = new LedgerStore(new MemoryPersistence(), () => new Date(times[tick] ?? '2024-01-31T00:00:00.000Z'));

    const entries: Array<[string, AuditAction, string | null]> = [
      ['p1', 'create', 'admin-1'],
      ['p1', 'update', 'admin-2'],
      ['p2', 'create', null],
    ];
    for (const [entityId, action, actorId] of entries) {
      await store.transaction(async tx => {
        tx.appendAudit({
          entityType: 'product',
          entityId,
          action,
          actorId,
          before: null,
          after: null,
          changes: [],
          context: {},
        });
      });
      tick++;
    }
    snapshot = await store.snapshot();
  });

  it('should return entries oldest first', () => {
    expect(auditLogRepository.query(snapshot).map(e => e.sequence)).toEqual([1, 2, 3]);
  });

  it('should hand out copies of the committed entries', () => {
    for (const entry of auditLogRepository.query(snapshot)) {
      entry.action = 'delete';
      entry.after = { stock: -1 };
    }

    const [again] = auditLogRepository.history(snapshot, 'product', 'p1');
    expect(again?.action).toBe('create');
    expect(again?.after).toBeNull();
    expect(auditLogRepository.query(snapshot, { action: 'delete' })).toEqual([]);
  });

  it('should filter by entity, actor and action', () => {
    expect(auditLogRepository.query(snapshot, { entityId: 'p1' }).map(e => e.sequence)).toEqual([1, 2]);
    expect(auditLogRepository.query(snapshot, { actorId: 'admin-2' }).map(e => e.sequence)).toEqual([2]);
    expect(auditLogRepository.query(snapshot, { action: 'create' }).map(e => e.sequence)).toEqual([1, 3]);
    expect(auditLogRepository.query(snapshot, { entityType: 'order' })).toEqual([]);
  });

  it('should treat the time range as inclusive', () => {
    const result = auditLogRepository.query(snapshot, {
      from: new Date('2024-01-02T00:00:00.000Z'),
      to: new Date('2024-01-03T00:00:00.000Z'),
    });
    expect(result.map(e => e.sequence)).toEqual([2, 3]);
  });

  it('should paginate', () => {
    expect(auditLogRepository.query(snapshot, { offset: 1, limit: 1 }).map(e => e.sequence)).toEqual([2]);
  });

  it('should return the full history of one entity', () => {
    expect(auditLogRepository.history(snapshot, 'product', 'p1').map(e => e.action)).toEqual(['create', 'update']);
  });
});
