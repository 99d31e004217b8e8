import { AuditAction, AuditLogEntry, EntityId, EntityType } from '../core/types';
import { LedgerReader } from './ledger.types';

export interface AuditFilters {
  entityType?: EntityType;
  entityId?: EntityId;
  actorId?: string;
  action?: AuditAction;
  // Inclusive bounds
  from?: Date;
  to?: Date;
  offset?: number;
  limit?: number;
}

export class AuditLogRepository {
  /**
   * Entries matching every given filter, oldest first. Entries are copies;
   * the committed log is never handed out.
   */
  query(reader: LedgerReader, filters: AuditFilters = {}): AuditLogEntry[] {
    const from = filters.from?.getTime();
    const to = filters.to?.getTime();
    const offset = filters.offset ?? 0;
    const limit = filters.limit ?? 100;

    return reader
      .auditLog()
      .filter(entry => {
        const ts = Date.parse(entry.timestamp);
        return (filters.entityType === undefined || entry.entityType === filters.entityType) &&
          (filters.entityId === undefined || entry.entityId === filters.entityId) &&
          (filters.actorId === undefined || entry.actorId === filters.actorId) &&
          (filters.action === undefined || entry.action === filters.action) &&
          (from === undefined || ts >= from) &&
          (to === undefined || ts <= to);
      })
      .sort((a, b) => a.sequence - b.sequence)
      .slice(offset, offset + limit)
      .map(entry => structuredClone(entry));
  }

  /**
   * Full history of one entity
   */
  history(reader: LedgerReader, entityType: EntityType, entityId: EntityId): AuditLogEntry[] {
    return this.query(reader, { entityType, entityId, limit: Number.MAX_SAFE_INTEGER });
  }

  count(reader: LedgerReader): number {
    return reader.auditLog().length;
  }
}

export const auditLogRepository = new AuditLogRepository();
