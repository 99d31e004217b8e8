import { AuditLogEntry, EntityId, EntityType } from '../core/types';
import { AuditFilters, auditLogRepository } from '../repositories/audit.repo';
import { UnitOfWork } from './unit-of-work';

// Read side of the audit trail
export class AuditLogService {
  constructor(private readonly uow: UnitOfWork) {}

  async queryAuditLog(filters: AuditFilters = {}): Promise<AuditLogEntry[]> {
    return this.uow.read(reader => auditLogRepository.query(reader, filters));
  }

  async getEntityHistory(entityType: EntityType, entityId: EntityId): Promise<AuditLogEntry[]> {
    return this.uow.read(reader => auditLogRepository.history(reader, entityType, entityId));
  }

  async countEntries(): Promise<number> {
    return this.uow.read(reader => auditLogRepository.count(reader));
  }
}
