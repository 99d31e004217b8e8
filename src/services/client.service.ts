import { ConflictError, NotFoundError } from '../core/errors';
import { Client, CreateClientRequest, EntityId, OperationContext } from '../core/types';
import { clientRepository } from '../repositories/client.repo';
import { AuditRecorder } from './audit.recorder';
import { lockKey, UnitOfWork } from './unit-of-work';

export class ClientService {
  constructor(
    private readonly uow: UnitOfWork,
    private readonly audit: AuditRecorder
  ) {}

  /**
   * Register the customer profile of a user; one per user
   */
  async createClient(input: CreateClientRequest, ctx: OperationContext): Promise<Client> {
    return this.uow.run('createClient', [lockKey.client(input.userId)], ctx, tx => {
      const existing = clientRepository.findByUserId(tx, input.userId);
      if (existing) {
        throw ConflictError.duplicate('client', input.userId, existing.id);
      }

      return this.audit.recordCreate(tx, 'client', meta => ({
        ...meta,
        userId: input.userId,
        firstName: input.firstName,
        lastName: input.lastName,
        phone: input.phone,
        address: input.address,
      }), ctx);
    });
  }

  async getClient(id: EntityId): Promise<Client> {
    const client = await this.uow.read(reader => clientRepository.getClient(reader, id));
    if (!client) {
      throw NotFoundError.entity('client', id);
    }
    return client;
  }

  async getClientByUserId(userId: string): Promise<Client> {
    const client = await this.uow.read(reader => clientRepository.findByUserId(reader, userId));
    if (!client) {
      throw new NotFoundError(`No client for user ${userId}`, 'client', userId);
    }
    return client;
  }
}
