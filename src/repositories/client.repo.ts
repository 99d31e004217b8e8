import { Client, EntityId } from '../core/types';
import { LedgerReader } from './ledger.types';

export class ClientRepository {
  getClient(reader: LedgerReader, id: EntityId): Client | undefined {
    return reader.get('client', id);
  }

  findByUserId(reader: LedgerReader, userId: string): Client | undefined {
    const [client] = reader.find('client', candidate => candidate.userId === userId);
    return client;
  }
}

export const clientRepository = new ClientRepository();
