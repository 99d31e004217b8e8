import { EntityId, Order, OrderLine, OrderStatus } from '../core/types';
import { LedgerReader } from './ledger.types';

export interface OrderFilters {
  clientId?: EntityId;
  status?: OrderStatus;
}

const oldestFirst = <T extends { createdAt: string; id: string }>(a: T, b: T): number =>
  a.createdAt.localeCompare(b.createdAt) || a.id.localeCompare(b.id);

export class OrderRepository {
  getOrder(reader: LedgerReader, id: EntityId): Order | undefined {
    return reader.get('order', id);
  }

  getLine(reader: LedgerReader, orderId: EntityId, lineId: EntityId): OrderLine | undefined {
    const line = reader.get('orderLine', lineId);
    return line && line.orderId === orderId ? line : undefined;
  }

  linesOf(reader: LedgerReader, orderId: EntityId): OrderLine[] {
    return reader.find('orderLine', line => line.orderId === orderId).sort(oldestFirst);
  }

  listOrders(reader: LedgerReader, filters: OrderFilters = {}): Order[] {
    return reader
      .find('order', order =>
        (filters.clientId === undefined || order.clientId === filters.clientId) &&
        (filters.status === undefined || order.status === filters.status)
      )
      .sort(oldestFirst);
  }
}

export const orderRepository = new OrderRepository();
