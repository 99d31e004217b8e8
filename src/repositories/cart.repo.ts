import { Cart, CartLine, CartStatus, EntityId } from '../core/types';
import { LedgerReader } from './ledger.types';

export interface CartFilters {
  clientId?: EntityId;
  status?: CartStatus;
}

const oldestFirst = <T extends { createdAt: string; id: string }>(a: T, b: T): number =>
  a.createdAt.localeCompare(b.createdAt) || a.id.localeCompare(b.id);

export class CartRepository {
  getCart(reader: LedgerReader, id: EntityId): Cart | undefined {
    return reader.get('cart', id);
  }

  /**
   * The line for `productId` in `cartId`; there is never more than one
   */
  findLine(reader: LedgerReader, cartId: EntityId, productId: EntityId): CartLine | undefined {
    const [line] = reader.find('cartLine', candidate =>
      candidate.cartId === cartId && candidate.productId === productId
    );
    return line;
  }

  getLine(reader: LedgerReader, cartId: EntityId, lineId: EntityId): CartLine | undefined {
    const line = reader.get('cartLine', lineId);
    return line && line.cartId === cartId ? line : undefined;
  }

  linesOf(reader: LedgerReader, cartId: EntityId): CartLine[] {
    return reader.find('cartLine', line => line.cartId === cartId).sort(oldestFirst);
  }

  listCarts(reader: LedgerReader, filters: CartFilters = {}): Cart[] {
    return reader
      .find('cart', cart =>
        (filters.clientId === undefined || cart.clientId === filters.clientId) &&
        (filters.status === undefined || cart.status === filters.status)
      )
      .sort(oldestFirst);
  }
}

export const cartRepository = new CartRepository();
