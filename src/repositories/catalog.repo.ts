import { normalizeText, ProductIdentity, productIdentityKey } from '../core/identity';
import { Category, EntityId, Product } from '../core/types';
import { LedgerReader } from './ledger.types';

export interface ProductFilters {
  includeInactive?: boolean;
  categoryId?: EntityId;
  // Case-insensitive substring of the product name
  name?: string;
  offset?: number;
  limit?: number;
}

export interface CategoryFilters {
  includeInactive?: boolean;
}

const byName = <T extends { name: string; id: string }>(a: T, b: T): number =>
  a.name.localeCompare(b.name) || a.id.localeCompare(b.id);

export class CatalogRepository {
  /**
   * Get a product, optionally hiding inactive ones
   */
  getProduct(reader: LedgerReader, id: EntityId, includeInactive = false): Product | undefined {
    const product = reader.get('product', id);
    if (!product || (!product.active && !includeInactive)) {
      return undefined;
    }
    return product;
  }

  /**
   * Find the active product identical to `candidate`, if any
   */
  findIdenticalActiveProduct(reader: LedgerReader, candidate: ProductIdentity): Product | undefined {
    const key = productIdentityKey(candidate);
    const [match] = reader.find('product', product =>
      product.active && product.categoryId === candidate.categoryId && productIdentityKey(product) === key
    );
    return match;
  }

  /**
   * List products, active only unless told otherwise
   */
  listProducts(reader: LedgerReader, filters: ProductFilters = {}): Product[] {
    const needle = filters.name === undefined ? undefined : normalizeText(filters.name);
    const offset = filters.offset ?? 0;
    const limit = filters.limit ?? Number.MAX_SAFE_INTEGER;

    return reader
      .find('product', product =>
        (filters.includeInactive === true || product.active) &&
        (filters.categoryId === undefined || product.categoryId === filters.categoryId) &&
        (needle === undefined || normalizeText(product.name).includes(needle))
      )
      .sort(byName)
      .slice(offset, offset + limit);
  }

  getCategory(reader: LedgerReader, id: EntityId, includeInactive = false): Category | undefined {
    const category = reader.get('category', id);
    if (!category || (!category.active && !includeInactive)) {
      return undefined;
    }
    return category;
  }

  listCategories(reader: LedgerReader, filters: CategoryFilters = {}): Category[] {
    return reader
      .find('category', category => filters.includeInactive === true || category.active)
      .sort(byName);
  }
}

export const catalogRepository = new CatalogRepository();
