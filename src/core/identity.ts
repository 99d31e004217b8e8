import { EntityId } from './types';

/**
 * Canonical form used when comparing catalog text: trimmed, inner
 * whitespace collapsed to one space, lower-cased.
 */
export function normalizeText(value: string): string {
  return value.trim().replace(/\s+/g, ' ').toLowerCase();
}

export interface ProductIdentity {
  categoryId: EntityId;
  name: string;
  description: string;
}

/**
 * Two products are identical when they share a category and their
 * normalized name and description match.
 */
export function productIdentityKey(product: ProductIdentity): string {
  return JSON.stringify([product.categoryId, normalizeText(product.name), normalizeText(product.description)]);
}
