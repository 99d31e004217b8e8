import { describe, it, expect } from 'vitest';
import { normalizeText, productIdentityKey } from '../../src/core/identity';

describe('product identity', () => {
  it('should normalize whitespace and case', () => {
    expect(normalizeText('  Cold   Brew\tCoffee ')).toBe('cold brew coffee');
  });

  it('should treat differently spaced and cased products as identical', () => {
    const a = { categoryId: 'cat-1', name: 'Cold Brew', description: 'Slow steeped coffee' };
    const b = { categoryId: 'cat-1', name: ' cold  BREW ', description: 'slow steeped   COFFEE' };

    expect(productIdentityKey(b)).toBe(productIdentityKey(a));
    expect(productIdentityKey(a)).toBe('["cat-1","cold brew","slow steeped coffee"]');
  });

  it('should tell apart products in other categories', () => {
    const a = { categoryId: 'cat-1', name: 'Cold Brew', description: 'Slow steeped coffee' };
    expect(productIdentityKey({ ...a, categoryId: 'cat-2' })).not.toBe(productIdentityKey(a));
  });

  it('should tell apart products whose texts differ', () => {
    const a = { categoryId: 'cat-1', name: 'Cold Brew', description: 'Slow steeped coffee' };
    expect(productIdentityKey({ ...a, description: 'Slow steeped tea' })).not.toBe(productIdentityKey(a));
  });
});
