import { describe, it, expect, beforeEach } from 'vitest';
import { ConflictError, ForbiddenError, InvalidQuantityError, NotFoundError, ValidationError } from '../../src/core/errors';
import { Category, Product } from '../../src/core/types';
import { Services } from '../../src/services/container';
import { adminCtx, createTestServices, customerCtx, seedCategory, seedProduct } from '../helpers/services';

describe('CatalogService', () => {
  let services: Services;
  let category: Category;

  beforeEach(async () => {
    services = createTestServices();
    category = await seedCategory(services);
  });

  const create = (overrides: { name?: string; description?: string; stock?: number; price?: number } = {}) =>
    services.catalog.createProduct({
      categoryId: category.id,
      name: overrides.name ?? 'Cold Brew',
      description: overrides.description ?? 'Slow steeped coffee',
      price: overrides.price ?? 4.5,
      stock: overrides.stock ?? 10,
      imageUrl: null,
    }, adminCtx);

  describe('categories', () => {
    it('should create active categories', () => {
      expect(category.active).toBe(true);
      expect(category.shortDescription).toBe('Beverages aisle');
    });

    it('should patch only the given fields', async () => {
      const updated = await services.catalog.updateCategory(category.id, { name: 'Drinks' }, adminCtx);

      expect(updated.name).toBe('Drinks');
      expect(updated.shortDescription).toBe('Beverages aisle');
      expect(updated.version).toBe(2);
    });

    it('should hide deactivated categories from customers', async () => {
      await services.catalog.deactivateCategory(category.id, adminCtx);

      expect(await services.catalog.listCategories(customerCtx())).toEqual([]);
      await expect(services.catalog.getCategory(category.id, customerCtx())).rejects.toBeInstanceOf(NotFoundError);
      const all = await services.catalog.listCategories(adminCtx, { includeInactive: true });
      expect(all.map(c => c.id)).toEqual([category.id]);
    });
  });

  describe('createProduct', () => {
    it('should create a new product with a rounded price', async () => {
      const { product, created } = await create({ price: 4.499 });

      expect(created).toBe(true);
      expect(product.price).toBe(4.5);
      expect(product.stock).toBe(10);
      expect(product.active).toBe(true);
    });

    it('should restock the identical active product instead of duplicating it', async () => {
      const first = await create({ stock: 10 });
      const second = await create({ name: '  cold   BREW ', stock: 5, price: 9 });

      expect(second.created).toBe(false);
      expect(second.product.id).toBe(first.product.id);
      expect(second.product.stock).toBe(15);
      expect(second.product.price).toBe(4.5);
      expect(await services.catalog.listProducts(adminCtx)).toHaveLength(1);

      const history = await services.audit.getEntityHistory('product', first.product.id);
      expect(history.map(e => e.action)).toEqual(['create', 'update']);
      expect(history[1]?.changes).toEqual(['stock']);
    });

    it('should merge concurrent identical creates into one product', async () => {
      const results = await Promise.all([create({ stock: 3 }), create({ stock: 4 })]);

      expect(results.filter(r => r.created)).toHaveLength(1);
      const products = await services.catalog.listProducts(adminCtx);
      expect(products).toHaveLength(1);
      expect(products[0]?.stock).toBe(7);
    });

    it('should treat a different description as a different product', async () => {
      await create();
      const { created } = await create({ description: 'Cold brewed overnight' });

      expect(created).toBe(true);
      expect(await services.catalog.listProducts(adminCtx)).toHaveLength(2);
    });

    it('should not restock an inactive twin', async () => {
      const { product: old } = await create();
      await services.catalog.deactivateProduct(old.id, adminCtx);

      const { product, created } = await create({ stock: 2 });
      expect(created).toBe(true);
      expect(product.id).not.toBe(old.id);
    });

    it('should reject an inactive category', async () => {
      await services.catalog.deactivateCategory(category.id, adminCtx);
      await expect(create()).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should reject a negative or fractional initial stock without writing anything', async () => {
      const auditBefore = await services.audit.countEntries();

      await expect(create({ stock: -3 })).rejects.toBeInstanceOf(InvalidQuantityError);
      await expect(create({ stock: 1.5 })).rejects.toBeInstanceOf(InvalidQuantityError);

      expect(await services.catalog.listProducts(adminCtx)).toEqual([]);
      expect(await services.audit.countEntries()).toBe(auditBefore);
    });

    it('should reject a negative or non-finite price without writing anything', async () => {
      const auditBefore = await services.audit.countEntries();

      const error = await create({ price: -5 }).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ValidationError);
      expect(error instanceof ValidationError && error.field).toBe('price');
      await expect(create({ price: Number.NaN })).rejects.toBeInstanceOf(ValidationError);
      await expect(create({ price: Number.POSITIVE_INFINITY })).rejects.toBeInstanceOf(ValidationError);

      expect(await services.catalog.listProducts(adminCtx)).toEqual([]);
      expect(await services.audit.countEntries()).toBe(auditBefore);
    });

    it('should accept a free product with no stock', async () => {
      const { product } = await create({ price: 0, stock: 0 });

      expect(product.price).toBe(0);
      expect(product.stock).toBe(0);
    });
  });

  describe('updateProduct', () => {
    let product: Product;

    beforeEach(async () => {
      ({ product } = await create());
    });

    it('should check the expected version', async () => {
      const error = await services.catalog.updateProduct(product.id, { price: 5, expectedVersion: 3 }, adminCtx)
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConflictError);
      expect(error instanceof ConflictError && error.retryable).toBe(false);
      expect((await services.catalog.getProduct(product.id, adminCtx)).price).toBe(4.5);
    });

    it('should apply a patch with a matching version', async () => {
      const updated = await services.catalog.updateProduct(product.id, { price: 5, expectedVersion: 1 }, adminCtx);

      expect(updated.price).toBe(5);
      expect(updated.version).toBe(2);
    });

    it('should reject a negative or non-finite price', async () => {
      await expect(services.catalog.updateProduct(product.id, { price: -1 }, adminCtx))
        .rejects.toBeInstanceOf(ValidationError);
      await expect(services.catalog.updateProduct(product.id, { price: Number.NaN }, adminCtx))
        .rejects.toBeInstanceOf(ValidationError);

      const stored = await services.catalog.getProduct(product.id, adminCtx);
      expect(stored.price).toBe(4.5);
      expect(stored.version).toBe(1);
    });

    it('should refuse to turn a product into the twin of another active one', async () => {
      const { product: other } = await create({ name: 'Iced Tea' });

      await expect(services.catalog.updateProduct(other.id, { name: 'Cold Brew' }, adminCtx))
        .rejects.toBeInstanceOf(ConflictError);
    });

    it('should reject a move into an inactive category', async () => {
      const closed = await seedCategory(services, 'Seasonal');
      await services.catalog.deactivateCategory(closed.id, adminCtx);

      await expect(services.catalog.updateProduct(product.id, { categoryId: closed.id }, adminCtx))
        .rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('activation', () => {
    it('should soft delete and restore a product', async () => {
      const { product } = await create();

      await services.catalog.deactivateProduct(product.id, adminCtx);
      await expect(services.catalog.getProduct(product.id, customerCtx())).rejects.toBeInstanceOf(NotFoundError);
      expect(await services.catalog.listProducts(customerCtx())).toEqual([]);

      const restored = await services.catalog.activateProduct(product.id, adminCtx);
      expect(restored.active).toBe(true);
      expect(restored.stock).toBe(10);
    });

    it('should not reactivate a product whose twin is active', async () => {
      const { product: old } = await create();
      await services.catalog.deactivateProduct(old.id, adminCtx);
      await create();

      await expect(services.catalog.activateProduct(old.id, adminCtx)).rejects.toBeInstanceOf(ConflictError);
    });

    it('should record nothing when deactivating twice', async () => {
      const { product } = await create();
      await services.catalog.deactivateProduct(product.id, adminCtx);
      const before = await services.audit.countEntries();

      await services.catalog.deactivateProduct(product.id, adminCtx);
      expect(await services.audit.countEntries()).toBe(before);
    });
  });

  describe('visibility', () => {
    it('should forbid includeInactive to customers', async () => {
      await expect(services.catalog.listProducts(customerCtx(), { includeInactive: true }))
        .rejects.toBeInstanceOf(ForbiddenError);
      await expect(services.catalog.listCategories(customerCtx(), { includeInactive: true }))
        .rejects.toBeInstanceOf(ForbiddenError);
    });

    it('should list inactive products to administrators', async () => {
      const { product } = await create();
      await services.catalog.deactivateProduct(product.id, adminCtx);

      const listed = await services.catalog.listProducts(adminCtx, { includeInactive: true });
      expect(listed.map(p => p.id)).toEqual([product.id]);
    });

    it('should filter by name and category', async () => {
      const snacks = await seedCategory(services, 'Snacks');
      await create();
      await seedProduct(services, { category: snacks, name: 'Salted Pretzels' });

      const byName = await services.catalog.listProducts(customerCtx(), { name: 'PRETZ' });
      expect(byName.map(p => p.name)).toEqual(['Salted Pretzels']);
      const byCategory = await services.catalog.listProducts(customerCtx(), { categoryId: category.id });
      expect(byCategory.map(p => p.name)).toEqual(['Cold Brew']);
    });
  });

  describe('setProductStock', () => {
    it('should set an absolute stock level', async () => {
      const { product } = await create();
      const updated = await services.catalog.setProductStock(product.id, 42, adminCtx);

      expect(updated.stock).toBe(42);
      expect(services.metrics.getMetrics().restocks).toBe(1);
    });
  });
});
