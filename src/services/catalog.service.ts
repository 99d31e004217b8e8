import { ConflictError, ForbiddenError, InvalidQuantityError, NotFoundError, ValidationError } from '../core/errors';
import { productIdentityKey } from '../core/identity';
import { logger } from '../core/logger';
import { roundMoney } from '../core/money';
import {
  Category,
  CreateCategoryRequest,
  CreateProductRequest,
  EntityId,
  isPrivileged,
  OperationContext,
  Product,
  Quantity,
  UpdateCategoryRequest,
  UpdateProductRequest,
} from '../core/types';
import { catalogRepository, CategoryFilters, ProductFilters } from '../repositories/catalog.repo';
import { RowPatch } from '../repositories/ledger.types';
import { LedgerTransaction } from '../repositories/ledger.store';
import { AuditRecorder } from './audit.recorder';
import { InventoryService } from './inventory.service';
import { lockKey, UnitOfWork } from './unit-of-work';

export interface ProductCreation {
  product: Product;
  // false when an identical active product absorbed the stock instead
  created: boolean;
}

export interface VisibilityOptions {
  includeInactive?: boolean;
}

function assertValidPrice(price: number): void {
  if (!Number.isFinite(price) || price < 0) {
    throw new ValidationError('Price must be a finite number >= 0', 'price', price);
  }
}

const identityLock = (product: { categoryId: EntityId; name: string; description: string }) =>
  `identity:${productIdentityKey(product)}`;

export class CatalogService {
  constructor(
    private readonly uow: UnitOfWork,
    private readonly audit: AuditRecorder,
    private readonly inventory: InventoryService
  ) {}

  // Categories

  async createCategory(input: CreateCategoryRequest, ctx: OperationContext): Promise<Category> {
    return this.uow.run('createCategory', [], ctx, tx =>
      this.audit.recordCreate(tx, 'category', meta => ({
        ...meta,
        name: input.name,
        shortDescription: input.shortDescription,
        longDescription: input.longDescription,
        active: true,
      }), ctx)
    );
  }

  async updateCategory(id: EntityId, input: UpdateCategoryRequest, ctx: OperationContext): Promise<Category> {
    const patch: RowPatch<'category'> = {};
    if (input.name !== undefined) patch.name = input.name;
    if (input.shortDescription !== undefined) patch.shortDescription = input.shortDescription;
    if (input.longDescription !== undefined) patch.longDescription = input.longDescription;

    return this.uow.run('updateCategory', [], ctx, tx => {
      this.requireCategory(tx, id);
      return this.audit.recordUpdate(tx, 'category', id, patch, ctx);
    });
  }

  async activateCategory(id: EntityId, ctx: OperationContext): Promise<Category> {
    return this.setCategoryActive(id, true, ctx);
  }

  async deactivateCategory(id: EntityId, ctx: OperationContext): Promise<Category> {
    return this.setCategoryActive(id, false, ctx);
  }

  async getCategory(id: EntityId, ctx: OperationContext, options: VisibilityOptions = {}): Promise<Category> {
    const includeInactive = this.resolveVisibility(ctx, options, 'Viewing inactive categories');
    const category = await this.uow.read(reader => catalogRepository.getCategory(reader, id, includeInactive));
    if (!category) {
      throw NotFoundError.entity('category', id);
    }
    return category;
  }

  async listCategories(ctx: OperationContext, filters: CategoryFilters = {}): Promise<Category[]> {
    const includeInactive = this.resolveVisibility(ctx, filters, 'Listing inactive categories');
    return this.uow.read(reader => catalogRepository.listCategories(reader, { includeInactive }));
  }

  // Products

  /**
   * Create a product, or restock the identical active product if one exists
   */
  async createProduct(input: CreateProductRequest, ctx: OperationContext): Promise<ProductCreation> {
    if (!Number.isInteger(input.stock) || input.stock < 0) {
      throw new InvalidQuantityError(input.stock, { min: 0 });
    }
    assertValidPrice(input.price);

    const result = await this.uow.run('createProduct', [identityLock(input)], ctx, tx => {
      this.requireActiveCategory(tx, input.categoryId);

      const existing = catalogRepository.findIdenticalActiveProduct(tx, input);
      if (existing) {
        const product = this.inventory.restockOnDuplicateCreate(tx, existing.id, input.stock, ctx);
        return { product, created: false };
      }

      const product = this.audit.recordCreate(tx, 'product', meta => ({
        ...meta,
        categoryId: input.categoryId,
        name: input.name,
        description: input.description,
        price: roundMoney(input.price),
        stock: input.stock,
        active: true,
        imageUrl: input.imageUrl,
      }), ctx);
      return { product, created: true };
    });

    if (!result.created) {
      logger.info({ productId: result.product.id, added: input.stock }, 'Duplicate product create merged into existing stock');
    }
    return result;
  }

  /**
   * Patch product details. `expectedVersion`, when given, must match the
   * stored version.
   */
  async updateProduct(id: EntityId, input: UpdateProductRequest, ctx: OperationContext): Promise<Product> {
    const patch: RowPatch<'product'> = {};
    if (input.categoryId !== undefined) patch.categoryId = input.categoryId;
    if (input.name !== undefined) patch.name = input.name;
    if (input.description !== undefined) patch.description = input.description;
    if (input.price !== undefined) {
      assertValidPrice(input.price);
      patch.price = roundMoney(input.price);
    }
    if (input.imageUrl !== undefined) patch.imageUrl = input.imageUrl;

    const current = await this.uow.read(reader => catalogRepository.getProduct(reader, id, true));
    if (!current) {
      throw NotFoundError.entity('product', id);
    }
    const target = { ...current, ...patch };

    return this.uow.run('updateProduct', [lockKey.product(id), identityLock(target)], ctx, tx => {
      const product = this.requireProduct(tx, id);
      if (input.expectedVersion !== undefined && input.expectedVersion !== product.version) {
        throw ConflictError.preconditionFailed('product', id, input.expectedVersion, product.version);
      }
      if (patch.categoryId !== undefined && patch.categoryId !== product.categoryId) {
        this.requireActiveCategory(tx, patch.categoryId);
      }

      const next = { ...product, ...patch };
      if (next.active) {
        this.assertNoActiveTwin(tx, next);
      }
      return this.audit.recordUpdate(tx, 'product', id, patch, ctx);
    });
  }

  async setProductStock(id: EntityId, stock: Quantity, ctx: OperationContext): Promise<Product> {
    return this.uow.run('setProductStock', [lockKey.product(id)], ctx, tx =>
      this.inventory.setStock(tx, id, stock, ctx)
    );
  }

  async activateProduct(id: EntityId, ctx: OperationContext): Promise<Product> {
    const current = await this.uow.read(reader => catalogRepository.getProduct(reader, id, true));
    if (!current) {
      throw NotFoundError.entity('product', id);
    }

    return this.uow.run('activateProduct', [lockKey.product(id), identityLock(current)], ctx, tx => {
      const product = this.requireProduct(tx, id);
      if (product.active) {
        return product;
      }
      this.assertNoActiveTwin(tx, product);
      return this.audit.recordUpdate(tx, 'product', id, { active: true }, ctx);
    });
  }

  async deactivateProduct(id: EntityId, ctx: OperationContext): Promise<Product> {
    return this.uow.run('deactivateProduct', [lockKey.product(id)], ctx, tx => {
      this.requireProduct(tx, id);
      return this.audit.recordUpdate(tx, 'product', id, { active: false }, ctx);
    });
  }

  async getProduct(id: EntityId, ctx: OperationContext, options: VisibilityOptions = {}): Promise<Product> {
    const includeInactive = this.resolveVisibility(ctx, options, 'Viewing inactive products');
    const product = await this.uow.read(reader => catalogRepository.getProduct(reader, id, includeInactive));
    if (!product) {
      throw NotFoundError.entity('product', id);
    }
    return product;
  }

  async listProducts(ctx: OperationContext, filters: ProductFilters = {}): Promise<Product[]> {
    const includeInactive = this.resolveVisibility(ctx, filters, 'Listing inactive products');
    return this.uow.read(reader => catalogRepository.listProducts(reader, { ...filters, includeInactive }));
  }

  private async setCategoryActive(id: EntityId, active: boolean, ctx: OperationContext): Promise<Category> {
    return this.uow.run(active ? 'activateCategory' : 'deactivateCategory', [], ctx, tx => {
      this.requireCategory(tx, id);
      return this.audit.recordUpdate(tx, 'category', id, { active }, ctx);
    });
  }

  private resolveVisibility(ctx: OperationContext, options: VisibilityOptions, operation: string): boolean {
    if (options.includeInactive !== true) {
      return false;
    }
    if (!isPrivileged(ctx.actor)) {
      throw ForbiddenError.privilegedOnly(operation);
    }
    return true;
  }

  private assertNoActiveTwin(tx: LedgerTransaction, product: Product): void {
    const twin = catalogRepository.findIdenticalActiveProduct(tx, product);
    if (twin && twin.id !== product.id) {
      throw ConflictError.duplicate('product', productIdentityKey(product), twin.id);
    }
  }

  private requireCategory(tx: LedgerTransaction, id: EntityId): Category {
    const category = tx.get('category', id);
    if (!category) {
      throw NotFoundError.entity('category', id);
    }
    return category;
  }

  private requireActiveCategory(tx: LedgerTransaction, id: EntityId): Category {
    const category = this.requireCategory(tx, id);
    if (!category.active) {
      throw NotFoundError.inactive('category', id);
    }
    return category;
  }

  private requireProduct(tx: LedgerTransaction, id: EntityId): Product {
    const product = tx.get('product', id);
    if (!product) {
      throw NotFoundError.entity('product', id);
    }
    return product;
  }
}
