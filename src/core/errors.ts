import { EntityId, EntityType, Version } from './types';

// Base domain error class
export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;
  readonly timestamp: string;

  constructor(message: string, public readonly details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date().toISOString();
  }
}

// Validation error for invalid input (400)
export class ValidationError extends DomainError {
  readonly code: string = 'VALIDATION_ERROR';
  readonly statusCode = 400;

  constructor(
    message: string,
    public readonly field?: string,
    public readonly value?: unknown,
    details?: Record<string, unknown>
  ) {
    super(message, { field, value, ...details });
  }

  static emptyCart(cartId: EntityId): ValidationError {
    return new ValidationError(`Cart ${cartId} has no lines to check out`, 'cartId', cartId);
  }
}

// Zero, negative, fractional or oversized quantity (400)
export class InvalidQuantityError extends ValidationError {
  override readonly code = 'INVALID_QUANTITY_ERROR';

  constructor(quantity: number, limits: { min: number; max?: number }) {
    const range = limits.max === undefined
      ? `an integer >= ${limits.min}`
      : `an integer between ${limits.min} and ${limits.max}`;
    super(
      `Invalid quantity: ${quantity}. Quantity must be ${range}.`,
      'quantity',
      quantity,
      { min: limits.min, max: limits.max }
    );
  }
}

// Not found error for missing or inactive resources (404)
export class NotFoundError extends DomainError {
  readonly code = 'NOT_FOUND_ERROR';
  readonly statusCode = 404;

  constructor(
    message: string,
    public readonly resourceType: string,
    public readonly identifier: string,
    details?: Record<string, unknown>
  ) {
    super(message, { resourceType, identifier, ...details });
  }

  static entity(entityType: EntityType, id: EntityId): NotFoundError {
    return new NotFoundError(`${entityType} ${id} not found`, entityType, id);
  }

  static inactive(entityType: EntityType, id: EntityId): NotFoundError {
    return new NotFoundError(`${entityType} ${id} is inactive`, entityType, id, { inactive: true });
  }
}

// Concurrent modification detected; safe to retry (409)
export class ConflictError extends DomainError {
  readonly code = 'CONFLICT_ERROR';
  readonly statusCode = 409;

  constructor(
    message: string,
    public readonly entityType: string,
    public readonly entityId: string,
    public readonly expectedVersion?: Version,
    public readonly actualVersion?: Version,
    details?: Record<string, unknown>
  ) {
    super(message, { entityType, entityId, expectedVersion, actualVersion, ...details });
  }

  // Commit races are retried; failed caller preconditions and duplicates are not
  get retryable(): boolean {
    return this.details?.['retryable'] !== false;
  }

  static preconditionFailed(
    entityType: EntityType,
    entityId: EntityId,
    expectedVersion: Version,
    actualVersion: Version
  ): ConflictError {
    return new ConflictError(
      `Precondition failed for ${entityType} ${entityId}. Expected version: ${expectedVersion}, Actual: ${actualVersion}`,
      entityType,
      entityId,
      expectedVersion,
      actualVersion,
      { retryable: false }
    );
  }

  static duplicate(entityType: EntityType, key: string, existingId: EntityId): ConflictError {
    return new ConflictError(
      `An active ${entityType} with the same identity already exists (${existingId})`,
      entityType,
      key,
      undefined,
      undefined,
      { existingId, retryable: false }
    );
  }

  static versionMismatch(
    entityType: EntityType,
    entityId: EntityId,
    expectedVersion: Version,
    actualVersion: Version | undefined
  ): ConflictError {
    return new ConflictError(
      `Version mismatch for ${entityType} ${entityId}. Expected: ${expectedVersion}, Actual: ${actualVersion ?? 'deleted'}`,
      entityType,
      entityId,
      expectedVersion,
      actualVersion
    );
  }

  static alreadyExists(entityType: EntityType, entityId: EntityId): ConflictError {
    return new ConflictError(
      `${entityType} ${entityId} was created concurrently`,
      entityType,
      entityId
    );
  }

  static uniqueViolation(entityType: EntityType, constraint: string, key: string): ConflictError {
    return new ConflictError(
      `Unique constraint ${constraint} violated for ${entityType} (${key})`,
      entityType,
      key,
      undefined,
      undefined,
      { constraint }
    );
  }
}

// Business logic errors
export class InsufficientInventoryError extends DomainError {
  readonly code = 'INSUFFICIENT_INVENTORY_ERROR';
  readonly statusCode = 422;

  constructor(
    message: string,
    public readonly productId: EntityId,
    public readonly requested: number,
    public readonly available: number,
    details?: Record<string, unknown>
  ) {
    super(message, { productId, requested, available, ...details });
  }

  static reserve(productId: EntityId, requested: number, available: number): InsufficientInventoryError {
    return new InsufficientInventoryError(
      `Insufficient stock to reserve ${requested} units of product ${productId}. Available: ${available}`,
      productId, requested, available
    );
  }
}

// Cart is no longer accepting changes (409)
export class CartNotActiveError extends DomainError {
  readonly code = 'CART_NOT_ACTIVE_ERROR';
  readonly statusCode = 409;

  constructor(public readonly cartId: EntityId, public readonly status: string) {
    super(`Cart ${cartId} is ${status} and cannot be modified`, { cartId, status });
  }
}

// Order reached a final state (409)
export class OrderClosedError extends DomainError {
  readonly code = 'ORDER_CLOSED_ERROR';
  readonly statusCode = 409;

  constructor(public readonly orderId: EntityId, public readonly status: string) {
    super(`Order ${orderId} is ${status} and cannot be modified`, { orderId, status });
  }
}

// Caller lacks the role for this operation (403)
export class ForbiddenError extends DomainError {
  readonly code = 'FORBIDDEN_ERROR';
  readonly statusCode = 403;

  static privilegedOnly(operation: string): ForbiddenError {
    return new ForbiddenError(`${operation} requires an administrator role`, { operation });
  }
}

// Caller went away before the transaction committed (499)
export class RequestAbortedError extends DomainError {
  readonly code = 'REQUEST_ABORTED_ERROR';
  readonly statusCode = 499;

  constructor() {
    super('Request aborted before commit; transaction rolled back');
  }
}

/**
 * Durable-store failure. The underlying cause is kept for logging only and
 * never serialized into the response.
 */
export class PersistenceFailureError extends DomainError {
  readonly code = 'PERSISTENCE_FAILURE';
  readonly statusCode = 500;

  constructor(public readonly operation: string, public readonly failure: unknown) {
    super('The operation could not be completed');
  }
}

// Error factory for creating standardized error responses
export class ErrorFactory {
  static createErrorResponse(error: DomainError) {
    return {
      success: false as const,
      error: {
        name: error.name,
        message: error.message,
        code: error.code,
        statusCode: error.statusCode,
        timestamp: error.timestamp,
        details: error.details,
      },
    };
  }
}
