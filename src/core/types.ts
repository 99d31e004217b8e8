import { z } from 'zod';

// Base types
export type EntityId = string;
export type Version = number;
export type Quantity = number;
export type Money = number;
export type IsoTimestamp = string;

// Zod schemas for validation
export const EntityIdSchema = z.string().uuid();
export const VersionSchema = z.number().int().positive();
export const StockSchema = z.number().int().min(0);
export const PriceSchema = z.number().finite().min(0);

// Columns every ledger row carries
export interface RowMeta {
  id: EntityId;
  version: Version;
  createdAt: IsoTimestamp;
  updatedAt: IsoTimestamp;
}

export interface Category extends RowMeta {
  name: string;
  shortDescription: string;
  longDescription: string | null;
  active: boolean;
}

export interface Product extends RowMeta {
  categoryId: EntityId;
  name: string;
  description: string;
  price: Money;
  stock: Quantity;
  active: boolean;
  imageUrl: string | null;
}

export interface Client extends RowMeta {
  userId: string;
  firstName: string;
  lastName: string;
  phone: string | null;
  address: string | null;
}

export const CART_STATUSES = ['active', 'completed'] as const;
export type CartStatus = typeof CART_STATUSES[number];

export interface Cart extends RowMeta {
  clientId: EntityId;
  status: CartStatus;
}

export interface CartLine extends RowMeta {
  cartId: EntityId;
  productId: EntityId;
  quantity: Quantity;
  unitPrice: Money;
  subtotal: Money;
}

export const ORDER_STATUSES = [
  'pending',
  'payment_confirmed',
  'preparing',
  'out_for_delivery',
  'ready_for_pickup',
  'delivered',
  'cancelled',
] as const;
export type OrderStatus = typeof ORDER_STATUSES[number];

// Orders in these states accept no further changes
export const FINAL_ORDER_STATUSES: readonly OrderStatus[] = ['delivered', 'cancelled'];

export const PAYMENT_METHODS = ['paypal', 'card', 'cash'] as const;
export type PaymentMethod = typeof PAYMENT_METHODS[number];

export interface Order extends RowMeta {
  clientId: EntityId;
  status: OrderStatus;
  shippingAddress: string;
  paymentMethod: PaymentMethod;
  total: Money;
}

export interface OrderLine extends RowMeta {
  orderId: EntityId;
  productId: EntityId;
  quantity: Quantity;
  unitPrice: Money;
  subtotal: Money;
}

// Audit trail
export const AUDIT_ACTIONS = ['create', 'update', 'delete'] as const;
export type AuditAction = typeof AUDIT_ACTIONS[number];

export interface AuditContext {
  requestId?: string;
  method?: string;
  path?: string;
  ip?: string;
}

export interface AuditLogEntry {
  id: EntityId;
  sequence: number;
  entityType: EntityType;
  entityId: EntityId;
  action: AuditAction;
  actorId: string | null;
  timestamp: IsoTimestamp;
  before: Record<string, unknown> | null;
  after: Record<string, unknown> | null;
  changes: string[];
  context: AuditContext;
}

// Watched entity types and their row shapes
export interface EntityRows {
  category: Category;
  product: Product;
  client: Client;
  cart: Cart;
  cartLine: CartLine;
  order: Order;
  orderLine: OrderLine;
}

export type EntityType = keyof EntityRows;
export const ENTITY_TYPES = [
  'category',
  'product',
  'client',
  'cart',
  'cartLine',
  'order',
  'orderLine',
] as const satisfies readonly EntityType[];

// Callers
export const ACTOR_ROLES = ['anonymous', 'customer', 'admin', 'super_admin'] as const;
export type ActorRole = typeof ACTOR_ROLES[number];
export const PRIVILEGED_ROLES: readonly ActorRole[] = ['admin', 'super_admin'];

export interface Actor {
  id: string | null;
  role: ActorRole;
}

export const SYSTEM_ACTOR: Actor = Object.freeze({ id: null, role: 'anonymous' });

export function isPrivileged(actor: Actor): boolean {
  return PRIVILEGED_ROLES.includes(actor.role);
}

/**
 * Who is calling, and on behalf of which request
 */
export interface OperationContext {
  actor: Actor;
  audit?: AuditContext;
  signal?: AbortSignal;
}

// Trimmed, non-blank text
const Text = (max: number) => z.string().trim().min(1).max(max);

// API request schemas
export const IdParamsSchema = z.object({
  id: EntityIdSchema,
});

export const LineParamsSchema = z.object({
  id: EntityIdSchema,
  lineId: EntityIdSchema,
});

export const UserIdParamsSchema = z.object({
  userId: Text(255),
});

export const AuditHistoryParamsSchema = z.object({
  entityType: z.enum(ENTITY_TYPES),
  entityId: EntityIdSchema,
});

const BooleanQuery = z
  .enum(['true', 'false'])
  .optional()
  .transform(value => value === 'true');

const PaginationQuery = {
  offset: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(100).default(100),
};

export const CreateCategoryRequestSchema = z.object({
  name: Text(255),
  shortDescription: Text(255),
  longDescription: z.string().trim().max(5000).nullable().default(null),
});

export const UpdateCategoryRequestSchema = CreateCategoryRequestSchema.partial();

export const ListCategoriesQuerySchema = z.object({
  includeInactive: BooleanQuery,
});

export const CreateProductRequestSchema = z.object({
  categoryId: EntityIdSchema,
  name: Text(255),
  description: Text(5000),
  price: PriceSchema,
  stock: StockSchema,
  imageUrl: z.string().trim().url().max(255).nullable().default(null),
});

export const UpdateProductRequestSchema = z.object({
  categoryId: EntityIdSchema.optional(),
  name: Text(255).optional(),
  description: Text(5000).optional(),
  price: PriceSchema.optional(),
  imageUrl: z.string().trim().url().max(255).nullable().optional(),
  expectedVersion: VersionSchema.optional(),
});

export const SetStockRequestSchema = z.object({
  stock: StockSchema,
});

export const ListProductsQuerySchema = z.object({
  includeInactive: BooleanQuery,
  categoryId: EntityIdSchema.optional(),
  name: z.string().trim().min(1).max(255).optional(),
  ...PaginationQuery,
});

export const CreateClientRequestSchema = z.object({
  userId: Text(255),
  firstName: Text(255),
  lastName: Text(255),
  phone: z.string().trim().max(15).nullable().default(null),
  address: z.string().trim().max(5000).nullable().default(null),
});

export const CreateCartRequestSchema = z.object({
  clientId: EntityIdSchema,
});

export const ListCartsQuerySchema = z.object({
  clientId: EntityIdSchema.optional(),
  status: z.enum(CART_STATUSES).optional(),
});

// Quantities are checked by the services so that zero/negative values surface as InvalidQuantity
export const AddToCartRequestSchema = z.object({
  productId: EntityIdSchema,
  quantity: z.number().int(),
});

export const LineQuantityRequestSchema = z.object({
  quantity: z.number().int(),
});

export const ShippingAddressSchema = z.string().trim().min(5).max(5000);

export const CheckoutRequestSchema = z.object({
  shippingAddress: ShippingAddressSchema,
  paymentMethod: z.enum(PAYMENT_METHODS).default('paypal'),
});

export const CreateOrderRequestSchema = z.object({
  clientId: EntityIdSchema,
  shippingAddress: ShippingAddressSchema,
  paymentMethod: z.enum(PAYMENT_METHODS).default('paypal'),
});

export const CreateOrderLineRequestSchema = z.object({
  productId: EntityIdSchema,
  quantity: z.number().int(),
});

export const UpdateOrderStatusRequestSchema = z.object({
  status: z.enum(ORDER_STATUSES),
});

export const ListOrdersQuerySchema = z.object({
  clientId: EntityIdSchema.optional(),
  status: z.enum(ORDER_STATUSES).optional(),
});

export const AuditQuerySchema = z.object({
  entityType: z.enum(ENTITY_TYPES).optional(),
  entityId: EntityIdSchema.optional(),
  actorId: z.string().min(1).max(255).optional(),
  action: z.enum(AUDIT_ACTIONS).optional(),
  from: z.coerce.date().optional(),
  to: z.coerce.date().optional(),
  ...PaginationQuery,
});

export type CreateCategoryRequest = z.infer<typeof CreateCategoryRequestSchema>;
export type UpdateCategoryRequest = z.infer<typeof UpdateCategoryRequestSchema>;
export type CreateProductRequest = z.infer<typeof CreateProductRequestSchema>;
export type UpdateProductRequest = z.infer<typeof UpdateProductRequestSchema>;
export type CreateClientRequest = z.infer<typeof CreateClientRequestSchema>;
export type CheckoutRequest = z.infer<typeof CheckoutRequestSchema>;
export type CreateOrderRequest = z.infer<typeof CreateOrderRequestSchema>;
