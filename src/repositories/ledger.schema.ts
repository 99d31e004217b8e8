import { z } from 'zod';
import {
  AUDIT_ACTIONS,
  CART_STATUSES,
  ENTITY_TYPES,
  ORDER_STATUSES,
  PAYMENT_METHODS,
} from '../core/types';
import { LedgerData } from './ledger.types';

// Shape check for a ledger document read back from disk
const RowMetaSchema = {
  id: z.string(),
  version: z.number().int().positive(),
  createdAt: z.string(),
  updatedAt: z.string(),
};

const CategoryRowSchema = z.object({
  ...RowMetaSchema,
  name: z.string(),
  shortDescription: z.string(),
  longDescription: z.string().nullable(),
  active: z.boolean(),
});

const ProductRowSchema = z.object({
  ...RowMetaSchema,
  categoryId: z.string(),
  name: z.string(),
  description: z.string(),
  price: z.number().min(0),
  stock: z.number().int().min(0),
  active: z.boolean(),
  imageUrl: z.string().nullable(),
});

const ClientRowSchema = z.object({
  ...RowMetaSchema,
  userId: z.string(),
  firstName: z.string(),
  lastName: z.string(),
  phone: z.string().nullable(),
  address: z.string().nullable(),
});

const CartRowSchema = z.object({
  ...RowMetaSchema,
  clientId: z.string(),
  status: z.enum(CART_STATUSES),
});

const LineRowSchema = {
  ...RowMetaSchema,
  productId: z.string(),
  quantity: z.number().int().positive(),
  unitPrice: z.number().min(0),
  subtotal: z.number().min(0),
};

const CartLineRowSchema = z.object({ ...LineRowSchema, cartId: z.string() });
const OrderLineRowSchema = z.object({ ...LineRowSchema, orderId: z.string() });

const OrderRowSchema = z.object({
  ...RowMetaSchema,
  clientId: z.string(),
  status: z.enum(ORDER_STATUSES),
  shippingAddress: z.string(),
  paymentMethod: z.enum(PAYMENT_METHODS),
  total: z.number().min(0),
});

const AuditLogEntrySchema = z.object({
  id: z.string(),
  sequence: z.number().int().positive(),
  entityType: z.enum(ENTITY_TYPES),
  entityId: z.string(),
  action: z.enum(AUDIT_ACTIONS),
  actorId: z.string().nullable(),
  timestamp: z.string(),
  before: z.record(z.unknown()).nullable(),
  after: z.record(z.unknown()).nullable(),
  changes: z.array(z.string()),
  context: z.object({
    requestId: z.string().optional(),
    method: z.string().optional(),
    path: z.string().optional(),
    ip: z.string().optional(),
  }),
});

export const LedgerDataSchema = z.object({
  schemaVersion: z.literal(1),
  tables: z.object({
    category: z.record(CategoryRowSchema),
    product: z.record(ProductRowSchema),
    client: z.record(ClientRowSchema),
    cart: z.record(CartRowSchema),
    cartLine: z.record(CartLineRowSchema),
    order: z.record(OrderRowSchema),
    orderLine: z.record(OrderLineRowSchema),
  }),
  auditLog: z.array(AuditLogEntrySchema),
  lastSequence: z.number().int().min(0),
});

export function parseLedgerData(raw: unknown): LedgerData {
  return LedgerDataSchema.parse(raw);
}
