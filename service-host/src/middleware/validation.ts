/**
 * Request Validation
 *
 * Zod schemas for request bodies and query strings. Route handlers call
 * `validateRequest`, which raises a ValidationError listing every issue.
 */

import { z } from 'zod';
import { getLogger } from '../utils/logger.js';
import { ValidationError } from '../utils/errors.js';
import { isMovementType, MovementType } from '../services/ledger.js';
import { AuditAction, isAuditAction } from '../services/audit.js';

const logger = getLogger('Validation');

const trimmed = (max: number) => z.string().trim().max(max);
const minorUnits = z.number().int().nonnegative();
const queryLimit = z.coerce.number().int().min(1).max(1000).optional();

const movementType = z.custom<MovementType>(
  value => typeof value === 'string' && isMovementType(value),
  { message: 'Unknown movement type' }
);

const auditAction = z.custom<AuditAction>(
  value => typeof value === 'string' && isAuditAction(value),
  { message: 'Unknown audit action' }
);

export const schemas = {
  login: z.object({
    username: trimmed(64).min(1),
    pin: z.string().min(1),
    deviceId: trimmed(128).optional(),
  }),

  createOrder: z.object({
    tableId: z.string().min(1).nullable().optional(),
  }),

  listOrders: z.object({
    waiterId: z.string().optional(),
    tableId: z.string().optional(),
  }),

  addItem: z.object({
    productId: z.string().min(1),
    quantity: z.number().positive().finite(),
    specialInstructions: trimmed(500).optional(),
  }),

  cancelOrder: z.object({
    reason: trimmed(500).optional(),
  }),

  payment: z.object({
    amount: z.number().int().positive(),
    method: z.string().min(1),
    transactionReference: trimmed(128).optional(),
  }),

  startShift: z.object({
    openingCash: minorUnits,
  }),

  endShift: z.object({
    closingCash: minorUnits,
  }),

  movement: z.object({
    type: movementType,
    quantity: z.number().finite(),
    reference: trimmed(128).optional(),
    notes: trimmed(500).optional(),
  }),

  movementQuery: z.object({
    type: movementType.optional(),
    limit: queryLimit,
  }),

  price: z.object({
    price: minorUnits,
  }),

  availability: z.object({
    available: z.boolean(),
  }),

  createUser: z.object({
    username: trimmed(64).min(1),
    displayName: trimmed(128).min(1),
    role: z.string().min(1),
    pin: z.string().optional(),
  }),

  createTable: z.object({
    number: trimmed(32).min(1),
    capacity: z.number().int().positive().optional(),
  }),

  createCategory: z.object({
    name: trimmed(128).min(1),
  }),

  createProduct: z.object({
    name: trimmed(128).min(1),
    price: minorUnits,
    sku: trimmed(64).optional(),
    categoryId: z.string().optional(),
    initialStock: z.number().nonnegative().finite().optional(),
    minStockLevel: z.number().nonnegative().finite().optional(),
    unitOfMeasure: trimmed(16).optional(),
    requiresKitchen: z.boolean().optional(),
  }),

  dailyReport: z.object({
    date: z.string().optional(),
  }),

  auditQuery: z.object({
    userId: z.string().optional(),
    actionType: auditAction.optional(),
    from: z.string().optional(),
    to: z.string().optional(),
    limit: queryLimit,
  }),

  auditPurge: z.object({
    days: z.number().int().min(1).optional(),
  }),
};

export function validateRequest<S extends z.ZodTypeAny>(schema: S, data: unknown): z.infer<S> {
  const result = schema.safeParse(data ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    logger.warn('Request validation failed', { issues });
    throw new ValidationError('Invalid request', { issues });
  }
  return result.data;
}
