import { z } from 'zod';
import {
  FULFILLMENT_STRATEGIES,
  RESERVATION_PRIORITIES,
  RESERVATION_STATUSES,
  RESERVATION_TYPES
} from '../domains/inventory/types';
import { documentRefSchema, isoDate } from './stock.schema';

const identifier = z.string().min(1).max(128);

export const reservationItemSchema = z.object({
  productId: identifier,
  variantId: identifier.nullable().optional(),
  quantity: z.number().finite().positive(),
  preferredWarehouseId: identifier.nullable().optional(),
  preferredLocationId: identifier.nullable().optional(),
  preferredBatchId: identifier.nullable().optional(),
  qualityGradeRequired: z.string().max(16).nullable().optional(),
  minShelfLifeDays: z.number().int().nonnegative().nullable().optional(),
  manualPositionIds: z.array(z.string().uuid()).optional()
});

export const reservationSchema = z.object({
  reservationType: z.enum(RESERVATION_TYPES),
  priority: z.enum(RESERVATION_PRIORITIES).optional(),
  strategy: z.enum(FULFILLMENT_STRATEGIES).optional(),
  warehouseId: identifier.nullable().optional(),
  sourceDocument: documentRefSchema.nullable().optional(),
  requiredAt: isoDate.optional(),
  expiresAt: isoDate,
  autoReleaseOnExpiry: z.boolean().optional(),
  autoAllocate: z.boolean().optional(),
  partialFulfillmentAllowed: z.boolean().optional(),
  sendExpiryNotifications: z.boolean().optional(),
  notificationLeadTimeHours: z.number().int().nonnegative().optional(),
  notes: z.string().max(2000).nullable().optional(),
  items: z.array(reservationItemSchema).min(1)
});

export const reservationListQuerySchema = z.object({
  status: z
    .string()
    .optional()
    .transform((value) => (value ? value.split(',') : undefined))
    .pipe(z.array(z.enum(RESERVATION_STATUSES)).optional()),
  reservationType: z.enum(RESERVATION_TYPES).optional(),
  limit: z.coerce.number().int().positive().max(500).optional()
});

export const allocateSchema = z.object({
  commit: z.boolean().optional(),
  manualPositionIds: z.array(z.string().uuid()).optional()
});

export const cancelSchema = z.object({
  reason: z.string().min(1).max(255)
});

export const extendSchema = z.object({
  expiresAt: isoDate,
  reason: z.string().min(1).max(255)
});

export const escalateSchema = z.object({
  escalatedTo: identifier,
  reason: z.string().min(1).max(255)
});

export const itemQuantitySchema = z.object({
  quantity: z.number().finite().positive()
});
