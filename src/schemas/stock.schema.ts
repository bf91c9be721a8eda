import { z } from 'zod';
import { DOCUMENT_TYPES } from '../domains/inventory/types';

const identifier = z.string().min(1).max(128);
const optionalIdentifier = identifier.nullable().optional();
const quantity = z.number().finite().positive();
export const isoDate = z.string().datetime({ offset: true }).transform((value) => new Date(value));

export const documentRefSchema = z.object({
  documentType: z.enum(DOCUMENT_TYPES),
  documentId: identifier
});

export const positionKeySchema = z.object({
  productId: identifier,
  variantId: optionalIdentifier.transform((value) => value ?? null),
  warehouseId: identifier,
  locationId: optionalIdentifier.transform((value) => value ?? null),
  batchId: optionalIdentifier.transform((value) => value ?? null)
});

export const positionAttributesSchema = z.object({
  valuationMethod: z.enum(['FIFO', 'LIFO']).optional(),
  standardCost: z.number().finite().nonnegative().optional(),
  qualityGrade: z.string().max(16).nullable().optional(),
  expiryDate: isoDate.nullable().optional(),
  locationDistance: z.number().finite().nonnegative().nullable().optional()
});

export const positionSchema = positionKeySchema.merge(positionAttributesSchema);

const movementMeta = {
  reason: z.string().max(255).nullable().optional(),
  referenceId: z.string().min(1).max(255).nullable().optional(),
  document: documentRefSchema.nullable().optional()
};

export const receiptSchema = positionSchema.extend({
  quantity,
  unitCost: z.number().finite().nonnegative(),
  landedCostPerUnit: z.number().finite().nonnegative().optional(),
  receivedAt: isoDate.optional(),
  ...movementMeta
});

export const movementSchema = z.object({
  quantity,
  ...movementMeta
});

export const adjustSchema = z.object({
  newOnHand: z.number().finite().nonnegative(),
  reason: z.string().min(1).max(255),
  referenceId: movementMeta.referenceId,
  document: movementMeta.document
});

export const pipelineSchema = z
  .object({
    incoming: z.number().finite().nonnegative().optional(),
    inTransit: z.number().finite().nonnegative().optional()
  })
  .refine((value) => value.incoming !== undefined || value.inTransit !== undefined, {
    message: 'incoming or inTransit is required'
  });

export const transferSchema = z.object({
  fromPositionId: z.string().uuid(),
  to: positionSchema,
  quantity,
  ...movementMeta
});

export const availabilityQuerySchema = z.object({
  productId: identifier,
  warehouseId: identifier,
  variantId: identifier.optional()
});

export const historyQuerySchema = z.object({
  from: isoDate.optional(),
  to: isoDate.optional()
});

export const reverseSchema = z.object({
  reason: z.string().min(1).max(255),
  referenceId: movementMeta.referenceId
});

export const documentQuerySchema = z.object({
  documentType: z.enum(DOCUMENT_TYPES),
  documentId: identifier
});
