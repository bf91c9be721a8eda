import { z } from 'zod';
import { COST_ALLOCATION_METHODS, LANDED_COST_TYPES } from '../services/costLayers.service';
import { documentRefSchema } from './stock.schema';

const component = z.number().finite().nonnegative().optional();

export const landedCostSchema = z
  .object({
    freight: component,
    duty: component,
    handling: component,
    other: component
  })
  .refine((value) => Object.values(value).some((amount) => amount !== undefined && amount > 0), {
    message: 'At least one cost component must be positive'
  });

export const documentCostSchema = z.object({
  document: documentRefSchema,
  amount: z.number().finite().positive(),
  costType: z.enum(LANDED_COST_TYPES),
  method: z.enum(COST_ALLOCATION_METHODS).default('QUANTITY')
});
