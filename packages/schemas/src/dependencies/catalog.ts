// @module: shared-dependency-catalog
// @tags: catalog, http, schema
import { z } from 'zod';
import { itemIdSchema } from '../rest/offers.js';

export const validateItemsRequestSchema = z.object({
  itemIds: z.array(itemIdSchema).min(1),
});

export type ValidateItemsRequest = z.infer<typeof validateItemsRequestSchema>;

export const itemValidationSchema = z.object({
  itemId: itemIdSchema,
  exists: z.boolean(),
  isActive: z.boolean().default(false),
  ownerId: z.string().min(1).nullable().default(null),
});

export type ItemValidation = z.infer<typeof itemValidationSchema>;

export const validateItemsResponseSchema = z.object({
  validations: z.array(itemValidationSchema),
});

export type ValidateItemsResponse = z.infer<typeof validateItemsResponseSchema>;
