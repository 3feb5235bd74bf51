/**
 * Shopping List - Request Schemas
 *
 * @module addons/shopping/validation
 */

import { z } from 'zod';
import { dateTimeSchema, nameSchema, nonEmptyPatch } from '@social-api/shared';

const quantitySchema = z.number().int().min(1);

export const createItemSchema = z.object({
    name: nameSchema,
    quantity: quantitySchema,
    arrivalTime: dateTimeSchema,
});

export const updateItemSchema = nonEmptyPatch({
    name: nameSchema.optional(),
    quantity: quantitySchema.optional(),
    arrivalTime: dateTimeSchema.optional(),
});
