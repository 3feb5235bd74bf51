/**
 * Ticketing - Request Schemas
 *
 * @module commerce/tickets/validation
 */

import { z } from 'zod';
import { FieldLimits, emailSchema, nameSchema, nonEmptyPatch } from '@social-api/shared';

const priceSchema = z.number().finite().nonnegative();
const quantitySchema = z.number().int().nonnegative();

export const createTicketTypeSchema = z.object({
    name: nameSchema,
    price: priceSchema,
    quantity: quantitySchema,
});

export const updateTicketTypeSchema = nonEmptyPatch({
    name: nameSchema.optional(),
    price: priceSchema.optional(),
    quantity: quantitySchema.optional(),
});

export const purchaseSchema = z.object({
    purchaserFirstName: nameSchema,
    purchaserLastName: nameSchema,
    purchaserEmail: emailSchema,
    purchaserAddress: z.string().trim().min(1).max(FieldLimits.DESCRIPTION_MAX).optional(),
});
