/**
 * Carpooling - Request Schemas
 *
 * @module addons/carpool/validation
 */

import { z } from 'zod';
import { dateTimeSchema, nameSchema, nonEmptyPatch } from '@social-api/shared';

const priceSchema = z.number().finite().nonnegative();
const seatsSchema = z.number().int().min(1);
const detourSchema = z.number().int().nonnegative();

export const createOfferSchema = z.object({
    departureLocation: nameSchema,
    departureTime: dateTimeSchema,
    price: priceSchema,
    availableSeats: seatsSchema,
    maxDetourMinutes: detourSchema,
});

export const updateOfferSchema = nonEmptyPatch({
    departureLocation: nameSchema.optional(),
    departureTime: dateTimeSchema.optional(),
    price: priceSchema.optional(),
    availableSeats: seatsSchema.optional(),
    maxDetourMinutes: detourSchema.optional(),
});
