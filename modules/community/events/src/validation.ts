/**
 * Event & Participation - Request Schemas
 *
 * @module community/events/validation
 */

import { z } from 'zod';
import {
    FieldLimits,
    ParticipantStatuses,
    dateTimeSchema,
    descriptionSchema,
    idSchema,
    nameSchema,
    nonEmptyPatch,
} from '@social-api/shared';

/**
 * An event, its organizer links and the existence checks of the other
 * organizers share one 100-operation transaction.
 */
const MAX_EXTRA_ORGANIZERS = 48;

const participantStatusSchema = z.enum([
    ParticipantStatuses.GOING,
    ParticipantStatuses.INTERESTED,
    ParticipantStatuses.DECLINED,
]);

const coverPhotoSchema = z.string().trim().min(1).max(FieldLimits.URL_MAX);

export const DATE_ORDER_MESSAGE = 'endDate must be after startDate';

export function isAfter(end: string, start: string): boolean {
    return Date.parse(end) > Date.parse(start);
}

export const createEventSchema = z
    .object({
        name: nameSchema,
        description: descriptionSchema.optional(),
        startDate: dateTimeSchema,
        endDate: dateTimeSchema,
        location: nameSchema,
        coverPhoto: coverPhotoSchema.optional(),
        isPrivate: z.boolean().default(false),
        groupId: idSchema.optional(),
        pollsEnabled: z.boolean().default(true),
        ticketingEnabled: z.boolean().default(false),
        shoppingListEnabled: z.boolean().default(false),
        carpoolEnabled: z.boolean().default(false),
        organizerIds: z.array(idSchema).max(MAX_EXTRA_ORGANIZERS).default([]),
    })
    .strict()
    .refine((event) => isAfter(event.endDate, event.startDate), {
        message: DATE_ORDER_MESSAGE,
        path: ['endDate'],
    });

/** `null` clears an optional field; date order is checked against the stored event */
export const updateEventSchema = nonEmptyPatch({
    name: nameSchema.optional(),
    description: descriptionSchema.nullable().optional(),
    startDate: dateTimeSchema.optional(),
    endDate: dateTimeSchema.optional(),
    location: nameSchema.optional(),
    coverPhoto: coverPhotoSchema.nullable().optional(),
    isPrivate: z.boolean().optional(),
    pollsEnabled: z.boolean().optional(),
    ticketingEnabled: z.boolean().optional(),
    shoppingListEnabled: z.boolean().optional(),
    carpoolEnabled: z.boolean().optional(),
});

export const addOrganizerSchema = z.object({ userId: idSchema }).strict();

/** `userId` defaults to the caller (joining) */
export const addParticipantSchema = z
    .object({
        userId: idSchema.optional(),
        status: participantStatusSchema.default(ParticipantStatuses.GOING),
    })
    .strict();

export const updateParticipantSchema = z.object({ status: participantStatusSchema }).strict();
