/**
 * Discussion - Request Schemas
 *
 * @module community/discussions/validation
 */

import { z } from 'zod';
import { FieldLimits, idSchema, nameSchema, storage } from '@social-api/shared';

export const createThreadSchema = z
    .object({
        title: nameSchema,
        context: z.enum(['group', 'event']),
        groupId: idSchema.optional(),
        eventId: idSchema.optional(),
    })
    .strict()
    .superRefine((thread, issues) => {
        const [required, forbidden] = thread.context === 'group'
            ? (['groupId', 'eventId'] as const)
            : (['eventId', 'groupId'] as const);

        if (thread[required] === undefined) {
            issues.addIssue({
                code: z.ZodIssueCode.custom,
                path: [required],
                message: `${required} is required when context is ${thread.context}`,
            });
        }
        if (thread[forbidden] !== undefined) {
            issues.addIssue({
                code: z.ZodIssueCode.custom,
                path: [forbidden],
                message: `${forbidden} is not allowed when context is ${thread.context}`,
            });
        }
    });

export type CreateThreadRequest = z.output<typeof createThreadSchema>;

/**
 * Turn a validated request into a scope. Only reached with exactly one
 * id present, matching the context.
 */
export function toScope(input: CreateThreadRequest): storage.ThreadScope | null {
    if (input.context === 'group' && input.groupId !== undefined) {
        return { context: 'group', groupId: input.groupId };
    }
    if (input.context === 'event' && input.eventId !== undefined) {
        return { context: 'event', eventId: input.eventId };
    }
    return null;
}

/** `?groupId=` or `?eventId=`, exactly one */
export const listThreadsQuerySchema = z
    .object({
        groupId: idSchema.optional(),
        eventId: idSchema.optional(),
    })
    .refine((query) => (query.groupId === undefined) !== (query.eventId === undefined), {
        message: 'Exactly one of groupId or eventId is required',
        path: ['groupId'],
    });

export const postMessageSchema = z
    .object({
        content: z.string().trim().min(1).max(FieldLimits.MESSAGE_MAX),
        parentId: idSchema.optional(),
    })
    .strict();

export const messagesQuerySchema = z.object({
    view: z.enum(['flat', 'tree']).default('flat'),
});
