/**
 * Social Events API - Request Validation
 *
 * Request bodies are described by zod schemas. A failed parse becomes a
 * ValidationError (422) listing one `{ field, message }` per issue, with
 * `field` the dotted path of the offending value.
 *
 * @module validation/schema
 */

import { z } from 'zod';
import { FieldLimits } from '../constants';
import { ErrorMessages, ValidationError, type FieldError } from '../errors';

/** Raw request as seen by route functions */
export interface BodySource {
    /** Decoded body text, undefined when the request has none */
    body?: string;
}

// =============================================================================
// Parsing
// =============================================================================

function toFieldErrors(error: z.ZodError): FieldError[] {
    return error.issues.map((issue) => ({
        field: issue.path.length > 0 ? issue.path.join('.') : 'body',
        message: issue.message,
    }));
}

/**
 * Validate a value against a schema.
 *
 * @throws ValidationError listing every issue
 */
export function validate<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
    const result = schema.safeParse(value);
    if (!result.success) {
        throw new ValidationError(ErrorMessages.VALIDATION_FAILED, toFieldErrors(result.error));
    }
    return result.data;
}

/**
 * Parse a JSON request body.
 *
 * @throws ValidationError on a missing or unparsable body
 */
export function readJson(request: BodySource): unknown {
    if (request.body === undefined || request.body.trim() === '') {
        throw ValidationError.field('body', ErrorMessages.BODY_REQUIRED);
    }
    try {
        return JSON.parse(request.body);
    } catch {
        throw ValidationError.field('body', ErrorMessages.INVALID_JSON);
    }
}

/**
 * Parse an `application/x-www-form-urlencoded` body into a plain object.
 */
export function readForm(request: BodySource): Record<string, string> {
    return Object.fromEntries(new URLSearchParams(request.body ?? ''));
}

/**
 * Parse and validate a JSON request body.
 *
 * @example
 * ```typescript
 * const input = parseBody(createGroupSchema, ctx.request);
 * ```
 */
export function parseBody<S extends z.ZodTypeAny>(schema: S, request: BodySource): z.output<S> {
    return validate(schema, readJson(request));
}

// =============================================================================
// Shared Field Schemas
// =============================================================================

/** Trimmed, non-empty name */
export const nameSchema = z.string().trim().min(1).max(FieldLimits.NAME_MAX);

export const descriptionSchema = z.string().trim().max(FieldLimits.DESCRIPTION_MAX);

export const urlSchema = z.string().trim().url().max(FieldLimits.URL_MAX);

/**
 * ISO 8601 date-time with offset, e.g. 2026-06-01T18:00:00+02:00, stored
 * in UTC (`2026-06-01T16:00:00.000Z`). Index sort keys are built from the
 * stored value, so string order is time order.
 */
export const dateTimeSchema = z
    .string()
    .datetime({ offset: true })
    .transform((value) => new Date(value).toISOString());

export const idSchema = z.string().trim().min(1).max(FieldLimits.NAME_MAX);

/** Body of a PATCH: at least one field */
export function nonEmptyPatch<T extends z.ZodRawShape>(shape: T) {
    return z
        .object(shape)
        .strict()
        .refine((value) => Object.values(value).some((field) => field !== undefined), {
            message: 'At least one field must be provided',
        });
}
