/**
 * Identity & Auth - Request Schemas
 *
 * @module identity/auth/validation
 */

import { z } from 'zod';
import { FieldLimits, emailSchema, nameSchema, normalizeEmail } from '@social-api/shared';

export const registerSchema = z.object({
    email: emailSchema,
    password: z.string().min(FieldLimits.PASSWORD_MIN).max(FieldLimits.PASSWORD_MAX),
    fullName: nameSchema,
});

export type RegisterRequest = z.output<typeof registerSchema>;

/**
 * Login does not validate the email format: an unknown or malformed
 * address is a credential failure like any other.
 */
export const loginSchema = z.object({
    email: z.string().min(1).max(FieldLimits.NAME_MAX).transform(normalizeEmail),
    password: z.string().min(1).max(FieldLimits.PASSWORD_MAX),
});

/** OAuth2 password form (`application/x-www-form-urlencoded`) */
export const tokenFormSchema = z.object({
    grant_type: z.literal('password').optional(),
    username: z.string().min(1).max(FieldLimits.NAME_MAX).transform(normalizeEmail),
    password: z.string().min(1).max(FieldLimits.PASSWORD_MAX),
});
