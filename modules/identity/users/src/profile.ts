/**
 * Identity & Auth - User Profiles
 *
 * - GET   /api/users/me
 * - PATCH /api/users/me        `{ fullName }`
 * - GET   /api/users/{userId}
 *
 * @module identity/users/profile
 */

import { z } from 'zod';
import {
    NotFoundError,
    nameSchema,
    nonEmptyPatch,
    parseBody,
    pathParam,
    storage,
    success,
    toUserResponse,
    type ApiResponse,
    type AuthenticatedContext,
} from '@social-api/shared';

export const updateProfileSchema = nonEmptyPatch({
    fullName: nameSchema.optional(),
});

export type UpdateProfileRequest = z.output<typeof updateProfileSchema>;

export async function getMe(ctx: AuthenticatedContext): Promise<ApiResponse> {
    return success(toUserResponse(ctx.user));
}

export async function updateMe(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const changes = parseBody(updateProfileSchema, ctx.request);
    const user = await storage.updateUser(ctx.db, ctx.user.userId, changes);

    ctx.audit.byUser('USER_UPDATED', user.userId, { fields: Object.keys(changes) });

    return success(toUserResponse(user));
}

export async function getUserById(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const user = await storage.getUser(ctx.db, pathParam(ctx, 'userId'));
    if (!user) {
        throw NotFoundError.of('User');
    }
    return success(toUserResponse(user));
}
