/**
 * Identity & Auth - POST /api/auth/register
 *
 * The profile and the email marker are written in one transaction, both
 * under attribute_not_exists, so two concurrent registrations of the same
 * address cannot both succeed.
 *
 * @module identity/auth/register
 */

import {
    created,
    hashPassword,
    parseBody,
    storage,
    toUserResponse,
    type ApiResponse,
    type RequestContext,
} from '@social-api/shared';
import { registerSchema } from './validation';

export async function register(ctx: RequestContext): Promise<ApiResponse> {
    const input = parseBody(registerSchema, ctx.request);

    const passwordHash = await hashPassword(input.password, ctx.config.passwordHashing);
    const user = await storage.createUser(ctx.db, {
        email: input.email,
        fullName: input.fullName,
        passwordHash,
    });

    ctx.audit.byUser('USER_REGISTERED', user.userId, { email: user.email });

    return created(toUserResponse(user));
}
