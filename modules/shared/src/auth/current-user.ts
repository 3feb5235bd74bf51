/**
 * Social Events API - Current User Resolution
 *
 * @module auth/current-user
 */

import type { UserItem } from '../../../shared_types/user';
import type { ApiConfig } from '../config';
import { ErrorMessages, ForbiddenError, UnauthorizedError } from '../errors';
import { getUser } from '../storage/user-operations';
import type { TableGateway } from '../storage/types';
import { extractBearerToken, verifyAccessToken } from './token';

/**
 * Resolve the user behind a request's Authorization header.
 *
 * @throws UnauthorizedError when the token is missing, invalid, expired or
 *         names a user that no longer exists
 * @throws ForbiddenError when the user is inactive
 */
export async function resolveCurrentUser(
    db: TableGateway,
    config: ApiConfig,
    authorization: string | undefined
): Promise<UserItem> {
    const token = extractBearerToken(authorization);
    if (!token) {
        throw new UnauthorizedError(ErrorMessages.MISSING_TOKEN);
    }

    const userId = await verifyAccessToken(token, config);
    const user = await getUser(db, userId);
    if (!user) {
        throw new UnauthorizedError(ErrorMessages.INVALID_TOKEN);
    }
    if (!user.isActive) {
        throw new ForbiddenError(ErrorMessages.ACCOUNT_INACTIVE);
    }
    return user;
}
