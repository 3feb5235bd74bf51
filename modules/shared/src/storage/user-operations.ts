/**
 * Social Events API - User Storage Operations
 *
 * Key Pattern:
 *   PK: USER#<user_id>     SK: PROFILE
 *   PK: EMAIL#<email>      SK: USER      (uniqueness marker)
 *
 * @module storage/user-operations
 */

import type { EmailMarkerItem, UserItem } from '../../../shared_types/user';
import { ConflictError, ErrorMessages, NotFoundError } from '../errors';
import { isUserItem } from '../type-guards';
import { getTyped, newId, timestamp } from './common';
import { Keys } from './keys';
import { ConditionFailedError, type TableGateway } from './types';

export interface NewUser {
    /** Already normalized */
    email: string;
    fullName: string;
    passwordHash: string;
}

/**
 * Retrieve a user by id.
 */
export async function getUser(db: TableGateway, userId: string): Promise<UserItem | null> {
    return getTyped(db, Keys.user(userId), isUserItem);
}

/**
 * Find a user through the email marker.
 *
 * @param email - normalized email address
 */
export async function getUserByEmail(db: TableGateway, email: string): Promise<UserItem | null> {
    const marker = await db.get(Keys.email(email));
    if (!marker || typeof marker.userId !== 'string') {
        return null;
    }
    return getUser(db, marker.userId);
}

/**
 * Create a user and its email marker in one transaction.
 *
 * @throws ConflictError if the email is already registered
 */
export async function createUser(db: TableGateway, input: NewUser): Promise<UserItem> {
    const now = timestamp();
    const userId = newId();

    const user: UserItem = {
        ...Keys.user(userId),
        entityType: 'USER',
        userId,
        email: input.email,
        fullName: input.fullName,
        passwordHash: input.passwordHash,
        isActive: true,
        createdAt: now,
        updatedAt: now,
    };

    const marker: EmailMarkerItem = {
        ...Keys.email(input.email),
        entityType: 'EMAIL_MARKER',
        userId,
        createdAt: now,
        updatedAt: now,
    };

    try {
        await db.transact([
            { type: 'put', item: user, conditions: [{ kind: 'notExists' }] },
            { type: 'put', item: marker, conditions: [{ kind: 'notExists' }] },
        ]);
    } catch (err) {
        if (err instanceof ConditionFailedError) {
            throw new ConflictError(ErrorMessages.EMAIL_TAKEN);
        }
        throw err;
    }

    return user;
}

/**
 * Update the mutable profile fields of a user.
 *
 * @throws NotFoundError if the user no longer exists
 */
export async function updateUser(
    db: TableGateway,
    userId: string,
    changes: { fullName?: string }
): Promise<UserItem> {
    const now = timestamp();
    try {
        await db.transact([
            {
                type: 'update',
                key: Keys.user(userId),
                set: { ...changes, updatedAt: now },
                conditions: [{ kind: 'exists' }],
            },
        ]);
    } catch (err) {
        if (err instanceof ConditionFailedError) {
            throw NotFoundError.of('User');
        }
        throw err;
    }

    const user = await getUser(db, userId);
    if (!user) {
        throw NotFoundError.of('User');
    }
    return user;
}
