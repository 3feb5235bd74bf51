/**
 * Social Events API - Public User Representation
 *
 * @module auth/user-view
 */

import type { UserItem } from '../../../shared_types/user';

/** A user as returned by the API. Never carries the password hash. */
export interface UserResponse {
    id: string;
    email: string;
    fullName: string;
    isActive: boolean;
    createdAt: string;
    updatedAt: string;
}

export function toUserResponse(user: UserItem): UserResponse {
    return {
        id: user.userId,
        email: user.email,
        fullName: user.fullName,
        isActive: user.isActive,
        createdAt: user.createdAt,
        updatedAt: user.updatedAt,
    };
}
