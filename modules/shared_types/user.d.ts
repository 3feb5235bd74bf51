/**
 * Social Events API - User Entity Types
 *
 * Key Pattern:
 *   PK: USER#<user_id>
 *   SK: PROFILE
 *
 * Email uniqueness is held by a marker item written in the same
 * transaction as the profile:
 *   PK: EMAIL#<normalized_email>
 *   SK: USER
 */

import type { BaseItem } from './base';

// =============================================================================
// User Entity
// =============================================================================

export interface UserItem extends BaseItem {
    PK: `USER#${string}`;
    SK: 'PROFILE';
    entityType: 'USER';

    /** User's unique identifier (UUID) */
    userId: string;
    /** Normalized (trimmed, lower-case) email address */
    email: string;
    /** Display name */
    fullName: string;
    /** Argon2id encoded hash */
    passwordHash: string;
    /** Inactive accounts cannot log in or use issued tokens */
    isActive: boolean;
}

// =============================================================================
// Email Marker
// =============================================================================

export interface EmailMarkerItem extends BaseItem {
    PK: `EMAIL#${string}`;
    SK: 'USER';
    entityType: 'EMAIL_MARKER';

    userId: string;
}
