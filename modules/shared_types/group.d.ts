/**
 * Social Events API - Group Entity Types
 *
 * Key Patterns (Adjacency List for Group Membership):
 *   - Group:      PK=GROUP#<id>   SK=METADATA        GSI2PK=GROUP
 *   - Membership: PK=GROUP#<id>   SK=MEMBER#<user_id> GSI1PK=USER#<user_id>#GROUPS
 *
 * This design enables:
 *   - Group member listing (Query PK=GROUP#<id>, SK begins_with MEMBER#)
 *   - A user's groups (Query GSI1PK=USER#<id>#GROUPS)
 */

import type { BaseItem } from './base';

export type GroupType = 'public' | 'private' | 'secret';

export type GroupRole = 'member' | 'event-creator' | 'admin';

// =============================================================================
// Group Entity
// =============================================================================

export interface GroupItem extends BaseItem {
    PK: `GROUP#${string}`;
    SK: 'METADATA';
    GSI2PK: 'GROUP';
    GSI2SK: string;
    entityType: 'GROUP';

    groupId: string;
    name: string;
    description?: string;
    icon?: string;
    coverPhoto?: string;
    /** Secret groups are hidden from non-members */
    type: GroupType;
    /** Members without the admin role may open discussion threads */
    allowMemberPosts: boolean;
    /** Plain members may create events in the group */
    allowMemberEvents: boolean;
    createdById: string;
    /** Number of admin memberships (denormalized, guards the last admin) */
    adminCount: number;
}

// =============================================================================
// Group Membership Entity
// =============================================================================

export interface GroupMembershipItem extends BaseItem {
    PK: `GROUP#${string}`;
    SK: `MEMBER#${string}`;
    GSI1PK: `USER#${string}#GROUPS`;
    GSI1SK: string;
    entityType: 'GROUP_MEMBERSHIP';

    groupId: string;
    userId: string;
    role: GroupRole;
}
