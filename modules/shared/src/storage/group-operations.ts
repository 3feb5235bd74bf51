/**
 * Social Events API - Group Storage Operations
 *
 * Key Patterns (Adjacency List):
 *   - Group:      PK=GROUP#<id>  SK=METADATA          GSI2PK=GROUP
 *   - Membership: PK=GROUP#<id>  SK=MEMBER#<user_id>  GSI1PK=USER#<user_id>#GROUPS
 *
 * The group keeps an adminCount that moves in the same transaction as
 * every admin membership change, so a group never loses its last admin.
 *
 * @module storage/group-operations
 */

import type {
    GroupItem,
    GroupMembershipItem,
    GroupRole,
    GroupType,
} from '../../../shared_types/group';
import { GroupRoles, KeyPrefixes } from '../constants';
import { ConflictError, NotFoundError } from '../errors';
import { isGroupItem, isMembershipItem } from '../type-guards';
import { getTyped, newId, queryIndexTyped, queryTyped, splitChanges, timestamp } from './common';
import { IndexKeys, Keys, sortKey } from './keys';
import { ConditionFailedError, type TableGateway, type WriteOperation } from './types';

export interface NewGroup {
    name: string;
    description?: string;
    icon?: string;
    coverPhoto?: string;
    type: GroupType;
    allowMemberPosts: boolean;
    allowMemberEvents: boolean;
}

export type GroupChanges = {
    [K in keyof NewGroup]?: NewGroup[K] | null;
};

function buildMembership(
    groupId: string,
    userId: string,
    role: GroupRole,
    now: string
): GroupMembershipItem {
    return {
        ...Keys.membership(groupId, userId),
        GSI1PK: IndexKeys.userGroups(userId),
        GSI1SK: groupId,
        entityType: 'GROUP_MEMBERSHIP',
        groupId,
        userId,
        role,
        createdAt: now,
        updatedAt: now,
    };
}

// =============================================================================
// Groups
// =============================================================================

/**
 * Create a group with its creator as the first admin.
 */
export async function createGroup(
    db: TableGateway,
    input: NewGroup,
    creatorId: string
): Promise<{ group: GroupItem; membership: GroupMembershipItem }> {
    const now = timestamp();
    const groupId = newId();

    const group: GroupItem = {
        ...Keys.group(groupId),
        GSI2PK: IndexKeys.groupCatalog,
        GSI2SK: sortKey(now, groupId),
        entityType: 'GROUP',
        groupId,
        ...input,
        createdById: creatorId,
        adminCount: 1,
        createdAt: now,
        updatedAt: now,
    };
    const membership = buildMembership(groupId, creatorId, GroupRoles.ADMIN, now);

    await db.transact([
        { type: 'put', item: group, conditions: [{ kind: 'notExists' }] },
        { type: 'put', item: membership, conditions: [{ kind: 'notExists' }] },
    ]);

    return { group, membership };
}

export async function getGroup(db: TableGateway, groupId: string): Promise<GroupItem | null> {
    return getTyped(db, Keys.group(groupId), isGroupItem);
}

/**
 * All groups, oldest first.
 */
export async function listGroups(db: TableGateway): Promise<GroupItem[]> {
    return queryIndexTyped(db, 'GSI2', IndexKeys.groupCatalog, isGroupItem);
}

/**
 * @throws NotFoundError if the group no longer exists
 */
export async function updateGroup(
    db: TableGateway,
    groupId: string,
    changes: GroupChanges
): Promise<GroupItem> {
    const { set, remove } = splitChanges(changes);
    try {
        await db.transact([
            {
                type: 'update',
                key: Keys.group(groupId),
                set: { ...set, updatedAt: timestamp() },
                remove,
                conditions: [{ kind: 'exists' }],
            },
        ]);
    } catch (err) {
        if (err instanceof ConditionFailedError) {
            throw NotFoundError.of('Group');
        }
        throw err;
    }

    const group = await getGroup(db, groupId);
    if (!group) {
        throw NotFoundError.of('Group');
    }
    return group;
}

// =============================================================================
// Memberships
// =============================================================================

export async function getMembership(
    db: TableGateway,
    groupId: string,
    userId: string
): Promise<GroupMembershipItem | null> {
    return getTyped(db, Keys.membership(groupId, userId), isMembershipItem);
}

export async function listMembers(db: TableGateway, groupId: string): Promise<GroupMembershipItem[]> {
    return queryTyped(db, `${KeyPrefixes.GROUP}${groupId}`, KeyPrefixes.MEMBER, isMembershipItem);
}

/**
 * Memberships of one user across all groups.
 */
export async function listMembershipsOfUser(
    db: TableGateway,
    userId: string
): Promise<GroupMembershipItem[]> {
    return queryIndexTyped(db, 'GSI1', IndexKeys.userGroups(userId), isMembershipItem);
}

/**
 * Add a user to a group.
 *
 * @throws NotFoundError if the user or the group does not exist
 * @throws ConflictError if the user is already a member
 */
export async function addMember(
    db: TableGateway,
    groupId: string,
    userId: string,
    role: GroupRole
): Promise<GroupMembershipItem> {
    const membership = buildMembership(groupId, userId, role, timestamp());

    const operations: WriteOperation[] = [
        { type: 'check', key: Keys.user(userId), conditions: [{ kind: 'exists' }] },
        { type: 'put', item: membership, conditions: [{ kind: 'notExists' }] },
        role === GroupRoles.ADMIN
            ? {
                type: 'update',
                key: Keys.group(groupId),
                increment: { adminCount: 1 },
                conditions: [{ kind: 'exists' }],
            }
            : { type: 'check', key: Keys.group(groupId), conditions: [{ kind: 'exists' }] },
    ];

    try {
        await db.transact(operations);
    } catch (err) {
        if (err instanceof ConditionFailedError) {
            if (err.failedAt(2)) throw NotFoundError.of('Group');
            if (err.failedAt(0)) throw NotFoundError.of('User');
            throw new ConflictError('User is already a member of this group');
        }
        throw err;
    }

    return membership;
}

/**
 * Change a member's role. `current` is the membership as read by the caller;
 * the write only applies if the role has not changed since.
 *
 * @throws ConflictError when demoting the last admin, or on a concurrent change
 */
export async function changeMemberRole(
    db: TableGateway,
    current: GroupMembershipItem,
    role: GroupRole
): Promise<GroupMembershipItem> {
    if (current.role === role) {
        return current;
    }

    const now = timestamp();
    const operations: WriteOperation[] = [
        {
            type: 'update',
            key: Keys.membership(current.groupId, current.userId),
            set: { role, updatedAt: now },
            conditions: [{ kind: 'exists' }, { kind: 'equals', attribute: 'role', value: current.role }],
        },
    ];

    if (current.role === GroupRoles.ADMIN) {
        operations.push({
            type: 'update',
            key: Keys.group(current.groupId),
            increment: { adminCount: -1 },
            conditions: [{ kind: 'greaterThan', attribute: 'adminCount', value: 1 }],
        });
    } else if (role === GroupRoles.ADMIN) {
        operations.push({
            type: 'update',
            key: Keys.group(current.groupId),
            increment: { adminCount: 1 },
            conditions: [{ kind: 'exists' }],
        });
    }

    try {
        await db.transact(operations);
    } catch (err) {
        if (err instanceof ConditionFailedError) {
            if (err.failedAt(1) && current.role === GroupRoles.ADMIN) {
                throw new ConflictError('A group must keep at least one admin');
            }
            throw new ConflictError('Membership was changed by another request');
        }
        throw err;
    }

    return { ...current, role, updatedAt: now };
}

/**
 * Remove a membership.
 *
 * @throws ConflictError when removing the last admin, or on a concurrent change
 */
export async function removeMember(db: TableGateway, current: GroupMembershipItem): Promise<void> {
    const operations: WriteOperation[] = [
        {
            type: 'delete',
            key: Keys.membership(current.groupId, current.userId),
            conditions: [{ kind: 'exists' }, { kind: 'equals', attribute: 'role', value: current.role }],
        },
    ];

    if (current.role === GroupRoles.ADMIN) {
        operations.push({
            type: 'update',
            key: Keys.group(current.groupId),
            increment: { adminCount: -1 },
            conditions: [{ kind: 'greaterThan', attribute: 'adminCount', value: 1 }],
        });
    }

    try {
        await db.transact(operations);
    } catch (err) {
        if (err instanceof ConditionFailedError) {
            if (err.failedAt(1)) {
                throw new ConflictError('A group must keep at least one admin');
            }
            throw new ConflictError('Membership was changed by another request');
        }
        throw err;
    }
}
