/**
 * Group & Membership - Group Resolution
 *
 * A secret group is indistinguishable from a missing one for non-members:
 * both answer 404.
 *
 * @module community/groups/access
 */

import {
    NotFoundError,
    can,
    loadFacts,
    pathParam,
    storage,
    type AccessFacts,
    type AuthenticatedContext,
} from '@social-api/shared';
import type { GroupItem } from '../../../shared_types/group';

export interface OpenedGroup {
    group: GroupItem;
    facts: AccessFacts;
}

/**
 * Load the group named by the `groupId` path parameter, with the caller's
 * access facts.
 *
 * @throws NotFoundError if the group does not exist or is hidden from the caller
 */
export async function openGroup(ctx: AuthenticatedContext): Promise<OpenedGroup> {
    const group = await storage.getGroup(ctx.db, pathParam(ctx, 'groupId'));
    if (!group) {
        throw NotFoundError.of('Group');
    }

    const facts = await loadFacts(ctx.db, ctx.user.userId, { kind: 'group', group });
    if (!can(facts, 'group:view')) {
        throw NotFoundError.of('Group');
    }
    return { group, facts };
}
