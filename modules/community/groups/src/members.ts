/**
 * Group & Membership - Members
 *
 * - GET    /api/groups/{groupId}/members           - List (members)
 * - POST   /api/groups/{groupId}/members           - Add `{ userId, role }` (admin)
 * - PATCH  /api/groups/{groupId}/members/{userId}  - Change role (admin)
 * - DELETE /api/groups/{groupId}/members/{userId}  - Remove (admin, or leave)
 *
 * A group always keeps at least one admin; the admin counter on the group
 * moves in the same transaction as the membership.
 *
 * @module community/groups/members
 */

import {
    NotFoundError,
    assertCan,
    created,
    noContent,
    parseBody,
    pathParam,
    storage,
    success,
    type ApiResponse,
    type AuthenticatedContext,
} from '@social-api/shared';
import type { GroupMembershipItem } from '../../../shared_types/group';
import { openGroup } from './access';
import { toMembershipResponse } from './mapper';
import { addMemberSchema, updateMemberSchema } from './validation';

async function requireMembership(
    ctx: AuthenticatedContext,
    groupId: string,
    userId: string
): Promise<GroupMembershipItem> {
    const membership = await storage.getMembership(ctx.db, groupId, userId);
    if (!membership) {
        throw NotFoundError.of('Membership');
    }
    return membership;
}

export async function listMembers(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { group, facts } = await openGroup(ctx);
    assertCan(facts, 'group:view-members');

    const members = await storage.listMembers(ctx.db, group.groupId);
    return success(members.map(toMembershipResponse));
}

export async function addMember(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { group, facts } = await openGroup(ctx);
    assertCan(facts, 'group:manage-members');

    const { userId, role } = parseBody(addMemberSchema, ctx.request);
    const membership = await storage.addMember(ctx.db, group.groupId, userId, role);

    ctx.audit.byUser('MEMBER_ADDED', ctx.user.userId, { groupId: group.groupId, userId, role });

    return created(toMembershipResponse(membership));
}

export async function updateMember(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { group, facts } = await openGroup(ctx);
    assertCan(facts, 'group:manage-members');

    const { role } = parseBody(updateMemberSchema, ctx.request);
    const userId = pathParam(ctx, 'userId');
    const current = await requireMembership(ctx, group.groupId, userId);
    const membership = await storage.changeMemberRole(ctx.db, current, role);

    ctx.audit.byUser('MEMBER_UPDATED', ctx.user.userId, {
        groupId: group.groupId,
        userId,
        from: current.role,
        to: role,
    });

    return success(toMembershipResponse(membership));
}

export async function removeMember(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { group, facts } = await openGroup(ctx);
    const userId = pathParam(ctx, 'userId');
    if (userId !== ctx.user.userId) {
        assertCan(facts, 'group:manage-members');
    }

    const current = await requireMembership(ctx, group.groupId, userId);
    await storage.removeMember(ctx.db, current);

    ctx.audit.byUser('MEMBER_REMOVED', ctx.user.userId, { groupId: group.groupId, userId });

    return noContent();
}
