/**
 * Group & Membership - Group CRUD
 *
 * - POST   /api/groups            - Create (caller becomes admin)
 * - GET    /api/groups            - Groups visible to the caller
 * - GET    /api/groups/{groupId}  - Group, with members for members
 * - PATCH  /api/groups/{groupId}  - Update (admin)
 * - DELETE /api/groups/{groupId}  - Delete with everything it owns (admin)
 *
 * @module community/groups/groups
 */

import {
    assertCan,
    can,
    created,
    groupFacts,
    noContent,
    parseBody,
    storage,
    success,
    type ApiResponse,
    type AuthenticatedContext,
} from '@social-api/shared';
import { openGroup } from './access';
import { toGroupResponse, toMembershipResponse, type GroupDetailResponse } from './mapper';
import { createGroupSchema, updateGroupSchema } from './validation';

export async function createGroup(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const input = parseBody(createGroupSchema, ctx.request);
    const { group } = await storage.createGroup(ctx.db, input, ctx.user.userId);

    ctx.audit.byUser('GROUP_CREATED', ctx.user.userId, { groupId: group.groupId, type: group.type });

    return created(toGroupResponse(group));
}

export async function listGroups(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const [groups, memberships] = await Promise.all([
        storage.listGroups(ctx.db),
        storage.listMembershipsOfUser(ctx.db, ctx.user.userId),
    ]);
    const byGroup = new Map(memberships.map((m) => [m.groupId, m]));

    const visible = groups.filter((group) =>
        can(
            { actorId: ctx.user.userId, group: groupFacts(group, byGroup.get(group.groupId) ?? null) },
            'group:view'
        )
    );

    return success(visible.map(toGroupResponse));
}

export async function getGroup(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { group, facts } = await openGroup(ctx);

    const body: GroupDetailResponse = toGroupResponse(group);
    if (can(facts, 'group:view-members')) {
        const members = await storage.listMembers(ctx.db, group.groupId);
        body.members = members.map(toMembershipResponse);
    }
    return success(body);
}

export async function updateGroup(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { group, facts } = await openGroup(ctx);
    assertCan(facts, 'group:update');

    const changes = parseBody(updateGroupSchema, ctx.request);
    const updated = await storage.updateGroup(ctx.db, group.groupId, changes);

    ctx.audit.byUser('GROUP_UPDATED', ctx.user.userId, {
        groupId: group.groupId,
        fields: Object.keys(changes),
    });

    return success(toGroupResponse(updated));
}

export async function deleteGroup(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { group, facts } = await openGroup(ctx);
    assertCan(facts, 'group:delete');

    await storage.deleteGroupCascade(ctx.db, group.groupId);

    ctx.audit.byUser('GROUP_DELETED', ctx.user.userId, { groupId: group.groupId });

    return noContent();
}
