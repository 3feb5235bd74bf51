/**
 * Group & Membership - Response Mapping
 *
 * @module community/groups/mapper
 */

import type { GroupItem, GroupMembershipItem, GroupRole, GroupType } from '../../../shared_types/group';

export interface GroupResponse {
    id: string;
    name: string;
    description?: string;
    icon?: string;
    coverPhoto?: string;
    type: GroupType;
    allowMemberPosts: boolean;
    allowMemberEvents: boolean;
    createdById: string;
    createdAt: string;
    updatedAt: string;
}

export interface MembershipResponse {
    groupId: string;
    userId: string;
    role: GroupRole;
    createdAt: string;
    updatedAt: string;
}

export interface GroupDetailResponse extends GroupResponse {
    /** Present only for members */
    members?: MembershipResponse[];
}

export function toGroupResponse(group: GroupItem): GroupResponse {
    return {
        id: group.groupId,
        name: group.name,
        description: group.description,
        icon: group.icon,
        coverPhoto: group.coverPhoto,
        type: group.type,
        allowMemberPosts: group.allowMemberPosts,
        allowMemberEvents: group.allowMemberEvents,
        createdById: group.createdById,
        createdAt: group.createdAt,
        updatedAt: group.updatedAt,
    };
}

export function toMembershipResponse(membership: GroupMembershipItem): MembershipResponse {
    return {
        groupId: membership.groupId,
        userId: membership.userId,
        role: membership.role,
        createdAt: membership.createdAt,
        updatedAt: membership.updatedAt,
    };
}
