/**
 * Group & Membership - Lambda Handler
 *
 * Endpoints (all require a Bearer token):
 * - POST   /api/groups
 * - GET    /api/groups
 * - GET    /api/groups/{groupId}
 * - PATCH  /api/groups/{groupId}
 * - DELETE /api/groups/{groupId}
 * - GET    /api/groups/{groupId}/members
 * - POST   /api/groups/{groupId}/members
 * - PATCH  /api/groups/{groupId}/members/{userId}
 * - DELETE /api/groups/{groupId}/members/{userId}
 *
 * DynamoDB Key Patterns (Adjacency List):
 * - Group:      PK=GROUP#<id>  SK=METADATA
 * - Membership: PK=GROUP#<id>  SK=MEMBER#<user_id>  GSI1PK=USER#<user_id>#GROUPS
 *
 * @module community/groups
 */

import { authenticatedRoute, createHandler } from '@social-api/shared';
import { createGroup, deleteGroup, getGroup, listGroups, updateGroup } from './groups';
import { addMember, listMembers, removeMember, updateMember } from './members';

export const handler = createHandler('groups', {
    'POST /api/groups': authenticatedRoute(createGroup),
    'GET /api/groups': authenticatedRoute(listGroups),
    'GET /api/groups/{groupId}': authenticatedRoute(getGroup),
    'PATCH /api/groups/{groupId}': authenticatedRoute(updateGroup),
    'DELETE /api/groups/{groupId}': authenticatedRoute(deleteGroup),
    'GET /api/groups/{groupId}/members': authenticatedRoute(listMembers),
    'POST /api/groups/{groupId}/members': authenticatedRoute(addMember),
    'PATCH /api/groups/{groupId}/members/{userId}': authenticatedRoute(updateMember),
    'DELETE /api/groups/{groupId}/members/{userId}': authenticatedRoute(removeMember),
});
