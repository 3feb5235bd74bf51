/**
 * Social Events API - Capability Checks
 *
 * Every permission decision goes through `can`, a pure function of the
 * facts about the actor and the target. Route code loads the target first
 * (so a missing resource is a 404 before any 403), then calls `assertCan`.
 *
 * @module access/capabilities
 */

import type { EventItem } from '../../../shared_types/event';
import type { GroupItem, GroupMembershipItem, GroupRole, GroupType } from '../../../shared_types/group';
import { GroupRoles, GroupTypes } from '../constants';
import { ForbiddenError } from '../errors';
import { getOrganizer, getParticipant } from '../storage/event-operations';
import { getGroup, getMembership } from '../storage/group-operations';
import type { TableGateway } from '../storage/types';

// =============================================================================
// Actions and Facts
// =============================================================================

export type Action =
    | 'group:view'
    | 'group:view-members'
    | 'group:update'
    | 'group:delete'
    | 'group:manage-members'
    | 'group:create-event'
    | 'group:post'
    | 'group:read-discussions'
    | 'group:moderate'
    | 'event:view'
    | 'event:update'
    | 'event:delete'
    | 'event:manage-organizers'
    | 'event:manage-participants'
    | 'event:manage-content'
    | 'event:join'
    | 'event:access'
    | 'resource:modify';

export interface GroupFacts {
    type: GroupType;
    allowMemberPosts: boolean;
    allowMemberEvents: boolean;
    /** Actor's role, null when not a member */
    role: GroupRole | null;
}

export interface EventFacts {
    isPrivate: boolean;
    createdById: string;
    isOrganizer: boolean;
    isParticipant: boolean;
}

export interface AccessFacts {
    actorId: string;
    /** The target group, or the group an event belongs to */
    group?: GroupFacts;
    event?: EventFacts;
    /** Owner of an event-scoped resource (album, photo, item, ...) */
    ownerId?: string;
}

export type AccessTarget = { kind: 'group'; group: GroupItem } | { kind: 'event'; event: EventItem };

// =============================================================================
// Decision
// =============================================================================

function isMember(group: GroupFacts | undefined): boolean {
    return group !== undefined && group.role !== null;
}

function hasRole(group: GroupFacts | undefined, ...roles: GroupRole[]): boolean {
    return group !== undefined && group.role !== null && roles.includes(group.role);
}

/**
 * Decide whether the actor may perform `action`. Facts that the action
 * needs but that are absent count as not granted.
 */
export function can(facts: AccessFacts, action: Action): boolean {
    const { group, event } = facts;

    switch (action) {
        case 'group:view':
            return group !== undefined && (group.type !== GroupTypes.SECRET || isMember(group));
        case 'group:view-members':
        case 'group:read-discussions':
            return isMember(group);
        case 'group:update':
        case 'group:delete':
        case 'group:manage-members':
        case 'group:moderate':
            return hasRole(group, GroupRoles.ADMIN);
        case 'group:create-event':
            return (
                hasRole(group, GroupRoles.ADMIN, GroupRoles.EVENT_CREATOR) ||
                (group?.allowMemberEvents === true && isMember(group))
            );
        case 'group:post':
            return hasRole(group, GroupRoles.ADMIN) || (group?.allowMemberPosts === true && isMember(group));

        case 'event:view':
            return (
                event !== undefined &&
                (!event.isPrivate || event.isOrganizer || event.isParticipant || isMember(group))
            );
        case 'event:update':
        case 'event:manage-organizers':
        case 'event:manage-participants':
        case 'event:manage-content':
            return event?.isOrganizer === true;
        case 'event:delete':
            return (
                event !== undefined &&
                (event.createdById === facts.actorId || hasRole(group, GroupRoles.ADMIN))
            );
        case 'event:join':
            return event !== undefined && (!event.isPrivate || isMember(group));
        case 'event:access':
            return event !== undefined && (event.isOrganizer || event.isParticipant || isMember(group));
        case 'resource:modify':
            return (
                (facts.ownerId !== undefined && facts.ownerId === facts.actorId) ||
                event?.isOrganizer === true
            );
    }
}

// =============================================================================
// Fact Loading
// =============================================================================

export function groupFacts(group: GroupItem, membership: GroupMembershipItem | null): GroupFacts {
    return {
        type: group.type,
        allowMemberPosts: group.allowMemberPosts,
        allowMemberEvents: group.allowMemberEvents,
        role: membership?.role ?? null,
    };
}

async function loadGroupFacts(db: TableGateway, actorId: string, group: GroupItem): Promise<GroupFacts> {
    return groupFacts(group, await getMembership(db, group.groupId, actorId));
}

async function loadEventFacts(
    db: TableGateway,
    actorId: string,
    event: EventItem
): Promise<Pick<AccessFacts, 'event' | 'group'>> {
    const [organizer, participant, group] = await Promise.all([
        getOrganizer(db, event.eventId, actorId),
        getParticipant(db, event.eventId, actorId),
        event.groupId !== undefined ? getGroup(db, event.groupId) : Promise.resolve(null),
    ]);

    return {
        event: {
            isPrivate: event.isPrivate,
            createdById: event.createdById,
            isOrganizer: organizer !== null,
            isParticipant: participant !== null,
        },
        ...(group && { group: await loadGroupFacts(db, actorId, group) }),
    };
}

export async function loadFacts(db: TableGateway, actorId: string, target: AccessTarget): Promise<AccessFacts> {
    switch (target.kind) {
        case 'group':
            return { actorId, group: await loadGroupFacts(db, actorId, target.group) };
        case 'event':
            return { actorId, ...(await loadEventFacts(db, actorId, target.event)) };
    }
}

export async function isAllowed(
    db: TableGateway,
    actorId: string,
    target: AccessTarget,
    action: Action
): Promise<boolean> {
    return can(await loadFacts(db, actorId, target), action);
}

/**
 * @throws ForbiddenError when the facts do not allow `action`
 */
export function assertCan(facts: AccessFacts, action: Action): void {
    if (!can(facts, action)) {
        throw new ForbiddenError(`Not permitted: ${action}`);
    }
}
