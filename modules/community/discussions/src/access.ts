/**
 * Discussion - Thread Access
 *
 * Group threads are readable by group members, event threads by the
 * event's organizers and participants (and members of its group).
 * Reading and replying need the same access.
 *
 * @module community/discussions/access
 */

import {
    NotFoundError,
    assertCan,
    can,
    loadFacts,
    openEvent,
    storage,
    type AccessFacts,
    type Action,
    type AuthenticatedContext,
} from '@social-api/shared';
import type { ThreadItem } from '../../../shared_types/discussion';

export interface ScopeAccess {
    facts: AccessFacts;
    /** Action that grants reading and replying in this scope */
    read: Action;
    /** Action that grants moderating (deleting any thread) in this scope */
    moderate: Action;
}

/**
 * Resolve the group or event a thread lives in, with the caller's facts.
 *
 * @throws NotFoundError if the scope does not exist
 */
export async function openScope(ctx: AuthenticatedContext, scope: storage.ThreadScope): Promise<ScopeAccess> {
    if (scope.context === 'group') {
        const group = await storage.getGroup(ctx.db, scope.groupId);
        if (!group) {
            throw NotFoundError.of('Group');
        }
        return {
            facts: await loadFacts(ctx.db, ctx.user.userId, { kind: 'group', group }),
            read: 'group:read-discussions',
            moderate: 'group:moderate',
        };
    }

    const { facts } = await openEvent(ctx.db, ctx.user.userId, scope.eventId);
    return { facts, read: 'event:access', moderate: 'event:manage-content' };
}

export function scopeOf(thread: ThreadItem): storage.ThreadScope | null {
    if (thread.context === 'group' && thread.groupId !== undefined) {
        return { context: 'group', groupId: thread.groupId };
    }
    if (thread.context === 'event' && thread.eventId !== undefined) {
        return { context: 'event', eventId: thread.eventId };
    }
    return null;
}

export interface OpenedThread extends ScopeAccess {
    thread: ThreadItem;
}

/**
 * Load a thread the caller may read.
 *
 * @throws NotFoundError if the thread or its scope does not exist
 * @throws ForbiddenError if the caller may not read it
 */
export async function openThread(ctx: AuthenticatedContext, threadId: string): Promise<OpenedThread> {
    const thread = await storage.getThread(ctx.db, threadId);
    const scope = thread ? scopeOf(thread) : null;
    if (!thread || !scope) {
        throw NotFoundError.of('Thread');
    }

    const access = await openScope(ctx, scope);
    assertCan(access.facts, access.read);
    return { thread, ...access };
}

export function canDeleteThread(ctx: AuthenticatedContext, opened: OpenedThread): boolean {
    return opened.thread.createdById === ctx.user.userId || can(opened.facts, opened.moderate);
}
