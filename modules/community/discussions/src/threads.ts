/**
 * Discussion - Threads
 *
 * - POST   /api/discussions               - Create in a group or an event
 * - GET    /api/discussions               - `?groupId=` or `?eventId=`
 * - GET    /api/discussions/{threadId}    - Thread with its messages
 * - DELETE /api/discussions/{threadId}    - Creator or moderator; removes messages
 *
 * @module community/discussions/threads
 */

import {
    ForbiddenError,
    ValidationError,
    assertCan,
    created,
    noContent,
    parseBody,
    pathParam,
    storage,
    success,
    validate,
    type ApiResponse,
    type AuthenticatedContext,
} from '@social-api/shared';
import { canDeleteThread, openScope, openThread } from './access';
import {
    toMessageResponse,
    toThreadResponse,
    type ThreadDetailResponse,
} from './mapper';
import { createThreadSchema, listThreadsQuerySchema, toScope } from './validation';

export async function createThread(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const input = parseBody(createThreadSchema, ctx.request);
    const scope = toScope(input);
    if (!scope) {
        throw ValidationError.field('context', 'Thread context does not match the given id');
    }

    const access = await openScope(ctx, scope);
    assertCan(access.facts, scope.context === 'group' ? 'group:post' : 'event:access');

    const thread = await storage.createThread(ctx.db, scope, input.title, ctx.user.userId);

    ctx.audit.byUser('THREAD_CREATED', ctx.user.userId, {
        threadId: thread.threadId,
        context: thread.context,
        groupId: thread.groupId,
        eventId: thread.eventId,
    });

    return created(toThreadResponse(thread));
}

export async function listThreads(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const query = validate(listThreadsQuerySchema, ctx.request.query);
    const scope: storage.ThreadScope = query.groupId !== undefined
        ? { context: 'group', groupId: query.groupId }
        : { context: 'event', eventId: query.eventId ?? '' };

    const access = await openScope(ctx, scope);
    assertCan(access.facts, access.read);

    const threads = await storage.listThreads(ctx.db, scope);
    return success(threads.map(toThreadResponse));
}

export async function getThread(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { thread } = await openThread(ctx, pathParam(ctx, 'threadId'));
    const messages = await storage.listMessages(ctx.db, thread.threadId);

    const body: ThreadDetailResponse = {
        ...toThreadResponse(thread),
        messages: messages.map(toMessageResponse),
    };
    return success(body);
}

export async function deleteThread(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const opened = await openThread(ctx, pathParam(ctx, 'threadId'));
    if (!canDeleteThread(ctx, opened)) {
        throw new ForbiddenError('Only the creator or a moderator may delete this thread');
    }

    await storage.deleteThread(ctx.db, opened.thread.threadId);

    ctx.audit.byUser('THREAD_DELETED', ctx.user.userId, { threadId: opened.thread.threadId });

    return noContent();
}
