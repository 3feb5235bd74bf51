/**
 * Discussion - Messages
 *
 * - POST /api/discussions/{threadId}/messages  - `{ content, parentId? }`
 * - GET  /api/discussions/{threadId}/messages  - Flat list, or `?view=tree`
 *
 * Messages are stored flat with an explicit parentId; the tree view is
 * assembled on read by id lookup.
 *
 * @module community/discussions/messages
 */

import {
    created,
    parseBody,
    pathParam,
    storage,
    success,
    validate,
    type ApiResponse,
    type AuthenticatedContext,
} from '@social-api/shared';
import { openThread } from './access';
import { buildMessageTree, toMessageResponse } from './mapper';
import { messagesQuerySchema, postMessageSchema } from './validation';

export async function postMessage(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { thread } = await openThread(ctx, pathParam(ctx, 'threadId'));
    const input = parseBody(postMessageSchema, ctx.request);

    const message = await storage.postMessage(ctx.db, thread.threadId, ctx.user.userId, input);

    ctx.audit.byUser('MESSAGE_POSTED', ctx.user.userId, {
        threadId: thread.threadId,
        messageId: message.messageId,
        parentId: message.parentId,
    });

    return created(toMessageResponse(message));
}

export async function listMessages(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { thread } = await openThread(ctx, pathParam(ctx, 'threadId'));
    const { view } = validate(messagesQuerySchema, ctx.request.query);

    const messages = await storage.listMessages(ctx.db, thread.threadId);
    return success(view === 'tree' ? buildMessageTree(messages) : messages.map(toMessageResponse));
}
