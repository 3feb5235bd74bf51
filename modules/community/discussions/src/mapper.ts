/**
 * Discussion - Response Mapping and Reply Trees
 *
 * @module community/discussions/mapper
 */

import type { MessageItem, ThreadContext, ThreadItem } from '../../../shared_types/discussion';

export interface ThreadResponse {
    id: string;
    title: string;
    context: ThreadContext;
    groupId?: string;
    eventId?: string;
    createdById: string;
    createdAt: string;
}

export interface MessageResponse {
    id: string;
    threadId: string;
    authorId: string;
    content: string;
    parentId?: string;
    createdAt: string;
}

export interface MessageNode extends MessageResponse {
    replies: MessageNode[];
}

export interface ThreadDetailResponse extends ThreadResponse {
    messages: MessageResponse[];
}

export function toThreadResponse(thread: ThreadItem): ThreadResponse {
    return {
        id: thread.threadId,
        title: thread.title,
        context: thread.context,
        groupId: thread.groupId,
        eventId: thread.eventId,
        createdById: thread.createdById,
        createdAt: thread.createdAt,
    };
}

export function toMessageResponse(message: MessageItem): MessageResponse {
    return {
        id: message.messageId,
        threadId: message.threadId,
        authorId: message.authorId,
        content: message.content,
        parentId: message.parentId,
        createdAt: message.createdAt,
    };
}

/**
 * Nest messages under their parents. Input is chronological, so every
 * list of replies comes out chronological too. A message whose parent is
 * not in the list is treated as a root.
 */
export function buildMessageTree(messages: MessageItem[]): MessageNode[] {
    const nodes = new Map<string, MessageNode>();
    for (const message of messages) {
        nodes.set(message.messageId, { ...toMessageResponse(message), replies: [] });
    }

    const roots: MessageNode[] = [];
    for (const message of messages) {
        const node = nodes.get(message.messageId);
        if (!node) {
            continue;
        }
        const parent = message.parentId !== undefined ? nodes.get(message.parentId) : undefined;
        if (parent) {
            parent.replies.push(node);
        } else {
            roots.push(node);
        }
    }
    return roots;
}
