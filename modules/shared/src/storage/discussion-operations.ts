/**
 * Social Events API - Discussion Storage Operations
 *
 * Key Patterns:
 *   - Thread:  PK=THREAD#<id>  SK=METADATA
 *              GSI1PK=GROUP#<group_id>#THREADS | EVENT#<event_id>#THREADS
 *   - Message: PK=THREAD#<id>  SK=MESSAGE#<message_id>
 *
 * Messages are stored flat, keyed by id, each with an optional parentId.
 * A reply is written in the same transaction as an existence check of its
 * parent in the same thread partition, so every parent predates its
 * children and a cycle cannot be formed.
 *
 * @module storage/discussion-operations
 */

import type { MessageItem, ThreadContext, ThreadItem } from '../../../shared_types/discussion';
import { KeyPrefixes } from '../constants';
import { NotFoundError, ValidationError } from '../errors';
import { isMessageItem, isThreadItem } from '../type-guards';
import { getTyped, newId, queryIndexTyped, queryTyped, timestamp, toKey } from './common';
import { IndexKeys, Keys, sortKey } from './keys';
import { ConditionFailedError, type ItemKey, type TableGateway, type WriteOperation } from './types';

/** Thread scope: exactly one of a group or an event */
export type ThreadScope =
    | { context: 'group'; groupId: string }
    | { context: 'event'; eventId: string };

export interface NewMessage {
    content: string;
    parentId?: string;
}

function scopeIndexKey(scope: ThreadScope): string {
    return scope.context === 'group'
        ? IndexKeys.groupThreads(scope.groupId)
        : IndexKeys.eventThreads(scope.eventId);
}

function scopeKey(scope: ThreadScope): ItemKey {
    return scope.context === 'group' ? Keys.group(scope.groupId) : Keys.event(scope.eventId);
}

// =============================================================================
// Threads
// =============================================================================

/**
 * Create a thread under a group or an event.
 *
 * @throws NotFoundError if the scope no longer exists
 */
export async function createThread(
    db: TableGateway,
    scope: ThreadScope,
    title: string,
    creatorId: string
): Promise<ThreadItem> {
    const now = timestamp();
    const threadId = newId();
    const context: ThreadContext = scope.context;

    const thread: ThreadItem = {
        ...Keys.thread(threadId),
        GSI1PK: scopeIndexKey(scope),
        GSI1SK: sortKey(now, threadId),
        entityType: 'THREAD',
        threadId,
        title,
        context,
        ...(scope.context === 'group' ? { groupId: scope.groupId } : { eventId: scope.eventId }),
        createdById: creatorId,
        createdAt: now,
        updatedAt: now,
    };

    try {
        await db.transact([
            { type: 'check', key: scopeKey(scope), conditions: [{ kind: 'exists' }] },
            { type: 'put', item: thread, conditions: [{ kind: 'notExists' }] },
        ]);
    } catch (err) {
        if (err instanceof ConditionFailedError && err.failedAt(0)) {
            throw NotFoundError.of(scope.context === 'group' ? 'Group' : 'Event');
        }
        throw err;
    }

    return thread;
}

export async function getThread(db: TableGateway, threadId: string): Promise<ThreadItem | null> {
    return getTyped(db, Keys.thread(threadId), isThreadItem);
}

/**
 * Threads of a group or an event, oldest first.
 */
export async function listThreads(db: TableGateway, scope: ThreadScope): Promise<ThreadItem[]> {
    return queryIndexTyped(db, 'GSI1', scopeIndexKey(scope), isThreadItem);
}

// =============================================================================
// Messages
// =============================================================================

/**
 * Messages of a thread in chronological order.
 */
export async function listMessages(db: TableGateway, threadId: string): Promise<MessageItem[]> {
    const messages = await queryTyped(db, `${KeyPrefixes.THREAD}${threadId}`, KeyPrefixes.MESSAGE, isMessageItem);
    return messages.sort((a, b) => a.createdAt.localeCompare(b.createdAt));
}

/**
 * Post a message, optionally as a reply.
 *
 * @throws NotFoundError if the thread no longer exists
 * @throws ValidationError if the parent is not a message of this thread
 */
export async function postMessage(
    db: TableGateway,
    threadId: string,
    authorId: string,
    input: NewMessage
): Promise<MessageItem> {
    const now = timestamp();
    const messageId = newId();

    const message: MessageItem = {
        ...Keys.message(threadId, messageId),
        entityType: 'MESSAGE',
        messageId,
        threadId,
        authorId,
        content: input.content,
        ...(input.parentId !== undefined && { parentId: input.parentId }),
        createdAt: now,
        updatedAt: now,
    };

    const operations: WriteOperation[] = [
        { type: 'check', key: Keys.thread(threadId), conditions: [{ kind: 'exists' }] },
        { type: 'put', item: message, conditions: [{ kind: 'notExists' }] },
    ];
    if (input.parentId !== undefined) {
        operations.push({
            type: 'check',
            key: Keys.message(threadId, input.parentId),
            conditions: [{ kind: 'exists' }],
        });
    }

    try {
        await db.transact(operations);
    } catch (err) {
        if (err instanceof ConditionFailedError) {
            if (err.failedAt(0)) throw NotFoundError.of('Thread');
            if (err.failedAt(2)) {
                throw ValidationError.field('parentId', 'Parent message does not belong to this thread');
            }
        }
        throw err;
    }

    return message;
}

/**
 * Keys of a thread and all its messages, thread first.
 */
export async function collectThreadKeys(db: TableGateway, threadId: string): Promise<ItemKey[]> {
    const messages = await db.query(`${KeyPrefixes.THREAD}${threadId}`, KeyPrefixes.MESSAGE);
    return [Keys.thread(threadId), ...messages.flatMap(toKey)];
}

/**
 * Delete a thread and its messages.
 */
export async function deleteThread(db: TableGateway, threadId: string): Promise<void> {
    await db.deleteAll(await collectThreadKeys(db, threadId));
}
