/**
 * Social Events API - Discussion Entity Types
 *
 * Key Patterns:
 *   - Thread:  PK=THREAD#<id>  SK=METADATA
 *              GSI1PK=GROUP#<group_id>#THREADS | EVENT#<event_id>#THREADS
 *   - Message: PK=THREAD#<id>  SK=MESSAGE#<message_id>
 *
 * Messages form a reply tree through parentId. A parent always lives in
 * the same thread partition and exists before any reply to it is written.
 */

import type { BaseItem } from './base';

export type ThreadContext = 'group' | 'event';

export interface ThreadItem extends BaseItem {
    PK: `THREAD#${string}`;
    SK: 'METADATA';
    GSI1PK: string;
    GSI1SK: string;
    entityType: 'THREAD';

    threadId: string;
    title: string;
    context: ThreadContext;
    /** Set when context is 'group' */
    groupId?: string;
    /** Set when context is 'event' */
    eventId?: string;
    createdById: string;
}

export interface MessageItem extends BaseItem {
    PK: `THREAD#${string}`;
    SK: `MESSAGE#${string}`;
    entityType: 'MESSAGE';

    messageId: string;
    threadId: string;
    authorId: string;
    content: string;
    parentId?: string;
}
