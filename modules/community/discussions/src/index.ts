/**
 * Discussion - Lambda Handler
 *
 * Endpoints (all require a Bearer token):
 * - POST   /api/discussions
 * - GET    /api/discussions
 * - GET    /api/discussions/{threadId}
 * - DELETE /api/discussions/{threadId}
 * - POST   /api/discussions/{threadId}/messages
 * - GET    /api/discussions/{threadId}/messages
 *
 * DynamoDB Key Patterns:
 * - Thread:  PK=THREAD#<id>  SK=METADATA  GSI1PK=GROUP#<id>#THREADS | EVENT#<id>#THREADS
 * - Message: PK=THREAD#<id>  SK=MESSAGE#<message_id>
 *
 * @module community/discussions
 */

import { authenticatedRoute, createHandler } from '@social-api/shared';
import { listMessages, postMessage } from './messages';
import { createThread, deleteThread, getThread, listThreads } from './threads';

export const handler = createHandler('discussions', {
    'POST /api/discussions': authenticatedRoute(createThread),
    'GET /api/discussions': authenticatedRoute(listThreads),
    'GET /api/discussions/{threadId}': authenticatedRoute(getThread),
    'DELETE /api/discussions/{threadId}': authenticatedRoute(deleteThread),
    'POST /api/discussions/{threadId}/messages': authenticatedRoute(postMessage),
    'GET /api/discussions/{threadId}/messages': authenticatedRoute(listMessages),
});
