/**
 * Polls - Lambda Handler
 *
 * Endpoints (all require a Bearer token):
 * - POST   /api/polls/events/{eventId}
 * - GET    /api/polls/events/{eventId}
 * - GET    /api/polls/{pollId}
 * - PATCH  /api/polls/{pollId}
 * - DELETE /api/polls/{pollId}
 * - POST   /api/polls/{pollId}/questions
 * - POST   /api/polls/{pollId}/questions/{questionId}/options
 * - GET    /api/polls/{pollId}/questions/{questionId}/results
 * - POST   /api/polls/{pollId}/votes
 *
 * DynamoDB Key Patterns (one partition per poll):
 * - Poll:     PK=POLL#<id>  SK=METADATA  GSI1PK=EVENT#<event_id>#POLLS
 * - Question: PK=POLL#<id>  SK=QUESTION#<question_id>
 * - Option:   PK=POLL#<id>  SK=OPTION#<question_id>#<option_id>
 * - Vote:     PK=POLL#<id>  SK=VOTE#<question_id>#<user_id>
 *
 * @module content/polls
 */

import { authenticatedRoute, createHandler } from '@social-api/shared';
import { createPoll, deletePoll, getPoll, listPolls, updatePoll } from './polls';
import { addOption, addQuestion, getResults } from './questions';
import { castVotes } from './votes';

export const handler = createHandler('polls', {
    'POST /api/polls/events/{eventId}': authenticatedRoute(createPoll),
    'GET /api/polls/events/{eventId}': authenticatedRoute(listPolls),
    'GET /api/polls/{pollId}': authenticatedRoute(getPoll),
    'PATCH /api/polls/{pollId}': authenticatedRoute(updatePoll),
    'DELETE /api/polls/{pollId}': authenticatedRoute(deletePoll),
    'POST /api/polls/{pollId}/questions': authenticatedRoute(addQuestion),
    'POST /api/polls/{pollId}/questions/{questionId}/options': authenticatedRoute(addOption),
    'GET /api/polls/{pollId}/questions/{questionId}/results': authenticatedRoute(getResults),
    'POST /api/polls/{pollId}/votes': authenticatedRoute(castVotes),
});
