/**
 * Polls - Polls
 *
 * - POST   /api/polls/events/{eventId}  - Create with questions and options (organizer)
 * - GET    /api/polls/events/{eventId}  - List the event's polls
 * - GET    /api/polls/{pollId}          - Poll with questions, options and vote counts
 * - PATCH  /api/polls/{pollId}          - `{ title?, isActive? }` (organizer)
 * - DELETE /api/polls/{pollId}          - Removes questions, options and votes (organizer)
 *
 * @module content/polls/polls
 */

import {
    assertCan,
    created,
    noContent,
    openEvent,
    parseBody,
    pathParam,
    storage,
    success,
    type ApiResponse,
    type AuthenticatedContext,
} from '@social-api/shared';
import { openPoll } from './access';
import { toPollDetailResponse, toPollResponse } from './mapper';
import { createPollSchema, toNewQuestion, updatePollSchema } from './validation';

export async function createPoll(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { event, facts } = await openEvent(ctx.db, ctx.user.userId, pathParam(ctx, 'eventId'));
    assertCan(facts, 'event:manage-content');

    const input = parseBody(createPollSchema, ctx.request);
    const structure = await storage.createPoll(
        ctx.db,
        event.eventId,
        { title: input.title, questions: input.questions.map(toNewQuestion) },
        ctx.user.userId
    );

    ctx.audit.byUser('POLL_CREATED', ctx.user.userId, {
        eventId: event.eventId,
        pollId: structure.poll.pollId,
        questions: structure.questions.length,
    });

    return created(toPollDetailResponse(structure));
}

export async function listPolls(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { event, facts } = await openEvent(ctx.db, ctx.user.userId, pathParam(ctx, 'eventId'));
    assertCan(facts, 'event:access');

    const polls = await storage.listPolls(ctx.db, event.eventId);
    return success(polls.map(toPollResponse));
}

export async function getPoll(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { structure } = await openPoll(ctx, pathParam(ctx, 'pollId'), 'event:access');
    return success(toPollDetailResponse(structure));
}

export async function updatePoll(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { structure } = await openPoll(ctx, pathParam(ctx, 'pollId'), 'event:manage-content');
    const changes = parseBody(updatePollSchema, ctx.request);

    const poll = await storage.updatePoll(ctx.db, structure.poll.pollId, changes);

    ctx.audit.byUser('POLL_UPDATED', ctx.user.userId, { pollId: poll.pollId, fields: Object.keys(changes) });

    return success(toPollResponse(poll));
}

export async function deletePoll(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { structure } = await openPoll(ctx, pathParam(ctx, 'pollId'), 'event:manage-content');

    await storage.deletePoll(ctx.db, structure.poll.pollId);

    ctx.audit.byUser('POLL_DELETED', ctx.user.userId, { pollId: structure.poll.pollId });

    return noContent();
}
