/**
 * Polls - Voting
 *
 * - POST /api/polls/{pollId}/votes  - `[{ questionId, optionId }]`
 *
 * A voter has one vote per question; voting again replaces it. Every
 * choice in the request is written in one transaction, or none is.
 *
 * @module content/polls/votes
 */

import {
    NotFoundError,
    parseBody,
    pathParam,
    storage,
    success,
    type ApiResponse,
    type AuthenticatedContext,
} from '@social-api/shared';
import { openPoll } from './access';
import { toPollDetailResponse } from './mapper';
import { votesSchema } from './validation';

export async function castVotes(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { structure } = await openPoll(ctx, pathParam(ctx, 'pollId'), 'event:access');
    const choices = parseBody(votesSchema, ctx.request);
    const pollId = structure.poll.pollId;

    await storage.castVotes(ctx.db, pollId, ctx.user.userId, choices);

    ctx.audit.byUser('VOTE_CAST', ctx.user.userId, { pollId, questions: choices.map((c) => c.questionId) });

    const updated = await storage.getPollStructure(ctx.db, pollId);
    if (!updated) {
        throw NotFoundError.of('Poll');
    }
    return success(toPollDetailResponse(updated));
}
