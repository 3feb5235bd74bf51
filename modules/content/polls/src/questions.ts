/**
 * Polls - Questions and Options
 *
 * - POST /api/polls/{pollId}/questions                          - `{ question, options }` (organizer)
 * - POST /api/polls/{pollId}/questions/{questionId}/options     - `{ label }` (organizer)
 * - GET  /api/polls/{pollId}/questions/{questionId}/results     - Tally computed on read
 *
 * @module content/polls/questions
 */

import {
    created,
    parseBody,
    pathParam,
    storage,
    success,
    type ApiResponse,
    type AuthenticatedContext,
} from '@social-api/shared';
import { findQuestion, openPoll } from './access';
import { toQuestionResponse, toQuestionResults } from './mapper';
import { optionSchema, questionSchema, toNewQuestion } from './validation';

export async function addQuestion(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { structure } = await openPoll(ctx, pathParam(ctx, 'pollId'), 'event:manage-content');
    const input = parseBody(questionSchema, ctx.request);

    const question = await storage.addQuestion(
        ctx.db,
        structure.poll.pollId,
        toNewQuestion(input),
        structure.questions.length
    );

    ctx.audit.byUser('POLL_UPDATED', ctx.user.userId, {
        pollId: structure.poll.pollId,
        questionId: question.questionId,
    });

    return created(toQuestionResponse(question));
}

export async function addOption(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { structure } = await openPoll(ctx, pathParam(ctx, 'pollId'), 'event:manage-content');
    const question = findQuestion(structure, pathParam(ctx, 'questionId'));
    const { label } = parseBody(optionSchema, ctx.request);

    const option = await storage.addOption(
        ctx.db,
        structure.poll.pollId,
        question.questionId,
        label,
        question.options.length
    );

    ctx.audit.byUser('POLL_UPDATED', ctx.user.userId, {
        pollId: structure.poll.pollId,
        questionId: question.questionId,
        optionId: option.optionId,
    });

    return created({ id: option.optionId, questionId: option.questionId, label: option.label, votes: 0 });
}

export async function getResults(ctx: AuthenticatedContext): Promise<ApiResponse> {
    const { structure } = await openPoll(ctx, pathParam(ctx, 'pollId'), 'event:access');
    const question = findQuestion(structure, pathParam(ctx, 'questionId'));
    return success(toQuestionResults(question, structure.votes));
}
