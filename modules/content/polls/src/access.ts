/**
 * Polls - Poll Access
 *
 * @module content/polls/access
 */

import {
    NotFoundError,
    assertCan,
    openEvent,
    storage,
    type Action,
    type AuthenticatedContext,
    type EventAccess,
} from '@social-api/shared';

export interface OpenedPoll extends EventAccess {
    structure: storage.PollStructure;
}

/**
 * Load a poll with its questions, options and votes, checking `action`
 * against the poll's event.
 *
 * @throws NotFoundError if the poll or its event does not exist
 * @throws ForbiddenError if the caller may not perform `action`
 */
export async function openPoll(ctx: AuthenticatedContext, pollId: string, action: Action): Promise<OpenedPoll> {
    const structure = await storage.getPollStructure(ctx.db, pollId);
    if (!structure) {
        throw NotFoundError.of('Poll');
    }

    const access = await openEvent(ctx.db, ctx.user.userId, structure.poll.eventId);
    assertCan(access.facts, action);
    return { structure, ...access };
}

/**
 * @throws NotFoundError if the question is not part of the poll
 */
export function findQuestion(structure: storage.PollStructure, questionId: string): storage.QuestionWithOptions {
    const question = structure.questions.find((candidate) => candidate.questionId === questionId);
    if (!question) {
        throw NotFoundError.of('Question');
    }
    return question;
}
