/**
 * Social Events API - Poll Storage Operations
 *
 * A poll, its questions, options, label markers and votes share the
 * POLL#<id> partition, so the whole structure is read with one query and
 * deleted by collecting that partition.
 *
 * Vote policy: one row per (question, voter). Voting again on a question
 * replaces the earlier row, so a voter counts at most once per question.
 *
 * @module storage/poll-operations
 */

import type {
    PollItem,
    PollOptionItem,
    PollOptionLabelItem,
    PollQuestionItem,
    PollVoteItem,
} from '../../../shared_types/poll';
import { KeyPrefixes, MAX_TRANSACTION_ITEMS, MetadataSortKeys } from '../constants';
import { ConflictError, NotFoundError, PreconditionFailedError, ValidationError } from '../errors';
import { isOptionItem, isPollItem, isQuestionItem, isVoteItem } from '../type-guards';
import { getTyped, newId, queryIndexTyped, splitChanges, timestamp, toKey } from './common';
import { IndexKeys, Keys, sortKey } from './keys';
import { ConditionFailedError, type ItemKey, type TableGateway, type WriteOperation } from './types';

export interface NewQuestion {
    question: string;
    /** Option labels, unique within the question */
    options: string[];
}

export interface VoteChoice {
    questionId: string;
    optionId: string;
}

export interface QuestionWithOptions extends PollQuestionItem {
    options: PollOptionItem[];
}

/** A poll with everything stored in its partition */
export interface PollStructure {
    poll: PollItem;
    questions: QuestionWithOptions[];
    votes: PollVoteItem[];
}

export interface PollChanges {
    title?: string;
    isActive?: boolean;
}

const POLL_DISABLED = 'Polls are disabled for this event';
const POLL_INACTIVE = 'Poll is not active';
const POLL_TOO_LARGE = 'Poll has too many questions or options';

function pollPartition(pollId: string): string {
    return `${KeyPrefixes.POLL}${pollId}`;
}

/**
 * Rows for one question: the question, then per option its row and its
 * label marker.
 */
function questionOperations(
    pollId: string,
    input: NewQuestion,
    position: number,
    now: string
): { question: QuestionWithOptions; operations: WriteOperation[] } {
    const questionId = newId();
    const row: PollQuestionItem = {
        ...Keys.question(pollId, questionId),
        entityType: 'POLL_QUESTION',
        pollId,
        questionId,
        question: input.question,
        position,
        createdAt: now,
        updatedAt: now,
    };

    const options: PollOptionItem[] = [];
    const operations: WriteOperation[] = [{ type: 'put', item: row, conditions: [{ kind: 'notExists' }] }];
    input.options.forEach((label, index) => {
        const { option, operations: optionOps } = optionOperations(pollId, questionId, label, index, now);
        options.push(option);
        operations.push(...optionOps);
    });

    return { question: { ...row, options }, operations };
}

/**
 * The label marker goes first so a duplicate label fails at a known offset.
 */
function optionOperations(
    pollId: string,
    questionId: string,
    label: string,
    position: number,
    now: string
): { option: PollOptionItem; operations: WriteOperation[] } {
    const optionId = newId();
    const option: PollOptionItem = {
        ...Keys.option(pollId, questionId, optionId),
        entityType: 'POLL_OPTION',
        pollId,
        questionId,
        optionId,
        label,
        position,
        createdAt: now,
        updatedAt: now,
    };
    const marker: PollOptionLabelItem = {
        ...Keys.optionLabel(pollId, questionId, label),
        entityType: 'POLL_OPTION_LABEL',
        questionId,
        optionId,
        createdAt: now,
        updatedAt: now,
    };

    return {
        option,
        operations: [
            { type: 'put', item: marker, conditions: [{ kind: 'notExists' }] },
            { type: 'put', item: option, conditions: [{ kind: 'notExists' }] },
        ],
    };
}

function assertFitsTransaction(operations: WriteOperation[]): void {
    if (operations.length > MAX_TRANSACTION_ITEMS) {
        throw ValidationError.field('questions', POLL_TOO_LARGE);
    }
}

// =============================================================================
// Polls
// =============================================================================

/**
 * Create a poll with its questions and options in one transaction.
 *
 * @throws PreconditionFailedError if polls are disabled for the event
 * @throws ValidationError if the structure does not fit one transaction
 * @throws ConflictError if a question repeats an option label
 */
export async function createPoll(
    db: TableGateway,
    eventId: string,
    input: { title: string; questions: NewQuestion[] },
    creatorId: string
): Promise<PollStructure> {
    const now = timestamp();
    const pollId = newId();
    const poll: PollItem = {
        ...Keys.poll(pollId),
        GSI1PK: IndexKeys.eventPolls(eventId),
        GSI1SK: sortKey(now, pollId),
        entityType: 'POLL',
        pollId,
        eventId,
        title: input.title,
        isActive: true,
        createdById: creatorId,
        createdAt: now,
        updatedAt: now,
    };

    const operations: WriteOperation[] = [
        {
            type: 'check',
            key: Keys.event(eventId),
            conditions: [{ kind: 'exists' }, { kind: 'equals', attribute: 'pollsEnabled', value: true }],
        },
        { type: 'put', item: poll, conditions: [{ kind: 'notExists' }] },
    ];
    const questions = input.questions.map((question, position) => {
        const built = questionOperations(pollId, question, position, now);
        operations.push(...built.operations);
        return built.question;
    });
    assertFitsTransaction(operations);

    try {
        await db.transact(operations);
    } catch (err) {
        if (err instanceof ConditionFailedError) {
            if (err.failedAt(0)) throw new PreconditionFailedError(POLL_DISABLED);
            throw new ConflictError('Option labels must be unique within a question');
        }
        throw err;
    }

    return { poll, questions, votes: [] };
}

export async function getPoll(db: TableGateway, pollId: string): Promise<PollItem | null> {
    return getTyped(db, Keys.poll(pollId), isPollItem);
}

/**
 * Polls of an event, oldest first.
 */
export async function listPolls(db: TableGateway, eventId: string): Promise<PollItem[]> {
    return queryIndexTyped(db, 'GSI1', IndexKeys.eventPolls(eventId), isPollItem);
}

/**
 * Read a poll with its questions, options and votes, questions and options
 * in creation order.
 */
export async function getPollStructure(db: TableGateway, pollId: string): Promise<PollStructure | null> {
    const rows = await db.query(pollPartition(pollId));
    const [poll] = rows.flatMap((row) => (isPollItem(row) ? [row] : []));
    if (!poll) {
        return null;
    }

    const options = rows.flatMap((row) => (isOptionItem(row) ? [row] : []));
    const questions = rows
        .flatMap((row) => (isQuestionItem(row) ? [row] : []))
        .sort((a, b) => a.position - b.position)
        .map((question): QuestionWithOptions => ({
            ...question,
            options: options
                .filter((option) => option.questionId === question.questionId)
                .sort((a, b) => a.position - b.position),
        }));
    const votes = rows.flatMap((row) => (isVoteItem(row) ? [row] : []));

    return { poll, questions, votes };
}

/**
 * @throws NotFoundError if the poll no longer exists
 */
export async function updatePoll(db: TableGateway, pollId: string, changes: PollChanges): Promise<PollItem> {
    const { set } = splitChanges({ ...changes });
    try {
        await db.transact([
            {
                type: 'update',
                key: Keys.poll(pollId),
                set: { ...set, updatedAt: timestamp() },
                conditions: [{ kind: 'exists' }],
            },
        ]);
    } catch (err) {
        if (err instanceof ConditionFailedError) {
            throw NotFoundError.of('Poll');
        }
        throw err;
    }

    const poll = await getPoll(db, pollId);
    if (!poll) {
        throw NotFoundError.of('Poll');
    }
    return poll;
}

/**
 * Keys of every row of the poll partition, poll row first.
 */
export async function collectPollKeys(db: TableGateway, pollId: string): Promise<ItemKey[]> {
    const rows = await db.query(pollPartition(pollId));
    const children = rows.filter((row) => row.SK !== MetadataSortKeys.METADATA).flatMap(toKey);
    return [Keys.poll(pollId), ...children];
}

export async function deletePoll(db: TableGateway, pollId: string): Promise<void> {
    await db.deleteAll(await collectPollKeys(db, pollId));
}

// =============================================================================
// Questions and Options
// =============================================================================

/**
 * Append a question with its options.
 *
 * @throws NotFoundError if the poll no longer exists
 */
export async function addQuestion(
    db: TableGateway,
    pollId: string,
    input: NewQuestion,
    position: number
): Promise<QuestionWithOptions> {
    const now = timestamp();
    const built = questionOperations(pollId, input, position, now);
    const operations: WriteOperation[] = [
        { type: 'check', key: Keys.poll(pollId), conditions: [{ kind: 'exists' }] },
        ...built.operations,
    ];
    assertFitsTransaction(operations);

    try {
        await db.transact(operations);
    } catch (err) {
        if (err instanceof ConditionFailedError) {
            if (err.failedAt(0)) throw NotFoundError.of('Poll');
            throw new ConflictError('Option labels must be unique within a question');
        }
        throw err;
    }

    return built.question;
}

/**
 * Add an option to an existing question.
 *
 * @throws NotFoundError if the question is not part of the poll
 * @throws ConflictError if the question already has this label
 */
export async function addOption(
    db: TableGateway,
    pollId: string,
    questionId: string,
    label: string,
    position: number
): Promise<PollOptionItem> {
    const built = optionOperations(pollId, questionId, label, position, timestamp());

    try {
        await db.transact([
            { type: 'check', key: Keys.question(pollId, questionId), conditions: [{ kind: 'exists' }] },
            ...built.operations,
        ]);
    } catch (err) {
        if (err instanceof ConditionFailedError) {
            if (err.failedAt(0)) throw NotFoundError.of('Question');
            throw new ConflictError(`Option "${label}" already exists for this question`);
        }
        throw err;
    }

    return built.option;
}

// =============================================================================
// Votes
// =============================================================================

/** Two operations per vote plus the poll check */
const MAX_VOTES_PER_REQUEST = Math.floor((MAX_TRANSACTION_ITEMS - 1) / 2);

/**
 * Record one vote per listed question, replacing earlier votes of the same
 * voter on those questions. All choices are written or none.
 *
 * @throws ValidationError on a repeated question or an option outside the poll
 * @throws PreconditionFailedError if the poll is not active
 */
export async function castVotes(
    db: TableGateway,
    pollId: string,
    userId: string,
    choices: VoteChoice[]
): Promise<PollVoteItem[]> {
    const seen = new Set<string>();
    choices.forEach((choice, index) => {
        if (seen.has(choice.questionId)) {
            throw ValidationError.field(`${index}.questionId`, 'Only one vote per question is allowed');
        }
        seen.add(choice.questionId);
    });
    if (choices.length > MAX_VOTES_PER_REQUEST) {
        throw ValidationError.field('body', `At most ${MAX_VOTES_PER_REQUEST} votes per request`);
    }

    const now = timestamp();
    const votes = choices.map((choice): PollVoteItem => ({
        ...Keys.vote(pollId, choice.questionId, userId),
        entityType: 'POLL_VOTE',
        pollId,
        questionId: choice.questionId,
        optionId: choice.optionId,
        userId,
        createdAt: now,
        updatedAt: now,
    }));

    const operations: WriteOperation[] = [
        {
            type: 'check',
            key: Keys.poll(pollId),
            conditions: [{ kind: 'exists' }, { kind: 'equals', attribute: 'isActive', value: true }],
        },
        ...votes.flatMap((vote): WriteOperation[] => [
            {
                type: 'check',
                key: Keys.option(pollId, vote.questionId, vote.optionId),
                conditions: [{ kind: 'exists' }],
            },
            { type: 'put', item: vote },
        ]),
    ];

    try {
        await db.transact(operations);
    } catch (err) {
        if (err instanceof ConditionFailedError) {
            const failure = err;
            if (failure.failedAt(0)) throw new PreconditionFailedError(POLL_INACTIVE);
            const invalid = votes.findIndex((_, i) => failure.failedAt(1 + i * 2));
            if (invalid >= 0) {
                throw ValidationError.field(`${invalid}.optionId`, 'Option is not part of this question');
            }
        }
        throw err;
    }

    return votes;
}
