/**
 * Polls - Response Mapping and Tallies
 *
 * Vote counts are computed on read from the vote rows of the poll
 * partition; nothing stores a running count.
 *
 * @module content/polls/mapper
 */

import type { storage } from '@social-api/shared';
import type { PollItem, PollOptionItem, PollVoteItem } from '../../../shared_types/poll';

export interface PollResponse {
    id: string;
    eventId: string;
    title: string;
    isActive: boolean;
    createdById: string;
    createdAt: string;
}

export interface OptionResponse {
    id: string;
    questionId: string;
    label: string;
    votes: number;
}

export interface QuestionResponse {
    id: string;
    pollId: string;
    question: string;
    options: OptionResponse[];
}

export interface PollDetailResponse extends PollResponse {
    questions: QuestionResponse[];
}

export interface QuestionResults {
    questionId: string;
    totalVotes: number;
    results: { optionId: string; label: string; votes: number }[];
    /** Label to vote count */
    tally: Record<string, number>;
}

export function toPollResponse(poll: PollItem): PollResponse {
    return {
        id: poll.pollId,
        eventId: poll.eventId,
        title: poll.title,
        isActive: poll.isActive,
        createdById: poll.createdById,
        createdAt: poll.createdAt,
    };
}

/**
 * Votes per option id.
 */
export function countVotes(votes: PollVoteItem[]): Map<string, number> {
    const counts = new Map<string, number>();
    for (const vote of votes) {
        counts.set(vote.optionId, (counts.get(vote.optionId) ?? 0) + 1);
    }
    return counts;
}

function toOptionResponse(option: PollOptionItem, counts: Map<string, number>): OptionResponse {
    return {
        id: option.optionId,
        questionId: option.questionId,
        label: option.label,
        votes: counts.get(option.optionId) ?? 0,
    };
}

export function toQuestionResponse(
    question: storage.QuestionWithOptions,
    counts: Map<string, number> = new Map()
): QuestionResponse {
    return {
        id: question.questionId,
        pollId: question.pollId,
        question: question.question,
        options: question.options.map((option) => toOptionResponse(option, counts)),
    };
}

export function toPollDetailResponse(structure: storage.PollStructure): PollDetailResponse {
    const counts = countVotes(structure.votes);
    return {
        ...toPollResponse(structure.poll),
        questions: structure.questions.map((question) => toQuestionResponse(question, counts)),
    };
}

export function toQuestionResults(
    question: storage.QuestionWithOptions,
    votes: PollVoteItem[]
): QuestionResults {
    const counts = countVotes(votes.filter((vote) => vote.questionId === question.questionId));
    const results = question.options.map((option) => ({
        optionId: option.optionId,
        label: option.label,
        votes: counts.get(option.optionId) ?? 0,
    }));

    return {
        questionId: question.questionId,
        totalVotes: results.reduce((sum, result) => sum + result.votes, 0),
        results,
        tally: Object.fromEntries(results.map((result) => [result.label, result.votes])),
    };
}
