/**
 * UNIT-04: Reply Trees and Poll Tallies
 *
 * Pure read-side shaping of stored rows.
 */

import { describe, it, expect } from 'vitest';
import type { storage } from '@social-api/shared';
import type { MessageItem } from '../../../modules/shared_types/discussion';
import type { PollOptionItem, PollVoteItem } from '../../../modules/shared_types/poll';
import { buildMessageTree } from '../../../modules/community/discussions/src/mapper';
import { countVotes, toQuestionResults } from '../../../modules/content/polls/src/mapper';

const AT = '2026-05-01T10:00:00.000Z';

function message(messageId: string, parentId?: string): MessageItem {
  return {
    PK: 'THREAD#t1',
    SK: `MESSAGE#${messageId}`,
    entityType: 'MESSAGE',
    messageId,
    threadId: 't1',
    authorId: 'u1',
    content: `text ${messageId}`,
    ...(parentId !== undefined && { parentId }),
    createdAt: AT,
    updatedAt: AT,
  };
}

function option(questionId: string, optionId: string, label: string, position: number): PollOptionItem {
  return {
    PK: 'POLL#p1',
    SK: `OPTION#${optionId}`,
    entityType: 'POLL_OPTION',
    pollId: 'p1',
    questionId,
    optionId,
    label,
    position,
    createdAt: AT,
    updatedAt: AT,
  };
}

function vote(userId: string, questionId: string, optionId: string): PollVoteItem {
  return {
    PK: 'POLL#p1',
    SK: `VOTE#${questionId}#${userId}`,
    entityType: 'POLL_VOTE',
    pollId: 'p1',
    questionId,
    optionId,
    userId,
    createdAt: AT,
    updatedAt: AT,
  };
}

const QUESTION: storage.QuestionWithOptions = {
  PK: 'POLL#p1',
  SK: 'QUESTION#q1',
  entityType: 'POLL_QUESTION',
  pollId: 'p1',
  questionId: 'q1',
  question: 'Which day?',
  position: 0,
  options: [option('q1', 'o1', 'Saturday', 0), option('q1', 'o2', 'Sunday', 1)],
  createdAt: AT,
  updatedAt: AT,
};

describe('UNIT-04: Reply Trees and Poll Tallies', () => {
  describe('buildMessageTree', () => {
    it('should nest replies under their parents in input order', () => {
      const tree = buildMessageTree([message('m1'), message('m2', 'm1'), message('m3'), message('m4', 'm1')]);

      expect(tree.map((node) => node.id)).toEqual(['m1', 'm3']);
      expect(tree[0].replies.map((node) => node.id)).toEqual(['m2', 'm4']);
      expect(tree[1].replies).toEqual([]);
    });

    it('should treat a message with an unknown parent as a root', () => {
      const tree = buildMessageTree([message('m1'), message('m2', 'gone')]);

      expect(tree.map((node) => [node.id, node.parentId])).toEqual([
        ['m1', undefined],
        ['m2', 'gone'],
      ]);
    });
  });

  describe('toQuestionResults', () => {
    it('should count only the votes of the question', () => {
      const votes = [vote('u1', 'q1', 'o2'), vote('u2', 'q1', 'o2'), vote('u3', 'q2', 'o9')];

      const results = toQuestionResults(QUESTION, votes);

      expect(results).toEqual({
        questionId: 'q1',
        totalVotes: 2,
        results: [
          { optionId: 'o1', label: 'Saturday', votes: 0 },
          { optionId: 'o2', label: 'Sunday', votes: 2 },
        ],
        tally: { Saturday: 0, Sunday: 2 },
      });
    });

    it('should count votes per option id', () => {
      const counts = countVotes([vote('u1', 'q1', 'o1'), vote('u2', 'q2', 'o1'), vote('u3', 'q1', 'o2')]);

      expect([...counts.entries()]).toEqual([
        ['o1', 2],
        ['o2', 1],
      ]);
    });
  });
});
