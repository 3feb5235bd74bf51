/**
 * POL-01: Poll Setup
 *
 * Validates creating polls with their questions and options, extending
 * them afterwards, and the rules on option labels. Only organizers set up
 * polls, and only while polls are enabled for the event.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { httpClient, type ErrorResponse } from '../../support/api';
import { createEvent, joinEvent, registerUser, type TestUser } from '../../fixtures';

interface OptionBody {
  id: string;
  questionId: string;
  label: string;
  votes: number;
}

interface QuestionBody {
  id: string;
  pollId: string;
  question: string;
  options: OptionBody[];
}

interface PollBody {
  id: string;
  eventId: string;
  title: string;
  isActive: boolean;
  questions: QuestionBody[];
}

const DRINKS_POLL = {
  title: 'Drinks',
  questions: [{ question: 'Beer or wine?', options: [{ label: 'Beer' }, { label: 'Wine' }] }],
};

describe('POL-01: Poll Setup', () => {
  let organizer: TestUser;
  let eventId: string;

  beforeEach(async () => {
    organizer = await registerUser('Organizer');
    eventId = (await createEvent(organizer)).id;
  });

  it('should create a poll with its questions and options', async () => {
    const response = await httpClient.postJson<PollBody>(`/api/polls/events/${eventId}`, DRINKS_POLL, organizer.auth);

    expect(response.status).toBe(201);
    expect(response.data).toMatchObject({ eventId, title: 'Drinks', isActive: true });
    expect(response.data.questions).toHaveLength(1);
    expect(response.data.questions[0].question).toBe('Beer or wine?');
    expect(response.data.questions[0].options.map((o) => [o.label, o.votes])).toEqual([
      ['Beer', 0],
      ['Wine', 0],
    ]);
  });

  it('should refuse polls while they are disabled for the event', async () => {
    await httpClient.patchJson(`/api/events/${eventId}`, { pollsEnabled: false }, organizer.auth);

    const response = await httpClient.postJson<ErrorResponse>(`/api/polls/events/${eventId}`, DRINKS_POLL, organizer.auth);

    expect(response.status).toBe(412);
    expect(response.data).toEqual({
      error: 'precondition_failed',
      error_description: 'Polls are disabled for this event',
    });
  });

  it('should forbid participants from creating polls', async () => {
    const guest = await registerUser('Guest');
    await joinEvent(guest, eventId);

    const response = await httpClient.postJson<ErrorResponse>(`/api/polls/events/${eventId}`, DRINKS_POLL, guest.auth);

    expect(response.status).toBe(403);
    expect(response.data.error_description).toBe('Not permitted: event:manage-content');
  });

  it('should require at least two options per question', async () => {
    const response = await httpClient.postJson<ErrorResponse>(
      `/api/polls/events/${eventId}`,
      { title: 'Lonely', questions: [{ question: 'Only one?', options: [{ label: 'Yes' }] }] },
      organizer.auth
    );

    expect(response.status).toBe(422);
    expect(response.data.errors?.map((e) => e.field)).toEqual(['questions.0.options']);
  });

  it('should reject a label repeated within a question', async () => {
    const response = await httpClient.postJson<ErrorResponse>(
      `/api/polls/events/${eventId}`,
      { title: 'Echo', questions: [{ question: 'Again?', options: [{ label: 'Yes' }, { label: 'yes ' }] }] },
      organizer.auth
    );

    expect(response.status).toBe(422);
    expect(response.data.errors).toEqual([
      { field: 'questions.0.options.1.label', message: 'Option "yes" is repeated' },
    ]);
  });

  it('should add questions and options to an existing poll', async () => {
    const poll = await httpClient.postJson<PollBody>(`/api/polls/events/${eventId}`, DRINKS_POLL, organizer.auth);

    const question = await httpClient.postJson<QuestionBody>(
      `/api/polls/${poll.data.id}/questions`,
      { question: 'Snacks?', options: [{ label: 'Chips' }, { label: 'Nuts' }] },
      organizer.auth
    );
    const option = await httpClient.postJson<OptionBody>(
      `/api/polls/${poll.data.id}/questions/${question.data.id}/options`,
      { label: 'Olives' },
      organizer.auth
    );
    const detail = await httpClient.get<PollBody>(`/api/polls/${poll.data.id}`, organizer.auth);

    expect(question.status).toBe(201);
    expect(option.status).toBe(201);
    expect(option.data).toMatchObject({ questionId: question.data.id, label: 'Olives', votes: 0 });
    expect(detail.data.questions.map((q) => q.question)).toEqual(['Beer or wine?', 'Snacks?']);
    expect(detail.data.questions[1].options.map((o) => o.label)).toEqual(['Chips', 'Nuts', 'Olives']);
  });

  it('should reject an option label already used by the question', async () => {
    const poll = await httpClient.postJson<PollBody>(`/api/polls/events/${eventId}`, DRINKS_POLL, organizer.auth);
    const questionId = poll.data.questions[0].id;

    const response = await httpClient.postJson<ErrorResponse>(
      `/api/polls/${poll.data.id}/questions/${questionId}/options`,
      { label: 'WINE' },
      organizer.auth
    );

    expect(response.status).toBe(409);
    expect(response.data.error_description).toBe('Option "WINE" already exists for this question');
  });

  it('should answer 404 for an unknown question', async () => {
    const poll = await httpClient.postJson<PollBody>(`/api/polls/events/${eventId}`, DRINKS_POLL, organizer.auth);

    const response = await httpClient.get<ErrorResponse>(
      `/api/polls/${poll.data.id}/questions/unknown/results`,
      organizer.auth
    );

    expect(response.status).toBe(404);
    expect(response.data.error_description).toBe('Question not found');
  });
});
