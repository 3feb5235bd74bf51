/**
 * EVT-03: Organizers
 *
 * Validates organizer management. Every organizer must be an existing
 * user and an event keeps at least one organizer.
 */

import { describe, it, expect } from 'vitest';
import { httpClient, type ErrorResponse } from '../../support/api';
import { EVENT_DATES, createEvent, registerUser } from '../../fixtures';

interface EventDetail {
  organizers: { userId: string }[];
}

describe('EVT-03: Organizers', () => {
  it('should create an event with extra organizers', async () => {
    const creator = await registerUser('Creator');
    const helper = await registerUser('Helper');
    const event = await createEvent(creator, { organizerIds: [helper.id, creator.id] });

    const response = await httpClient.get<EventDetail>(`/api/events/${event.id}`, creator.auth);

    expect(response.data.organizers.map((o) => o.userId).sort()).toEqual([creator.id, helper.id].sort());
  });

  it('should write nothing when an extra organizer does not exist', async () => {
    const creator = await registerUser('Creator');

    const response = await httpClient.postJson<ErrorResponse>(
      '/api/events',
      { name: 'Ghost Party', location: 'Attic', ...EVENT_DATES, organizerIds: ['ghost'] },
      creator.auth
    );
    const listing = await httpClient.get<unknown[]>('/api/events', creator.auth);

    expect(response.status).toBe(404);
    expect(response.data.error_description).toBe('Organizer ghost not found');
    expect(listing.data).toEqual([]);
  });

  it('should add an organizer once', async () => {
    const creator = await registerUser('Creator');
    const helper = await registerUser('Helper');
    const event = await createEvent(creator);

    const first = await httpClient.postJson<{ userId: string }>(
      `/api/events/${event.id}/organizers`,
      { userId: helper.id },
      creator.auth
    );
    const second = await httpClient.postJson<ErrorResponse>(
      `/api/events/${event.id}/organizers`,
      { userId: helper.id },
      creator.auth
    );

    expect(first.status).toBe(201);
    expect(first.data.userId).toBe(helper.id);
    expect(second.status).toBe(409);
    expect(second.data.error_description).toBe('User is already an organizer of this event');
  });

  it('should answer 404 when adding an unknown user', async () => {
    const creator = await registerUser('Creator');
    const event = await createEvent(creator);

    const response = await httpClient.postJson<ErrorResponse>(
      `/api/events/${event.id}/organizers`,
      { userId: 'nobody' },
      creator.auth
    );

    expect(response.status).toBe(404);
    expect(response.data.error_description).toBe('User not found');
  });

  it('should keep the last organizer', async () => {
    const creator = await registerUser('Creator');
    const helper = await registerUser('Helper');
    const event = await createEvent(creator, { organizerIds: [helper.id] });

    const first = await httpClient.delete(`/api/events/${event.id}/organizers/${helper.id}`, creator.auth);
    const last = await httpClient.delete<ErrorResponse>(`/api/events/${event.id}/organizers/${creator.id}`, creator.auth);

    expect(first.status).toBe(204);
    expect(last.status).toBe(409);
    expect(last.data.error_description).toBe('An event must keep at least one organizer');
  });

  it('should forbid organizer changes by non-organizers', async () => {
    const creator = await registerUser('Creator');
    const stranger = await registerUser('Stranger');
    const event = await createEvent(creator);

    const response = await httpClient.postJson<ErrorResponse>(
      `/api/events/${event.id}/organizers`,
      { userId: stranger.id },
      stranger.auth
    );

    expect(response.status).toBe(403);
  });
});
