/**
 * EVT-01: Event Lifecycle
 *
 * Validates creating, reading, updating and deleting a standalone event.
 * The creator becomes its first organizer and the end must follow the
 * start, on creation and on every update.
 */

import { describe, it, expect } from 'vitest';
import { httpClient, type ErrorResponse } from '../../support/api';
import { EVENT_DATES, createEvent, registerUser } from '../../fixtures';

interface EventBody {
  id: string;
  name: string;
  startDate: string;
  endDate: string;
  isPrivate: boolean;
  pollsEnabled: boolean;
  ticketingEnabled: boolean;
  shoppingListEnabled: boolean;
  carpoolEnabled: boolean;
  createdById: string;
  organizers: { userId: string }[];
  participants: { userId: string }[];
}

describe('EVT-01: Event Lifecycle', () => {
  it('should create an event with default feature flags', async () => {
    const creator = await registerUser('Creator');

    const response = await httpClient.postJson<EventBody>(
      '/api/events',
      { name: 'Summer Party', location: 'Town Hall', ...EVENT_DATES },
      creator.auth
    );

    expect(response.status).toBe(201);
    expect(response.data).toMatchObject({
      name: 'Summer Party',
      isPrivate: false,
      pollsEnabled: true,
      ticketingEnabled: false,
      shoppingListEnabled: false,
      carpoolEnabled: false,
      createdById: creator.id,
    });
  });

  it('should list the creator as organizer', async () => {
    const creator = await registerUser('Creator');
    const event = await createEvent(creator);

    const response = await httpClient.get<EventBody>(`/api/events/${event.id}`, creator.auth);

    expect(response.status).toBe(200);
    expect(response.data.organizers.map((o) => o.userId)).toEqual([creator.id]);
    expect(response.data.participants).toEqual([]);
  });

  it('should reject an end before the start', async () => {
    const creator = await registerUser();

    const response = await httpClient.postJson<ErrorResponse>(
      '/api/events',
      { name: 'Backwards', location: 'Nowhere', startDate: EVENT_DATES.endDate, endDate: EVENT_DATES.startDate },
      creator.auth
    );

    expect(response.status).toBe(422);
    expect(response.data.errors).toEqual([{ field: 'endDate', message: 'endDate must be after startDate' }]);
  });

  it('should check date order against the stored event on update', async () => {
    const creator = await registerUser();
    const event = await createEvent(creator);

    const response = await httpClient.patchJson<ErrorResponse>(
      `/api/events/${event.id}`,
      { startDate: '2026-06-02T00:00:00Z' },
      creator.auth
    );

    expect(response.status).toBe(422);
    expect(response.data.errors).toEqual([{ field: 'endDate', message: 'endDate must be after startDate' }]);
  });

  it('should let an organizer update fields and flags', async () => {
    const creator = await registerUser();
    const event = await createEvent(creator);

    const response = await httpClient.patchJson<EventBody>(
      `/api/events/${event.id}`,
      { name: 'Winter Party', ticketingEnabled: true },
      creator.auth
    );

    expect(response.status).toBe(200);
    expect(response.data.name).toBe('Winter Party');
    expect(response.data.ticketingEnabled).toBe(true);
  });

  it('should forbid updates by a participant', async () => {
    const creator = await registerUser('Creator');
    const guest = await registerUser('Guest');
    const event = await createEvent(creator);
    await httpClient.postJson(`/api/events/${event.id}/participants`, {}, guest.auth);

    const response = await httpClient.patchJson<ErrorResponse>(`/api/events/${event.id}`, { name: 'Mine' }, guest.auth);

    expect(response.status).toBe(403);
    expect(response.data.error_description).toBe('Not permitted: event:update');
  });

  it('should list events by start instant whatever the offset', async () => {
    const creator = await registerUser('Creator');
    const utc = await createEvent(creator, { startDate: '2026-06-01T14:00:00Z' });
    const offset = await createEvent(creator, { startDate: '2026-06-01T18:00:00+05:00' });

    const before = await httpClient.get<EventBody[]>('/api/events', creator.auth);
    const moved = await httpClient.patchJson<EventBody>(
      `/api/events/${utc.id}`,
      { startDate: '2026-06-01T16:00:00+05:00' },
      creator.auth
    );
    const after = await httpClient.get<EventBody[]>('/api/events', creator.auth);

    expect(before.data.map((e) => e.id)).toEqual([offset.id, utc.id]);
    expect(moved.data.startDate).toBe('2026-06-01T11:00:00.000Z');
    expect(after.data.map((e) => e.id)).toEqual([utc.id, offset.id]);
  });

  it('should delete an event', async () => {
    const creator = await registerUser();
    const event = await createEvent(creator);

    expect((await httpClient.delete(`/api/events/${event.id}`, creator.auth)).status).toBe(204);

    const response = await httpClient.get<ErrorResponse>(`/api/events/${event.id}`, creator.auth);
    expect(response.status).toBe(404);
    expect(response.data.error_description).toBe('Event not found');
  });
});
