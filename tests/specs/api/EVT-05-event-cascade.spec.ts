/**
 * EVT-05: Event Deletion Cascade
 *
 * Deleting an event removes everything that hangs off it: organizers,
 * participants, threads and messages, albums with photos and comments,
 * polls with votes, ticket types with tickets, and add-on rows.
 */

import { describe, it, expect } from 'vitest';
import { currentTable, httpClient, type ErrorResponse } from '../../support/api';
import { createEvent, joinEvent, registerUser, type Created } from '../../fixtures';

interface PollBody {
  id: string;
  questions: { id: string; options: { id: string }[] }[];
}

describe('EVT-05: Event Deletion Cascade', () => {
  it('should remove every row the event owns', async () => {
    const organizer = await registerUser('Organizer');
    const guest = await registerUser('Guest');
    const event = await createEvent(organizer, {
      ticketingEnabled: true,
      shoppingListEnabled: true,
      carpoolEnabled: true,
    });
    await joinEvent(guest, event.id);

    const thread = await httpClient.postJson<Created>(
      '/api/discussions',
      { title: 'Logistics', context: 'event', eventId: event.id },
      guest.auth
    );
    await httpClient.postJson(`/api/discussions/${thread.data.id}/messages`, { content: 'Who brings chairs?' }, guest.auth);

    const album = await httpClient.postJson<Created>(`/api/media/events/${event.id}/albums`, { name: 'Photos' }, guest.auth);
    const photo = await httpClient.postJson<Created>(
      `/api/media/albums/${album.data.id}/photos`,
      { url: 'https://images.example.com/1.jpg' },
      guest.auth
    );
    await httpClient.postJson(`/api/media/photos/${photo.data.id}/comments`, { content: 'Nice' }, organizer.auth);

    const poll = await httpClient.postJson<PollBody>(
      `/api/polls/events/${event.id}`,
      { title: 'Food', questions: [{ question: 'Pizza?', options: [{ label: 'yes' }, { label: 'no' }] }] },
      organizer.auth
    );
    const [question] = poll.data.questions;
    await httpClient.postJson(
      `/api/polls/${poll.data.id}/votes`,
      [{ questionId: question.id, optionId: question.options[0].id }],
      guest.auth
    );

    const ticketType = await httpClient.postJson<Created>(
      `/api/tickets/events/${event.id}/types`,
      { name: 'Standard', price: 10, quantity: 5 },
      organizer.auth
    );
    await httpClient.postJson(
      `/api/tickets/types/${ticketType.data.id}/purchase`,
      { purchaserFirstName: 'Gina', purchaserLastName: 'Guest', purchaserEmail: 'gina@example.com' },
      guest.auth
    );

    await httpClient.postJson(
      `/api/shopping/events/${event.id}/items`,
      { name: 'Chairs', quantity: 10, arrivalTime: '2026-06-01T17:00:00Z' },
      guest.auth
    );
    await httpClient.postJson(
      `/api/carpool/events/${event.id}/offers`,
      {
        departureLocation: 'Station',
        departureTime: '2026-06-01T17:00:00Z',
        price: 0,
        availableSeats: 3,
        maxDetourMinutes: 10,
      },
      guest.auth
    );

    const deleted = await httpClient.delete(`/api/events/${event.id}`, organizer.auth);
    expect(deleted.status).toBe(204);

    const photoAfter = await httpClient.get<ErrorResponse>(`/api/media/photos/${photo.data.id}`, guest.auth);
    const pollAfter = await httpClient.get<ErrorResponse>(`/api/polls/${poll.data.id}`, guest.auth);

    expect(photoAfter.status).toBe(404);
    expect(pollAfter.status).toBe(404);
    // Two rows per user remain: the profile and the email marker
    expect(currentTable().size).toBe(4);
  });
});
