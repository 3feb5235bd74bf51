/**
 * ADD-01: Shopping List
 *
 * Validates the shopping list add-on. Item names are unique per event
 * regardless of case, items can only be added while the list is enabled,
 * and only the owner or an organizer may change an item.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { httpClient, type ErrorResponse } from '../../support/api';
import { createEvent, joinEvent, registerUser, type TestUser } from '../../fixtures';

interface ItemBody {
  id: string;
  eventId: string;
  name: string;
  quantity: number;
  arrivalTime: string;
  ownerId: string;
}

const ARRIVAL = '2026-06-01T17:30:00Z';

describe('ADD-01: Shopping List', () => {
  let organizer: TestUser;
  let guest: TestUser;
  let eventId: string;

  async function addItem(user: TestUser, name: string): Promise<ItemBody> {
    const response = await httpClient.postJson<ItemBody>(
      `/api/shopping/events/${eventId}/items`,
      { name, quantity: 2, arrivalTime: ARRIVAL },
      user.auth
    );
    expect(response.status).toBe(201);
    return response.data;
  }

  beforeEach(async () => {
    organizer = await registerUser('Organizer');
    guest = await registerUser('Guest');
    eventId = (await createEvent(organizer, { shoppingListEnabled: true })).id;
    await joinEvent(guest, eventId);
  });

  it('should add an item owned by the caller', async () => {
    const item = await addItem(guest, 'Chairs');

    expect(item).toMatchObject({
      eventId,
      name: 'Chairs',
      quantity: 2,
      arrivalTime: '2026-06-01T17:30:00.000Z',
      ownerId: guest.id,
    });
  });

  it('should refuse items while the list is disabled', async () => {
    const plain = await createEvent(organizer);

    const response = await httpClient.postJson<ErrorResponse>(
      `/api/shopping/events/${plain.id}/items`,
      { name: 'Cups', quantity: 1, arrivalTime: ARRIVAL },
      organizer.auth
    );

    expect(response.status).toBe(412);
    expect(response.data.error_description).toBe('Shopping list is disabled for this event');
  });

  it('should reject a name already on the list in any case', async () => {
    await addItem(guest, 'Chairs');

    const response = await httpClient.postJson<ErrorResponse>(
      `/api/shopping/events/${eventId}/items`,
      { name: 'CHAIRS', quantity: 4, arrivalTime: ARRIVAL },
      organizer.auth
    );

    expect(response.status).toBe(409);
    expect(response.data.error_description).toBe('Item "CHAIRS" is already on the shopping list');
  });

  it('should free the old name when an item is renamed', async () => {
    const chairs = await addItem(guest, 'Chairs');
    await addItem(guest, 'Cups');

    const taken = await httpClient.patchJson<ErrorResponse>(`/api/shopping/items/${chairs.id}`, { name: 'cups' }, guest.auth);
    const renamed = await httpClient.patchJson<ItemBody>(`/api/shopping/items/${chairs.id}`, { name: 'Tables' }, guest.auth);

    expect(taken.status).toBe(409);
    expect(renamed.status).toBe(200);
    expect(renamed.data.name).toBe('Tables');
    await addItem(organizer, 'Chairs');
  });

  it('should let only the owner or an organizer change an item', async () => {
    const other = await registerUser('Other Guest');
    await joinEvent(other, eventId);
    const item = await addItem(guest, 'Ice');

    const byOther = await httpClient.patchJson<ErrorResponse>(`/api/shopping/items/${item.id}`, { quantity: 9 }, other.auth);
    const byOrganizer = await httpClient.patchJson<ItemBody>(`/api/shopping/items/${item.id}`, { quantity: 9 }, organizer.auth);
    const deleted = await httpClient.delete(`/api/shopping/items/${item.id}`, guest.auth);

    expect(byOther.status).toBe(403);
    expect(byOrganizer.status).toBe(200);
    expect(byOrganizer.data.quantity).toBe(9);
    expect(deleted.status).toBe(204);
  });

  it('should list the items of the event', async () => {
    const item = await addItem(guest, 'Napkins');

    const listing = await httpClient.get<ItemBody[]>(`/api/shopping/events/${eventId}/items`, organizer.auth);

    expect(listing.data.map((i) => i.id)).toEqual([item.id]);
  });
});
