/**
 * ADD-02: Carpooling
 *
 * Validates carpool offers: created while carpooling is enabled, listed
 * by departure time, and changed only by their driver or an organizer.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { httpClient, type ErrorResponse } from '../../support/api';
import { createEvent, joinEvent, registerUser, type TestUser } from '../../fixtures';

interface OfferBody {
  id: string;
  eventId: string;
  driverId: string;
  departureLocation: string;
  departureTime: string;
  price: number;
  availableSeats: number;
  maxDetourMinutes: number;
}

function offerBody(departureTime: string, departureLocation = 'Central Station'): Record<string, unknown> {
  return { departureLocation, departureTime, price: 4, availableSeats: 3, maxDetourMinutes: 15 };
}

describe('ADD-02: Carpooling', () => {
  let organizer: TestUser;
  let driver: TestUser;
  let eventId: string;

  async function offer(user: TestUser, departureTime: string, location?: string): Promise<OfferBody> {
    const response = await httpClient.postJson<OfferBody>(
      `/api/carpool/events/${eventId}/offers`,
      offerBody(departureTime, location),
      user.auth
    );
    expect(response.status).toBe(201);
    return response.data;
  }

  beforeEach(async () => {
    organizer = await registerUser('Organizer');
    driver = await registerUser('Driver');
    eventId = (await createEvent(organizer, { carpoolEnabled: true })).id;
    await joinEvent(driver, eventId);
  });

  it('should create an offer driven by the caller', async () => {
    const created = await offer(driver, '2026-06-01T16:00:00Z');

    expect(created).toMatchObject({
      eventId,
      driverId: driver.id,
      departureLocation: 'Central Station',
      departureTime: '2026-06-01T16:00:00.000Z',
      price: 4,
      availableSeats: 3,
      maxDetourMinutes: 15,
    });
  });

  it('should refuse offers while carpooling is disabled', async () => {
    const plain = await createEvent(organizer);

    const response = await httpClient.postJson<ErrorResponse>(
      `/api/carpool/events/${plain.id}/offers`,
      offerBody('2026-06-01T16:00:00Z'),
      organizer.auth
    );

    expect(response.status).toBe(412);
    expect(response.data.error_description).toBe('Carpooling is disabled for this event');
  });

  it('should require at least one seat', async () => {
    const response = await httpClient.postJson<ErrorResponse>(
      `/api/carpool/events/${eventId}/offers`,
      { ...offerBody('2026-06-01T16:00:00Z'), availableSeats: 0 },
      driver.auth
    );

    expect(response.status).toBe(422);
    expect(response.data.errors?.map((e) => e.field)).toEqual(['availableSeats']);
  });

  it('should list offers by departure time', async () => {
    const late = await offer(driver, '2026-06-01T17:00:00Z', 'North');
    const early = await offer(organizer, '2026-06-01T15:00:00Z', 'South');

    const listing = await httpClient.get<OfferBody[]>(`/api/carpool/events/${eventId}/offers`, driver.auth);

    expect(listing.data.map((o) => o.id)).toEqual([early.id, late.id]);
  });

  it('should order departures given with different offsets by instant', async () => {
    const utc = await offer(driver, '2026-06-01T14:00:00Z', 'North');
    const offset = await offer(organizer, '2026-06-01T18:00:00+05:00', 'South');

    const listing = await httpClient.get<OfferBody[]>(`/api/carpool/events/${eventId}/offers`, driver.auth);

    expect(offset.departureTime).toBe('2026-06-01T13:00:00.000Z');
    expect(listing.data.map((o) => o.id)).toEqual([offset.id, utc.id]);
  });

  it('should reorder an offer when its departure changes', async () => {
    const first = await offer(driver, '2026-06-01T15:00:00Z');
    const second = await offer(organizer, '2026-06-01T16:00:00Z');

    const moved = await httpClient.patchJson<OfferBody>(
      `/api/carpool/offers/${first.id}`,
      { departureTime: '2026-06-01T18:00:00Z', availableSeats: 1 },
      driver.auth
    );
    const listing = await httpClient.get<OfferBody[]>(`/api/carpool/events/${eventId}/offers`, driver.auth);

    expect(moved.status).toBe(200);
    expect(moved.data.availableSeats).toBe(1);
    expect(listing.data.map((o) => o.id)).toEqual([second.id, first.id]);
  });

  it('should let only the driver or an organizer withdraw an offer', async () => {
    const passenger = await registerUser('Passenger');
    await joinEvent(passenger, eventId);
    const created = await offer(driver, '2026-06-01T16:00:00Z');

    const byPassenger = await httpClient.delete<ErrorResponse>(`/api/carpool/offers/${created.id}`, passenger.auth);
    const byDriver = await httpClient.delete(`/api/carpool/offers/${created.id}`, driver.auth);
    const again = await httpClient.delete<ErrorResponse>(`/api/carpool/offers/${created.id}`, driver.auth);

    expect(byPassenger.status).toBe(403);
    expect(byDriver.status).toBe(204);
    expect(again.status).toBe(404);
    expect(again.data.error_description).toBe('Carpool offer not found');
  });
});
