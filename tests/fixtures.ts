/**
 * Test Fixtures
 *
 * Builders that go through the public endpoints, so every fixture row is
 * written exactly the way a client would create it.
 */

import { expect } from 'vitest';
import { bearer, httpClient, type RequestOptions } from './support/api';

export const TEST_PASSWORD = 'test-password';

export interface TestUser {
  id: string;
  email: string;
  fullName: string;
  token: string;
  auth: RequestOptions;
}

export interface Created {
  id: string;
}

let sequence = 0;

/** A fresh, unique address per call */
export function uniqueEmail(label = 'user'): string {
  sequence += 1;
  return `${label}-${sequence}@example.com`;
}

export async function registerUser(fullName = 'Test User', email = uniqueEmail()): Promise<TestUser> {
  const registered = await httpClient.postJson<{ id: string; email: string }>('/api/auth/register', {
    email,
    password: TEST_PASSWORD,
    fullName,
  });
  expect(registered.status).toBe(201);

  const login = await httpClient.postJson<{ accessToken: string }>('/api/auth/login', {
    email,
    password: TEST_PASSWORD,
  });
  expect(login.status).toBe(200);

  return {
    id: registered.data.id,
    email: registered.data.email,
    fullName,
    token: login.data.accessToken,
    auth: bearer(login.data.accessToken),
  };
}

export async function createGroup(owner: TestUser, overrides: Record<string, unknown> = {}): Promise<Created> {
  const response = await httpClient.postJson<Created>(
    '/api/groups',
    { name: 'Hiking Club', type: 'public', ...overrides },
    owner.auth
  );
  expect(response.status).toBe(201);
  return response.data;
}

export async function addMember(admin: TestUser, groupId: string, userId: string, role = 'member'): Promise<void> {
  const response = await httpClient.postJson(`/api/groups/${groupId}/members`, { userId, role }, admin.auth);
  expect(response.status).toBe(201);
}

export const EVENT_DATES = {
  startDate: '2026-06-01T18:00:00Z',
  endDate: '2026-06-01T23:00:00Z',
} as const;

export async function createEvent(creator: TestUser, overrides: Record<string, unknown> = {}): Promise<Created> {
  const response = await httpClient.postJson<Created>(
    '/api/events',
    { name: 'Summer Party', location: 'Town Hall', ...EVENT_DATES, ...overrides },
    creator.auth
  );
  expect(response.status).toBe(201);
  return response.data;
}

export async function joinEvent(user: TestUser, eventId: string, status = 'going'): Promise<void> {
  const response = await httpClient.postJson(`/api/events/${eventId}/participants`, { status }, user.auth);
  expect(response.status).toBe(201);
}
