/**
 * AUTH-01: Registration
 *
 * Validates account creation: the stored email is normalized, the
 * password hash never leaves the API, and an address can be registered
 * only once regardless of its case.
 */

import { describe, it, expect } from 'vitest';
import { httpClient, type ErrorResponse } from '../../support/api';
import { TEST_PASSWORD } from '../../fixtures';

interface RegisteredUser {
  id: string;
  email: string;
  fullName: string;
  isActive: boolean;
}

describe('AUTH-01: Registration', () => {
  it('should create an account with a normalized email', async () => {
    const response = await httpClient.postJson<RegisteredUser>('/api/auth/register', {
      email: ' Alice@Example.COM ',
      password: TEST_PASSWORD,
      fullName: 'Alice Doe',
    });

    expect(response.status).toBe(201);
    expect(response.data.email).toBe('alice@example.com');
    expect(response.data.fullName).toBe('Alice Doe');
    expect(response.data.isActive).toBe(true);
    expect(typeof response.data.id).toBe('string');
    expect(response.data).not.toHaveProperty('passwordHash');
  });

  it('should reject a second registration of the same email with 409', async () => {
    const body = { email: 'bob@example.com', password: TEST_PASSWORD, fullName: 'Bob' };
    expect((await httpClient.postJson('/api/auth/register', body)).status).toBe(201);

    const response = await httpClient.postJson<ErrorResponse>('/api/auth/register', {
      ...body,
      email: 'BOB@example.com',
    });

    expect(response.status).toBe(409);
    expect(response.data.error).toBe('conflict');
    expect(response.data.error_description).toBe('A user with this email already exists');
  });

  it('should reject a malformed email with 422', async () => {
    const response = await httpClient.postJson<ErrorResponse>('/api/auth/register', {
      email: 'not-an-email',
      password: TEST_PASSWORD,
      fullName: 'Carol',
    });

    expect(response.status).toBe(422);
    expect(response.data.error).toBe('validation_failed');
    expect(response.data.errors).toEqual([{ field: 'email', message: 'Invalid email address' }]);
  });

  it('should reject a password shorter than 8 characters', async () => {
    const response = await httpClient.postJson<ErrorResponse>('/api/auth/register', {
      email: 'dave@example.com',
      password: 'short',
      fullName: 'Dave',
    });

    expect(response.status).toBe(422);
    expect(response.data.errors?.map((e) => e.field)).toEqual(['password']);
  });

  it('should reject a request without a body', async () => {
    const response = await httpClient.request<ErrorResponse>('POST', '/api/auth/register');

    expect(response.status).toBe(422);
    expect(response.data.errors).toEqual([{ field: 'body', message: 'Request body is required' }]);
  });
});
