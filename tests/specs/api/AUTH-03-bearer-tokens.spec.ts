/**
 * AUTH-03: Bearer Token Resolution
 *
 * Validates that authenticated routes accept only tokens signed with the
 * configured secret and issuer, for a user that still exists and is
 * active.
 */

import { describe, it, expect } from 'vitest';
import { SignJWT } from 'jose';
import { bearer, currentTable, httpClient, type ErrorResponse } from '../../support/api';
import { registerUser } from '../../fixtures';

async function signToken(subject: string, secret: string, issuer = 'social-api-test'): Promise<string> {
  return new SignJWT({})
    .setProtectedHeader({ alg: 'HS256', typ: 'JWT' })
    .setSubject(subject)
    .setIssuer(issuer)
    .setIssuedAt()
    .setExpirationTime('5m')
    .sign(new TextEncoder().encode(secret));
}

describe('AUTH-03: Bearer Token Resolution', () => {
  it('should challenge a request without a token', async () => {
    const response = await httpClient.get<ErrorResponse>('/api/users/me');

    expect(response.status).toBe(401);
    expect(response.headers['WWW-Authenticate']).toBe('Bearer');
    expect(response.data.error_description).toBe('Bearer token required');
  });

  it('should reject a token that is not a JWT', async () => {
    const response = await httpClient.get<ErrorResponse>('/api/users/me', bearer('not-a-token'));

    expect(response.status).toBe(401);
    expect(response.data.error_description).toBe('The access token is invalid or expired');
  });

  it('should reject a token signed with another secret', async () => {
    const user = await registerUser();
    const token = await signToken(user.id, 'other-secret');

    const response = await httpClient.get<ErrorResponse>('/api/users/me', bearer(token));

    expect(response.status).toBe(401);
  });

  it('should reject a token from another issuer', async () => {
    const user = await registerUser();
    const token = await signToken(user.id, 'test-secret', 'someone-else');

    const response = await httpClient.get<ErrorResponse>('/api/users/me', bearer(token));

    expect(response.status).toBe(401);
  });

  it('should reject a valid token for a user that does not exist', async () => {
    const token = await signToken('missing-user', 'test-secret');

    const response = await httpClient.get<ErrorResponse>('/api/users/me', bearer(token));

    expect(response.status).toBe(401);
    expect(response.data.error_description).toBe('The access token is invalid or expired');
  });

  it('should forbid an inactive user holding a valid token', async () => {
    const user = await registerUser();
    await currentTable().transact([
      { type: 'update', key: { PK: `USER#${user.id}`, SK: 'PROFILE' }, set: { isActive: false } },
    ]);

    const response = await httpClient.get<ErrorResponse>('/api/users/me', user.auth);

    expect(response.status).toBe(403);
    expect(response.data).toEqual({ error: 'forbidden', error_description: 'User account is inactive' });
  });
});
