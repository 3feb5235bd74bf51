/**
 * UNIT-03: Handler Wrapper
 *
 * Route resolution and failure handling of `createHandler`, driven with
 * hand-built HTTP API v2 events.
 */

import { describe, it, expect, vi } from 'vitest';
import { ConflictError, createHandler, pathParam, publicRoute, queryParam, success } from '@social-api/shared';
import { buildEvent } from '../../support/api';

const handler = createHandler('probe', {
  'GET /api/things/{thingId}': publicRoute(async (ctx) =>
    success({ thingId: pathParam(ctx, 'thingId'), sort: queryParam(ctx, 'sort') ?? null })
  ),
  'POST /api/things': publicRoute(async () => {
    throw new ConflictError('Thing already exists');
  }),
  'DELETE /api/things/{thingId}': publicRoute(async () => {
    throw new Error('connection reset by peer');
  }),
});

function parse(body: string | undefined): unknown {
  return JSON.parse(body ?? '');
}

describe('UNIT-03: Handler Wrapper', () => {
  it('should decode path parameters and drop empty query values', async () => {
    const response = await handler(buildEvent('GET', '/api/things/a%20b?sort='));

    expect(response.statusCode).toBe(200);
    expect(parse(response.body)).toEqual({ thingId: 'a b', sort: null });
  });

  it('should accept a trailing slash', async () => {
    const response = await handler(buildEvent('GET', '/api/things/t1/'));

    expect(parse(response.body)).toEqual({ thingId: 't1', sort: null });
  });

  it('should prefer the route key matched by the gateway', async () => {
    const event = {
      ...buildEvent('GET', '/api/things/raw'),
      routeKey: 'GET /api/things/{thingId}',
      pathParameters: { thingId: 'from-gateway' },
    };

    const response = await handler(event);

    expect(parse(response.body)).toEqual({ thingId: 'from-gateway', sort: null });
  });

  it('should render thrown API errors with their status', async () => {
    const response = await handler(buildEvent('POST', '/api/things', '{}'));

    expect(response.statusCode).toBe(409);
    expect(parse(response.body)).toEqual({ error: 'conflict', error_description: 'Thing already exists' });
    expect(response.headers?.['Access-Control-Allow-Origin']).toBe('*');
  });

  it('should mask unexpected failures and log them', async () => {
    const response = await handler(buildEvent('DELETE', '/api/things/t1'));

    expect(response.statusCode).toBe(500);
    expect(parse(response.body)).toEqual({ error: 'server_error', error_description: 'An unexpected error occurred' });

    const lines = vi.mocked(console.log).mock.calls.map(([line]) => parse(String(line)));
    expect(lines).toContainEqual(
      expect.objectContaining({
        level: 'ERROR',
        message: 'Unhandled error',
        data: expect.objectContaining({ error: 'connection reset by peer' }),
      })
    );
  });
});
