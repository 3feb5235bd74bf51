/**
 * HTTP Client for In-Process Handlers
 *
 * Builds HTTP API v2 events the way API Gateway would ($default route,
 * raw path, lower-case headers) and dispatches them to the module handler
 * that owns the path prefix.
 */

import { randomUUID } from 'node:crypto';
import type { APIGatewayProxyEventV2 } from 'aws-lambda';
import { getTableGateway, type ApiHandler } from '@social-api/shared';
import { handler as authHandler } from '../../modules/identity/auth/src/index';
import { handler as usersHandler } from '../../modules/identity/users/src/index';
import { handler as groupsHandler } from '../../modules/community/groups/src/index';
import { handler as eventsHandler } from '../../modules/community/events/src/index';
import { handler as discussionsHandler } from '../../modules/community/discussions/src/index';
import { handler as mediaHandler } from '../../modules/content/media/src/index';
import { handler as pollsHandler } from '../../modules/content/polls/src/index';
import { handler as ticketsHandler } from '../../modules/commerce/tickets/src/index';
import { handler as shoppingHandler } from '../../modules/addons/shopping/src/index';
import { handler as carpoolHandler } from '../../modules/addons/carpool/src/index';
import { MemoryTableGateway } from './memory-table';

// =============================================================================
// Types
// =============================================================================

export interface HttpResponse<T = unknown> {
  status: number;
  headers: Record<string, string | number | boolean>;
  data: T;
  /** Raw response body */
  raw: string;
}

export interface RequestOptions {
  headers?: Record<string, string>;
}

export interface ErrorResponse {
  error: string;
  error_description?: string;
  errors?: { field: string; message: string }[];
}

// =============================================================================
// Dispatch
// =============================================================================

const HANDLERS: [prefix: string, handler: ApiHandler][] = [
  ['/api/auth', authHandler],
  ['/api/users', usersHandler],
  ['/api/groups', groupsHandler],
  ['/api/events', eventsHandler],
  ['/api/discussions', discussionsHandler],
  ['/api/media', mediaHandler],
  ['/api/polls', pollsHandler],
  ['/api/tickets', ticketsHandler],
  ['/api/shopping', shoppingHandler],
  ['/api/carpool', carpoolHandler],
];

function handlerFor(path: string): ApiHandler {
  const entry = HANDLERS.find(([prefix]) => path === prefix || path.startsWith(`${prefix}/`));
  if (!entry) {
    throw new Error(`No handler serves ${path}`);
  }
  return entry[1];
}

export function buildEvent(
  method: string,
  url: string,
  body?: string,
  headers: Record<string, string> = {}
): APIGatewayProxyEventV2 {
  const [rawPath, rawQueryString = ''] = url.split('?');
  const query = rawQueryString ? Object.fromEntries(new URLSearchParams(rawQueryString)) : undefined;
  const lowerCased = Object.fromEntries(
    Object.entries(headers).map(([name, value]) => [name.toLowerCase(), value])
  );

  return {
    version: '2.0',
    routeKey: '$default',
    rawPath,
    rawQueryString,
    headers: { 'user-agent': 'vitest', ...lowerCased },
    queryStringParameters: query,
    requestContext: {
      accountId: '123456789012',
      apiId: 'test-api',
      domainName: 'api.example.test',
      domainPrefix: 'api',
      http: {
        method,
        path: rawPath,
        protocol: 'HTTP/1.1',
        sourceIp: '203.0.113.10',
        userAgent: 'vitest',
      },
      requestId: randomUUID(),
      routeKey: '$default',
      stage: '$default',
      time: new Date().toUTCString(),
      timeEpoch: Date.now(),
    },
    body,
    isBase64Encoded: false,
  };
}

async function send<T>(
  method: string,
  url: string,
  body: string | undefined,
  headers: Record<string, string>
): Promise<HttpResponse<T>> {
  const event = buildEvent(method, url, body, headers);
  const result = await handlerFor(event.rawPath)(event);
  const raw = result.body ?? '';

  return {
    status: result.statusCode ?? 200,
    headers: result.headers ?? {},
    data: raw ? JSON.parse(raw) : null,
    raw,
  };
}

function jsonHeaders(options: RequestOptions): Record<string, string> {
  return { 'Content-Type': 'application/json', ...options.headers };
}

export const httpClient = {
  get<T = unknown>(url: string, options: RequestOptions = {}): Promise<HttpResponse<T>> {
    return send<T>('GET', url, undefined, options.headers ?? {});
  },

  delete<T = unknown>(url: string, options: RequestOptions = {}): Promise<HttpResponse<T>> {
    return send<T>('DELETE', url, undefined, options.headers ?? {});
  },

  postJson<T = unknown>(url: string, body: unknown, options: RequestOptions = {}): Promise<HttpResponse<T>> {
    return send<T>('POST', url, JSON.stringify(body), jsonHeaders(options));
  },

  patchJson<T = unknown>(url: string, body: unknown, options: RequestOptions = {}): Promise<HttpResponse<T>> {
    return send<T>('PATCH', url, JSON.stringify(body), jsonHeaders(options));
  },

  postForm<T = unknown>(url: string, form: Record<string, string>, options: RequestOptions = {}): Promise<HttpResponse<T>> {
    return send<T>('POST', url, new URLSearchParams(form).toString(), {
      'Content-Type': 'application/x-www-form-urlencoded',
      ...options.headers,
    });
  },

  /** Send a body as-is, for malformed payloads */
  postRaw<T = unknown>(url: string, body: string, options: RequestOptions = {}): Promise<HttpResponse<T>> {
    return send<T>('POST', url, body, jsonHeaders(options));
  },

  request<T = unknown>(method: string, url: string, options: RequestOptions = {}): Promise<HttpResponse<T>> {
    return send<T>(method, url, undefined, options.headers ?? {});
  },
};

// =============================================================================
// Helpers
// =============================================================================

export function bearer(token: string): RequestOptions {
  return { headers: { Authorization: `Bearer ${token}` } };
}

/** The in-process table installed for the running test */
export function currentTable(): MemoryTableGateway {
  const table = getTableGateway({ tableName: 'social-api-test' });
  if (!(table instanceof MemoryTableGateway)) {
    throw new Error('Tests must run against the in-process table');
  }
  return table;
}
