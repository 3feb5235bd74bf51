/**
 * Social Events API - Lambda Handler Wrapper
 *
 * Each HTTP module exports one handler built from a route table keyed like
 * API Gateway route keys (`"POST /api/groups/{groupId}/members"`). The
 * wrapper owns everything that is the same for every request:
 *
 * - per-request Logger and AuditLogger
 * - CORS preflight and CORS headers
 * - current-user resolution for authenticated routes
 * - converting thrown ApiErrors into JSON error responses
 * - logging and masking anything else as a 500
 *
 * Route functions receive a RequestContext and never see the raw event.
 *
 * @module http/router
 */

import type { APIGatewayProxyEventV2, Context } from 'aws-lambda';
import type { UserItem } from '../../../shared_types/user';
import { AuditLogger, Logger, createLogger, withContext } from '../audit-logger';
import { resolveCurrentUser } from '../auth/current-user';
import { getApiConfig, type ApiConfig } from '../config';
import { getTableGateway } from '../dynamo-client';
import { ErrorMessages, MethodNotAllowedError, NotFoundError, isApiError } from '../errors';
import { corsPreflight, errorResponse, resolveOrigin, serverError, withCors, type ApiResponse } from '../response';
import type { TableGateway } from '../storage/types';

// =============================================================================
// Request Context
// =============================================================================

/** The parts of an HTTP API v2 event route functions work with */
export interface ApiRequest {
    method: string;
    path: string;
    /** Path parameters of the matched route */
    params: Record<string, string>;
    query: Record<string, string>;
    /** Header names are lower-case */
    headers: Record<string, string>;
    /** Decoded body text */
    body?: string;
}

export interface RequestContext {
    request: ApiRequest;
    db: TableGateway;
    config: ApiConfig;
    logger: Logger;
    audit: AuditLogger;
}

export interface AuthenticatedContext extends RequestContext {
    user: UserItem;
}

export type Route =
    | { auth: 'public'; run: (ctx: RequestContext) => Promise<ApiResponse> }
    | { auth: 'user'; run: (ctx: AuthenticatedContext) => Promise<ApiResponse> };

/** Route key (`"METHOD /path/{param}"`) to route */
export type RouteTable = Record<string, Route>;

export type ApiHandler = (event: APIGatewayProxyEventV2, context?: Context) => Promise<ApiResponse>;

export function publicRoute(run: (ctx: RequestContext) => Promise<ApiResponse>): Route {
    return { auth: 'public', run };
}

export function authenticatedRoute(run: (ctx: AuthenticatedContext) => Promise<ApiResponse>): Route {
    return { auth: 'user', run };
}

// =============================================================================
// Route Matching
// =============================================================================

interface CompiledRoute {
    method: string;
    pattern: RegExp;
    paramNames: string[];
    route: Route;
}

interface RouteMatch {
    route: Route;
    params: Record<string, string>;
}

function compile(routes: RouteTable): CompiledRoute[] {
    return Object.entries(routes).map(([routeKey, route]) => {
        const [method, template] = routeKey.split(' ');
        const paramNames: string[] = [];
        const source = template
            .split('/')
            .map((segment) => {
                const param = /^\{(\w+)\}$/.exec(segment);
                if (param) {
                    paramNames.push(param[1]);
                    return '([^/]+)';
                }
                return segment.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
            })
            .join('/');
        return { method, pattern: new RegExp(`^${source}/?$`), paramNames, route };
    });
}

function lowerCaseHeaders(headers: APIGatewayProxyEventV2['headers']): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [name, value] of Object.entries(headers ?? {})) {
        if (value !== undefined) {
            result[name.toLowerCase()] = value;
        }
    }
    return result;
}

function definedValues(values: Record<string, string | undefined> | undefined): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [name, value] of Object.entries(values ?? {})) {
        if (value !== undefined) {
            result[name] = value;
        }
    }
    return result;
}

function decodeBody(event: APIGatewayProxyEventV2): string | undefined {
    if (event.body === undefined) {
        return undefined;
    }
    return event.isBase64Encoded ? Buffer.from(event.body, 'base64').toString('utf-8') : event.body;
}

function toApiRequest(event: APIGatewayProxyEventV2): ApiRequest {
    return {
        method: event.requestContext.http.method.toUpperCase(),
        path: event.rawPath || event.requestContext.http.path,
        params: {},
        query: definedValues(event.queryStringParameters),
        headers: lowerCaseHeaders(event.headers),
        body: decodeBody(event),
    };
}

/**
 * Path parameters of a template match, null when a segment is not a
 * valid percent-encoding.
 */
function decodeParams(names: string[], match: RegExpExecArray): Record<string, string> | null {
    const params: Record<string, string> = {};
    for (const [i, name] of names.entries()) {
        try {
            params[name] = decodeURIComponent(match[i + 1]);
        } catch (err) {
            if (err instanceof URIError) {
                return null;
            }
            throw err;
        }
    }
    return params;
}

/**
 * Resolve the route: the exact route key first (API Gateway already
 * matched it), otherwise method and path against every template.
 *
 * @throws NotFoundError when no template matches the path
 * @throws MethodNotAllowedError when the path matches under other methods only
 */
function matchRoute(
    routes: RouteTable,
    compiled: CompiledRoute[],
    event: APIGatewayProxyEventV2,
    request: ApiRequest
): RouteMatch {
    const direct = routes[event.routeKey];
    if (direct) {
        return { route: direct, params: definedValues(event.pathParameters) };
    }

    const allowed: string[] = [];
    for (const candidate of compiled) {
        const match = candidate.pattern.exec(request.path);
        if (!match) {
            continue;
        }
        const params = decodeParams(candidate.paramNames, match);
        if (!params) {
            continue;
        }
        if (candidate.method !== request.method) {
            allowed.push(candidate.method);
            continue;
        }
        return { route: candidate.route, params };
    }

    if (allowed.length > 0) {
        throw new MethodNotAllowedError(ErrorMessages.METHOD_NOT_ALLOWED);
    }
    throw new NotFoundError(ErrorMessages.ROUTE_NOT_FOUND);
}

// =============================================================================
// Handler Factory
// =============================================================================

function failureResponse(err: unknown, logger: Logger): ApiResponse {
    if (isApiError(err)) {
        logger.warn('Request rejected', { status: err.statusCode, code: err.code, reason: err.message });
        return errorResponse(err);
    }
    const e = err instanceof Error ? err : new Error(String(err));
    logger.error('Unhandled error', { error: e.message, stack: e.stack });
    return serverError();
}

/**
 * Build a Lambda handler for a route table.
 *
 * @param name - module name, used in log lines
 *
 * @example
 * ```typescript
 * export const handler = createHandler('groups', {
 *     'GET /api/groups/{groupId}': authenticatedRoute(getGroupRoute),
 * });
 * ```
 */
export function createHandler(name: string, routes: RouteTable): ApiHandler {
    const compiled = compile(routes);

    return async (event, context) => {
        const logger = createLogger(event, context);
        const audit = withContext(event, context);
        const request = toApiRequest(event);
        let origin: string | undefined;

        try {
            const config = getApiConfig();
            origin = resolveOrigin(config, request.headers.origin);

            if (request.method === 'OPTIONS') {
                return corsPreflight(origin);
            }

            logger.info(`${name} request received`, { method: request.method, path: request.path });

            const { route, params } = matchRoute(routes, compiled, event, request);
            const ctx: RequestContext = {
                request: { ...request, params },
                db: getTableGateway({ tableName: config.tableName, region: config.region }),
                config,
                logger,
                audit,
            };

            let response: ApiResponse;
            if (route.auth === 'user') {
                const user = await resolveCurrentUser(ctx.db, config, request.headers.authorization);
                response = await route.run({ ...ctx, user });
            } else {
                response = await route.run(ctx);
            }
            return withCors(response, origin);
        } catch (err) {
            return withCors(failureResponse(err, logger), origin);
        }
    };
}

// =============================================================================
// Request Helpers
// =============================================================================

/**
 * Path parameter of the matched route.
 *
 * @throws NotFoundError if the route template has no such parameter
 */
export function pathParam(ctx: RequestContext, name: string): string {
    const value = ctx.request.params[name];
    if (value === undefined || value === '') {
        throw new NotFoundError(ErrorMessages.ROUTE_NOT_FOUND);
    }
    return value;
}

export function queryParam(ctx: RequestContext, name: string): string | undefined {
    const value = ctx.request.query[name];
    return value === undefined || value === '' ? undefined : value;
}
