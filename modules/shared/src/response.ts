/**
 * Social Events API - Standardized HTTP Response Helpers
 *
 * Provides consistent response formatting for all Lambda functions.
 *
 * Key Requirements:
 * - API responses carry Cache-Control: no-store, they hold per-user data
 * - Error responses use application/json with `{ error, error_description }`
 * - 401 responses carry a Bearer challenge
 *
 * Security Headers:
 * - Strict-Transport-Security: Enforces HTTPS connections (HSTS)
 * - X-Content-Type-Options: nosniff - Prevents MIME type sniffing
 * - X-Frame-Options: DENY - Prevents clickjacking
 * - Content-Security-Policy: Restricts resource loading
 *
 * Note: HTTP API Gateway v2 does not support response header manipulation
 * at the gateway level. Security headers are added at the Lambda response
 * level for consistent enforcement across all endpoints.
 *
 * @see RFC 6750 Section 3 - The WWW-Authenticate Response Header Field
 * @see RFC 6797 - HTTP Strict Transport Security (HSTS)
 */

import type { APIGatewayProxyStructuredResultV2 } from 'aws-lambda';
import type { ApiConfig } from './config';
import { ErrorCodes, ErrorMessages, HttpStatus, ValidationError, type ApiError, type FieldError } from './errors';

export type ApiResponse = APIGatewayProxyStructuredResultV2;

// =============================================================================
// Response Headers
// =============================================================================

/**
 * Security headers applied to all responses.
 *
 * - Strict-Transport-Security: 2 years with includeSubDomains and preload
 * - X-Content-Type-Options: nosniff
 * - X-Frame-Options: DENY
 * - Referrer-Policy: strict-origin-when-cross-origin
 */
const SECURITY_HEADERS = {
    'Strict-Transport-Security': 'max-age=63072000; includeSubDomains; preload',
    'X-Content-Type-Options': 'nosniff',
    'X-Frame-Options': 'DENY',
    'Referrer-Policy': 'strict-origin-when-cross-origin',
} as const;

/**
 * Standard headers for JSON API responses.
 */
const JSON_HEADERS = {
    'Content-Type': 'application/json',
    'Cache-Control': 'no-store',
    'Pragma': 'no-cache',
    'Content-Security-Policy': "default-src 'none'; frame-ancestors 'none'",
    ...SECURITY_HEADERS,
} as const;

const CORS_METHODS = 'GET, POST, PATCH, DELETE, OPTIONS';
const CORS_HEADERS = 'Content-Type, Authorization';

// =============================================================================
// Success Responses
// =============================================================================

/**
 * Return a successful JSON response.
 *
 * @param body - Response body (will be JSON stringified)
 * @param statusCode - HTTP status code (default: 200)
 *
 * @example
 * ```typescript
 * return success(toGroupResponse(group));
 * ```
 */
export function success<T>(body: T, statusCode: number = HttpStatus.OK): ApiResponse {
    return {
        statusCode,
        headers: { ...JSON_HEADERS },
        body: JSON.stringify(body),
    };
}

/**
 * Return a 201 Created response.
 */
export function created<T>(body: T): ApiResponse {
    return success(body, HttpStatus.CREATED);
}

/**
 * Return a 204 No Content response.
 */
export function noContent(): ApiResponse {
    return {
        statusCode: HttpStatus.NO_CONTENT,
        headers: {
            'Cache-Control': 'no-store',
            ...SECURITY_HEADERS,
        },
        body: '',
    };
}

// =============================================================================
// Error Responses
// =============================================================================

/**
 * Error response body format.
 */
export interface ErrorBody {
    error: string;
    error_description?: string;
    /** Present on validation failures */
    errors?: FieldError[];
}

/**
 * Return an error response.
 *
 * @example
 * ```typescript
 * return error(404, 'not_found', 'Event not found');
 * ```
 */
export function error(
    statusCode: number,
    errorCode: string,
    description?: string,
    fieldErrors?: FieldError[]
): ApiResponse {
    const body: ErrorBody = {
        error: errorCode,
    };

    if (description) {
        body.error_description = description;
    }
    if (fieldErrors && fieldErrors.length > 0) {
        body.errors = fieldErrors;
    }

    return {
        statusCode,
        headers: { ...JSON_HEADERS },
        body: JSON.stringify(body),
    };
}

/**
 * Convert a thrown ApiError into its response.
 */
export function errorResponse(err: ApiError): ApiResponse {
    const response = error(
        err.statusCode,
        err.code,
        err.message,
        err instanceof ValidationError ? err.errors : undefined
    );

    if (err.statusCode === HttpStatus.UNAUTHORIZED) {
        response.headers = {
            ...response.headers,
            'WWW-Authenticate': 'Bearer',
        };
    }
    return response;
}

/**
 * 500 Internal Server Error. Never carries detail of the failure.
 */
export function serverError(): ApiResponse {
    return error(HttpStatus.INTERNAL_SERVER_ERROR, ErrorCodes.SERVER_ERROR, ErrorMessages.SERVER_ERROR);
}

// =============================================================================
// CORS Support
// =============================================================================

/**
 * Pick the Access-Control-Allow-Origin value for a request: `*` when any
 * origin is allowed, the request origin when it is on the allow-list, and
 * nothing otherwise.
 */
export function resolveOrigin(config: Pick<ApiConfig, 'allowedOrigins'>, requestOrigin?: string): string | undefined {
    if (config.allowedOrigins.includes('*')) {
        return '*';
    }
    if (requestOrigin && config.allowedOrigins.includes(requestOrigin)) {
        return requestOrigin;
    }
    return undefined;
}

/**
 * Add CORS headers to a response.
 * Preserves existing security headers while adding CORS headers.
 */
export function withCors(response: ApiResponse, origin?: string): ApiResponse {
    if (!origin) {
        return response;
    }
    return {
        ...response,
        headers: {
            ...SECURITY_HEADERS,
            ...response.headers,
            'Access-Control-Allow-Origin': origin,
            'Access-Control-Allow-Methods': CORS_METHODS,
            'Access-Control-Allow-Headers': CORS_HEADERS,
            ...(origin !== '*' && { Vary: 'Origin' }),
        },
    };
}

/**
 * Return a CORS preflight response.
 *
 * The Access-Control-Max-Age header caches the preflight response
 * for 24 hours (86400 seconds) to reduce preflight requests.
 */
export function corsPreflight(origin?: string): ApiResponse {
    return withCors(
        {
            statusCode: HttpStatus.NO_CONTENT,
            headers: {
                ...SECURITY_HEADERS,
                'Access-Control-Max-Age': '86400',
            },
            body: '',
        },
        origin
    );
}
