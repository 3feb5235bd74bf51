/**
 * Social Events API - HTTP Status Codes
 *
 * @see RFC 9110 - HTTP Semantics
 */

export const HttpStatus = {
    /** Request succeeded */
    OK: 200,
    /** Resource created successfully */
    CREATED: 201,
    /** Request succeeded with no content to return */
    NO_CONTENT: 204,
    /** Authentication required or credentials invalid */
    UNAUTHORIZED: 401,
    /** Authenticated but not authorized for this resource */
    FORBIDDEN: 403,
    /** Resource not found */
    NOT_FOUND: 404,
    /** HTTP method not allowed for this endpoint */
    METHOD_NOT_ALLOWED: 405,
    /** Uniqueness or state-transition violation */
    CONFLICT: 409,
    /** Business rule gate (feature disabled, quota exhausted, poll closed) */
    PRECONDITION_FAILED: 412,
    /** Well-formed request with invalid fields */
    UNPROCESSABLE_ENTITY: 422,
    /** Unexpected server error */
    INTERNAL_SERVER_ERROR: 500,
} as const;

/** Type representing valid HTTP status code values */
export type HttpStatusCode = typeof HttpStatus[keyof typeof HttpStatus];
