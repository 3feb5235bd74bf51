/**
 * Social Events API - Error Codes
 *
 * Machine-readable values of the `error` field in error responses.
 */

export const ErrorCodes = {
    UNAUTHORIZED: 'unauthorized',
    FORBIDDEN: 'forbidden',
    NOT_FOUND: 'not_found',
    METHOD_NOT_ALLOWED: 'method_not_allowed',
    CONFLICT: 'conflict',
    PRECONDITION_FAILED: 'precondition_failed',
    VALIDATION_FAILED: 'validation_failed',
    SERVER_ERROR: 'server_error',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];
