/**
 * Social Events API - Error Messages
 *
 * Human-readable descriptions used in error_description fields.
 */

export const ErrorMessages = {
    // -------------------------------------------------------------------------
    // Authentication
    // -------------------------------------------------------------------------

    MISSING_TOKEN: 'Bearer token required',
    INVALID_TOKEN: 'The access token is invalid or expired',
    INVALID_CREDENTIALS: 'Incorrect email or password',
    ACCOUNT_INACTIVE: 'User account is inactive',
    EMAIL_TAKEN: 'A user with this email already exists',

    // -------------------------------------------------------------------------
    // Request Shape
    // -------------------------------------------------------------------------

    BODY_REQUIRED: 'Request body is required',
    INVALID_JSON: 'Request body is not valid JSON',
    VALIDATION_FAILED: 'Request validation failed',

    // -------------------------------------------------------------------------
    // Routing
    // -------------------------------------------------------------------------

    ROUTE_NOT_FOUND: 'No route matches this request',
    METHOD_NOT_ALLOWED: 'Method not allowed on this resource',

    // -------------------------------------------------------------------------
    // Server
    // -------------------------------------------------------------------------

    SERVER_ERROR: 'An unexpected error occurred',
} as const;
