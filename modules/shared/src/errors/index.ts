/**
 * Social Events API - Errors Module
 *
 * @module errors
 */

export {
    ApiError,
    UnauthorizedError,
    ForbiddenError,
    NotFoundError,
    MethodNotAllowedError,
    ConflictError,
    PreconditionFailedError,
    ValidationError,
    isApiError,
} from './api-errors';

export type { FieldError } from './api-errors';

export { HttpStatus } from './http-status';

export type { HttpStatusCode } from './http-status';

export { ErrorCodes } from './error-codes';

export type { ErrorCode } from './error-codes';

export { ErrorMessages } from './error-messages';
