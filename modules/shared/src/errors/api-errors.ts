/**
 * Social Events API - Error Taxonomy
 *
 * Route functions throw these; the handler wrapper turns them into JSON
 * error responses. Anything else that escapes a route is reported as a
 * generic 500.
 *
 * @module errors/api-errors
 */

import { ErrorCodes, type ErrorCode } from './error-codes';
import { HttpStatus, type HttpStatusCode } from './http-status';

/** One entry of a 422 response's `errors` list */
export interface FieldError {
    /** Dotted path of the offending field, e.g. `questions.0.options` */
    field: string;
    message: string;
}

export abstract class ApiError extends Error {
    abstract readonly statusCode: HttpStatusCode;
    abstract readonly code: ErrorCode;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** Missing, malformed or expired credentials */
export class UnauthorizedError extends ApiError {
    readonly statusCode = HttpStatus.UNAUTHORIZED;
    readonly code = ErrorCodes.UNAUTHORIZED;
}

/** Authenticated but lacking the role or ownership */
export class ForbiddenError extends ApiError {
    readonly statusCode = HttpStatus.FORBIDDEN;
    readonly code = ErrorCodes.FORBIDDEN;
}

export class NotFoundError extends ApiError {
    readonly statusCode = HttpStatus.NOT_FOUND;
    readonly code = ErrorCodes.NOT_FOUND;

    /**
     * @param resource - Display name used in the message, e.g. 'Event'
     */
    static of(resource: string): NotFoundError {
        return new NotFoundError(`${resource} not found`);
    }
}

export class MethodNotAllowedError extends ApiError {
    readonly statusCode = HttpStatus.METHOD_NOT_ALLOWED;
    readonly code = ErrorCodes.METHOD_NOT_ALLOWED;
}

/** Uniqueness or state-transition violation */
export class ConflictError extends ApiError {
    readonly statusCode = HttpStatus.CONFLICT;
    readonly code = ErrorCodes.CONFLICT;
}

/** Business rule gate: feature disabled, quota exhausted, poll closed */
export class PreconditionFailedError extends ApiError {
    readonly statusCode = HttpStatus.PRECONDITION_FAILED;
    readonly code = ErrorCodes.PRECONDITION_FAILED;
}

export class ValidationError extends ApiError {
    readonly statusCode = HttpStatus.UNPROCESSABLE_ENTITY;
    readonly code = ErrorCodes.VALIDATION_FAILED;
    readonly errors: FieldError[];

    constructor(message: string, errors: FieldError[] = []) {
        super(message);
        this.errors = errors;
    }

    /** Shorthand for a single offending field */
    static field(field: string, message: string): ValidationError {
        return new ValidationError(message, [{ field, message }]);
    }
}

export function isApiError(err: unknown): err is ApiError {
    return err instanceof ApiError;
}
