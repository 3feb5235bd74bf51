/**
 * Social Events API - Shared Utilities
 *
 * Central export for all shared modules used across Lambda functions.
 *
 * Architecture:
 * - This package is a shared dependency for every HTTP module
 * - No hardcoded configuration - all values come from environment variables
 * - The TableGateway port is the only seam to DynamoDB
 *
 * Modules:
 * - Storage: DynamoDB Single Table Design operations per entity
 * - HTTP: handler wrapper, route table and request context
 * - Auth: password hashing, access tokens, current-user resolution
 * - Access: capability checks for groups, events and owned resources
 * - Audit Logger: structured JSON logging to CloudWatch
 * - Response Helpers: JSON, error and CORS response formatting
 * - Validation: zod request parsing and field schemas
 * - Errors: typed API errors and their codes
 * - Type Guards: runtime type discrimination for DynamoDB entities
 */

// =============================================================================
// Storage
// =============================================================================

export {
    DynamoTableGateway,
    getTableGateway,
    setTableGateway,
    toTransactItem,
    chunk,
} from './dynamo-client';

export type { DocumentSender } from './dynamo-client';

export * as storage from './storage';

export { ConditionFailedError } from './storage/types';

export type {
    ItemKey,
    StoredItem,
    IndexName,
    WriteCondition,
    WriteOperation,
    TableGateway,
    TableGatewayConfig,
} from './storage/types';

// =============================================================================
// HTTP
// =============================================================================

export {
    createHandler,
    publicRoute,
    authenticatedRoute,
    pathParam,
    queryParam,
} from './http';

export type {
    ApiRequest,
    RequestContext,
    AuthenticatedContext,
    Route,
    RouteTable,
    ApiHandler,
} from './http';

// =============================================================================
// Audit Logger
// =============================================================================

export {
    AuditLogger,
    Logger,
    withContext,
    createLogger,
} from './audit-logger';

export type { AuditContext, LogLevel } from './audit-logger';

// =============================================================================
// HTTP Response Helpers
// =============================================================================

export {
    success,
    created,
    noContent,
    error,
    errorResponse,
    serverError,
    resolveOrigin,
    withCors,
    corsPreflight,
} from './response';

export type { ApiResponse, ErrorBody } from './response';

// =============================================================================
// Errors
// =============================================================================

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
    HttpStatus,
    ErrorCodes,
    ErrorMessages,
} from './errors';

export type { FieldError, HttpStatusCode, ErrorCode } from './errors';

// =============================================================================
// Configuration
// =============================================================================

export {
    getApiConfig,
    clearConfigCache,
    requireEnv,
    optionalEnv,
    optionalNumericEnv,
} from './config';

export type { ApiConfig, PasswordHashingConfig } from './config';

// =============================================================================
// Constants
// =============================================================================

export {
    KeyPrefixes,
    GroupRoles,
    GroupTypes,
    ParticipantStatuses,
    FieldLimits,
    MAX_TRANSACTION_ITEMS,
    JwtAlgorithm,
    TokenType,
} from './constants';

// =============================================================================
// Type Guards
// =============================================================================

export {
    isUserItem,
    isGroupItem,
    isMembershipItem,
    isEventItem,
    isOrganizerItem,
    isParticipantItem,
    isThreadItem,
    isMessageItem,
    isAlbumItem,
    isPhotoItem,
    isCommentItem,
    isPollItem,
    isQuestionItem,
    isOptionItem,
    isVoteItem,
    isTicketTypeItem,
    isTicketItem,
    isShoppingItem,
    isCarpoolOfferItem,
} from './type-guards';

// =============================================================================
// Authentication
// =============================================================================

export {
    hashPassword,
    verifyPassword,
    burnVerification,
    issueAccessToken,
    verifyAccessToken,
    extractBearerToken,
    resolveCurrentUser,
    toUserResponse,
} from './auth';

export type { IssuedToken, UserResponse } from './auth';

// =============================================================================
// Access Control
// =============================================================================

export { can, assertCan, groupFacts, loadFacts, isAllowed } from './access';

export { openEvent, ownedBy } from './access';

export type { Action, AccessFacts, AccessTarget, GroupFacts, EventFacts, EventAccess } from './access';

// =============================================================================
// Validation
// =============================================================================

export {
    isValidEmail,
    normalizeEmail,
    emailSchema,
    validate,
    readJson,
    readForm,
    parseBody,
    nameSchema,
    descriptionSchema,
    urlSchema,
    dateTimeSchema,
    idSchema,
    nonEmptyPatch,
} from './validation';

export type { BodySource } from './validation';
