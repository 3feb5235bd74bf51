/**
 * Social Events API - Constants
 *
 * Centralized constants shared by every Lambda module.
 * Runtime configuration (secrets, TTLs, origins) comes from environment
 * variables, see config.ts.
 */

// =============================================================================
// DynamoDB Key Prefixes
// =============================================================================

/**
 * Partition key prefixes for the Single Table Design.
 * Format: PREFIX#<identifier>
 */
export const KeyPrefixes = {
    USER: 'USER#',
    EMAIL: 'EMAIL#',
    GROUP: 'GROUP#',
    MEMBER: 'MEMBER#',
    EVENT: 'EVENT#',
    ORGANIZER: 'ORGANIZER#',
    PARTICIPANT: 'PARTICIPANT#',
    THREAD: 'THREAD#',
    MESSAGE: 'MESSAGE#',
    ALBUM: 'ALBUM#',
    PHOTO: 'PHOTO#',
    COMMENT: 'COMMENT#',
    POLL: 'POLL#',
    QUESTION: 'QUESTION#',
    OPTION: 'OPTION#',
    OPTION_LABEL: 'OPTION_LABEL#',
    VOTE: 'VOTE#',
    TICKET_TYPE: 'TICKET_TYPE#',
    TICKET: 'TICKET#',
    SHOPPING_ITEM: 'SHOPPING_ITEM#',
    SHOPPING_NAME: 'SHOPPING_NAME#',
    CARPOOL_OFFER: 'CARPOOL_OFFER#',
} as const;

/** Sort key of an entity's own row */
export const MetadataSortKeys = {
    PROFILE: 'PROFILE',
    METADATA: 'METADATA',
    EMAIL_USER: 'USER',
} as const;

/** GSI2 partition keys for catalog listings */
export const CatalogKeys = {
    GROUP: 'GROUP',
    EVENT: 'EVENT',
} as const;

// =============================================================================
// Roles and Statuses
// =============================================================================

export const GroupRoles = {
    MEMBER: 'member',
    EVENT_CREATOR: 'event-creator',
    ADMIN: 'admin',
} as const;

export const GroupTypes = {
    PUBLIC: 'public',
    PRIVATE: 'private',
    SECRET: 'secret',
} as const;

export const ParticipantStatuses = {
    GOING: 'going',
    INTERESTED: 'interested',
    DECLINED: 'declined',
} as const;

// =============================================================================
// Limits
// =============================================================================

/**
 * DynamoDB TransactWriteItems accepts at most 100 actions.
 */
export const MAX_TRANSACTION_ITEMS = 100;

export const FieldLimits = {
    PASSWORD_MIN: 8,
    PASSWORD_MAX: 128,
    NAME_MAX: 255,
    DESCRIPTION_MAX: 2000,
    MESSAGE_MAX: 2000,
    COMMENT_MAX: 1000,
    URL_MAX: 2048,
} as const;

// =============================================================================
// Token Settings
// =============================================================================

/** Signing algorithm for access tokens */
export const JwtAlgorithm = 'HS256';

export const TokenLifetimeBounds = {
    MIN_MINUTES: 15,
    MAX_MINUTES: 1440,
    DEFAULT_MINUTES: 60,
} as const;

export const TokenType = 'bearer';
