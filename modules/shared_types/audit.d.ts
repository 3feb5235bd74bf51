/**
 * Social Events API - Audit Schema
 *
 * Structured audit logging interfaces. All audit events are JSON lines
 * written to CloudWatch and can be queried with Logs Insights.
 *
 * This file defines the contract for the AuditLogger utility class.
 */

// =============================================================================
// Audit Actions
// =============================================================================

export type AuditAction =
    // Identity
    | 'USER_REGISTERED'
    | 'LOGIN_SUCCESS'
    | 'LOGIN_FAILURE'
    | 'USER_UPDATED'
    // Groups
    | 'GROUP_CREATED'
    | 'GROUP_UPDATED'
    | 'GROUP_DELETED'
    | 'MEMBER_ADDED'
    | 'MEMBER_UPDATED'
    | 'MEMBER_REMOVED'
    // Events
    | 'EVENT_CREATED'
    | 'EVENT_UPDATED'
    | 'EVENT_DELETED'
    | 'ORGANIZER_ADDED'
    | 'ORGANIZER_REMOVED'
    | 'PARTICIPANT_ADDED'
    | 'PARTICIPANT_UPDATED'
    | 'PARTICIPANT_REMOVED'
    // Discussions
    | 'THREAD_CREATED'
    | 'THREAD_DELETED'
    | 'MESSAGE_POSTED'
    // Media
    | 'ALBUM_CREATED'
    | 'ALBUM_DELETED'
    | 'PHOTO_ADDED'
    | 'PHOTO_DELETED'
    | 'COMMENT_ADDED'
    | 'COMMENT_DELETED'
    // Polls
    | 'POLL_CREATED'
    | 'POLL_UPDATED'
    | 'POLL_DELETED'
    | 'VOTE_CAST'
    // Ticketing
    | 'TICKET_TYPE_CREATED'
    | 'TICKET_TYPE_UPDATED'
    | 'TICKET_TYPE_DELETED'
    | 'TICKET_PURCHASED'
    | 'TICKET_PURCHASE_REJECTED'
    // Add-ons
    | 'SHOPPING_ITEM_CREATED'
    | 'SHOPPING_ITEM_UPDATED'
    | 'SHOPPING_ITEM_DELETED'
    | 'CARPOOL_OFFER_CREATED'
    | 'CARPOOL_OFFER_UPDATED'
    | 'CARPOOL_OFFER_DELETED';

// =============================================================================
// Actor Types
// =============================================================================

export type AuditActor =
    | { type: 'USER'; sub: string }
    | { type: 'SYSTEM'; process?: string }
    | { type: 'ANONYMOUS' };

// =============================================================================
// Audit Log Entry
// =============================================================================

/**
 * Structured audit log entry.
 *
 * @example
 * ```typescript
 * const entry: AuditLogEntry = {
 *   level: 'AUDIT',
 *   timestamp: '2024-01-15T10:30:00.000Z',
 *   requestId: 'abc123-def456-ghi789',
 *   action: 'TICKET_PURCHASED',
 *   ip: '192.168.1.1',
 *   actor: { type: 'USER', sub: 'user-uuid-here' },
 *   details: { ticketTypeId: 'type-uuid-here', ticketId: 'ticket-uuid-here' }
 * };
 * ```
 */
export interface AuditLogEntry {
    /** Always 'AUDIT', separates audit entries from application logs */
    level: 'AUDIT';
    /** ISO 8601 UTC timestamp */
    timestamp: string;
    /** Filled from the logger context when omitted */
    requestId?: string;
    action: AuditAction;
    /** Filled from the logger context when omitted */
    ip?: string;
    actor: AuditActor;
    details: Record<string, unknown>;
}

// =============================================================================
// Action-Specific Detail Types
// =============================================================================

/** Details for LOGIN_SUCCESS and LOGIN_FAILURE actions */
export interface LoginDetails {
    /** 'json' for /api/auth/login, 'form' for the token endpoint */
    method: 'json' | 'form';
    email?: string;
    /** Failure reason (for LOGIN_FAILURE only) */
    reason?: string;
}

/** Details for TICKET_PURCHASE_REJECTED action */
export interface PurchaseRejectedDetails {
    ticketTypeId: string;
    reason: 'duplicate_email' | 'quota_exhausted' | 'ticketing_disabled';
}

export interface LoginSuccessEntry extends Omit<AuditLogEntry, 'action' | 'details'> {
    action: 'LOGIN_SUCCESS';
    details: LoginDetails;
}

export interface LoginFailureEntry extends Omit<AuditLogEntry, 'action' | 'details'> {
    action: 'LOGIN_FAILURE';
    details: LoginDetails;
}

export interface PurchaseRejectedEntry extends Omit<AuditLogEntry, 'action' | 'details'> {
    action: 'TICKET_PURCHASE_REJECTED';
    details: PurchaseRejectedDetails;
}

/** Union of all strictly-typed audit entries */
export type StrictAuditLogEntry =
    | LoginSuccessEntry
    | LoginFailureEntry
    | PurchaseRejectedEntry;

// =============================================================================
// Audit Logger Interface
// =============================================================================

export interface AuditLogger {
    /**
     * Log an audit event with flexible details.
     * requestId and ip are filled from context if not provided.
     */
    log(entry: Omit<AuditLogEntry, 'level' | 'timestamp'>): void;

    /**
     * Log a strictly-typed audit event.
     */
    logStrict(entry: Omit<StrictAuditLogEntry, 'level' | 'timestamp'>): void;
}
