/**
 * Social Events API - Audit Logger
 *
 * Structured JSON logging to CloudWatch.
 * Implements the AuditLogger interface from shared_types/audit.d.ts.
 *
 * Design Principles:
 * - All audit events are JSON-formatted for CloudWatch Logs Insights queries
 * - Every business mutation and every login attempt produces an audit entry
 * - Request context (requestId, IP) is captured for traceability
 * - Passwords, hashes and tokens never appear in details
 */

import type { APIGatewayProxyEventV2, Context } from 'aws-lambda';
import type {
    AuditAction,
    AuditActor,
    AuditLogEntry,
    AuditLogger as IAuditLogger,
    LoginDetails,
    PurchaseRejectedDetails,
    StrictAuditLogEntry,
} from '../../shared_types/audit';

// =============================================================================
// Request Context Interface
// =============================================================================

export interface AuditContext {
    /** AWS Request ID for tracing */
    requestId: string;
    /** Source IP address */
    ip: string;
    /** User agent string */
    userAgent?: string;
}

// =============================================================================
// Audit Logger Implementation
// =============================================================================

/**
 * AuditLogger writes one JSON line per audit event.
 * All output goes to console (which Lambda routes to CloudWatch).
 */
export class AuditLogger implements IAuditLogger {
    private readonly context: AuditContext;

    constructor(context: AuditContext) {
        this.context = context;
    }

    log(entry: Omit<AuditLogEntry, 'level' | 'timestamp'>): void {
        const logEntry: AuditLogEntry = {
            level: 'AUDIT',
            timestamp: new Date().toISOString(),
            requestId: entry.requestId || this.context.requestId,
            action: entry.action,
            ip: entry.ip || this.context.ip,
            actor: entry.actor,
            details: entry.details,
        };

        console.log(JSON.stringify(logEntry));
    }

    logStrict(entry: Omit<StrictAuditLogEntry, 'level' | 'timestamp'>): void {
        const logEntry = {
            level: 'AUDIT' as const,
            timestamp: new Date().toISOString(),
            requestId: entry.requestId || this.context.requestId,
            action: entry.action,
            ip: entry.ip || this.context.ip,
            actor: entry.actor,
            details: entry.details,
        };

        console.log(JSON.stringify(logEntry));
    }

    // ---------------------------------------------------------------------------
    // Convenience Methods
    // ---------------------------------------------------------------------------

    loginSuccess(userId: string, details: LoginDetails): void {
        this.logStrict({
            requestId: this.context.requestId,
            action: 'LOGIN_SUCCESS',
            ip: this.context.ip,
            actor: { type: 'USER', sub: userId },
            details,
        });
    }

    /**
     * Log a failed login attempt. The reason is recorded here only; the
     * client always sees the same message.
     */
    loginFailure(details: LoginDetails & { reason: string }): void {
        this.logStrict({
            requestId: this.context.requestId,
            action: 'LOGIN_FAILURE',
            ip: this.context.ip,
            actor: { type: 'ANONYMOUS' },
            details,
        });
    }

    purchaseRejected(userId: string, details: PurchaseRejectedDetails): void {
        this.logStrict({
            requestId: this.context.requestId,
            action: 'TICKET_PURCHASE_REJECTED',
            ip: this.context.ip,
            actor: { type: 'USER', sub: userId },
            details,
        });
    }

    /**
     * Log a generic audit event.
     * Use this for actions that don't have a dedicated convenience method.
     */
    audit(action: AuditAction, actor: AuditActor, details: Record<string, unknown>): void {
        this.log({
            requestId: this.context.requestId,
            action,
            ip: this.context.ip,
            actor,
            details,
        });
    }

    /** Shorthand for an action performed by a signed-in user */
    byUser(action: AuditAction, userId: string, details: Record<string, unknown>): void {
        this.audit(action, { type: 'USER', sub: userId }, details);
    }
}

// =============================================================================
// Helper Functions
// =============================================================================

function requestIdOf(event: APIGatewayProxyEventV2, lambdaContext?: Context): string {
    return (
        lambdaContext?.awsRequestId ||
        event.requestContext?.requestId ||
        event.headers?.['x-request-id'] ||
        'unknown'
    );
}

/**
 * Extract audit context from an API Gateway HTTP API v2 request.
 *
 * @example
 * ```typescript
 * export const handler = async (event: APIGatewayProxyEventV2, context: Context) => {
 *   const audit = withContext(event, context);
 *   audit.byUser('GROUP_CREATED', userId, { groupId });
 * };
 * ```
 */
export function withContext(event: APIGatewayProxyEventV2, lambdaContext?: Context): AuditLogger {
    // HTTP API v2 headers are lowercase
    const forwardedFor = event.headers?.['x-forwarded-for'];
    const firstHop = forwardedFor?.split(',')[0]?.trim();
    const ip = firstHop || event.requestContext?.http?.sourceIp || 'unknown';

    return new AuditLogger({
        requestId: requestIdOf(event, lambdaContext),
        ip,
        userAgent: event.headers?.['user-agent'],
    });
}

// =============================================================================
// General Logger (Non-Audit Structured Logging)
// =============================================================================

/** Log levels for structured logging */
export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

interface LogEntry {
    level: LogLevel;
    timestamp: string;
    requestId: string;
    message: string;
    data?: Record<string, unknown>;
}

/**
 * General-purpose structured logger for non-audit events.
 */
export class Logger {
    private readonly requestId: string;

    constructor(requestId: string) {
        this.requestId = requestId;
    }

    private write(level: LogLevel, message: string, data?: Record<string, unknown>): void {
        const entry: LogEntry = {
            level,
            timestamp: new Date().toISOString(),
            requestId: this.requestId,
            message,
            ...(data && { data }),
        };

        console.log(JSON.stringify(entry));
    }

    debug(message: string, data?: Record<string, unknown>): void {
        this.write('DEBUG', message, data);
    }

    info(message: string, data?: Record<string, unknown>): void {
        this.write('INFO', message, data);
    }

    warn(message: string, data?: Record<string, unknown>): void {
        this.write('WARN', message, data);
    }

    error(message: string, data?: Record<string, unknown>): void {
        this.write('ERROR', message, data);
    }
}

/**
 * Create a Logger from API Gateway HTTP API v2 event context.
 */
export function createLogger(event: APIGatewayProxyEventV2, lambdaContext?: Context): Logger {
    return new Logger(requestIdOf(event, lambdaContext));
}
