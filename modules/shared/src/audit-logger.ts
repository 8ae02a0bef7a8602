/**
 * SAML SSO - Audit Logger
 *
 * Structured JSON logging to CloudWatch for the SSO Lambdas.
 * Implements the AuditLogger interface from shared_types/audit.d.ts.
 *
 * - Every login attempt produces an audit entry (success or failure)
 * - Request context (requestId, IP) is captured for traceability
 * - Certificates, private keys and raw SAML documents are never logged
 *
 * @see SOC2 CC6.1 - Logical and Physical Access Controls
 * @see SOC2 CC7.2 - System Operations Monitoring
 */

import type { APIGatewayProxyEventV2, Context } from 'aws-lambda';
import type {
    AuditActor,
    AuditLogger as IAuditLogger,
    LoginDetails,
    SAMLAssertionDetails,
    SAMLLoginInitiatedDetails,
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
}

// =============================================================================
// Audit Logger Implementation
// =============================================================================

/**
 * AuditLogger writes one JSON line per security event.
 * All output goes to console (which Lambda routes to CloudWatch).
 */
export class AuditLogger implements IAuditLogger {
    private readonly context: AuditContext;

    constructor(context: AuditContext) {
        this.context = context;
    }

    /**
     * Log a strictly-typed audit event.
     */
    logStrict(
        entry: Omit<StrictAuditLogEntry, 'level' | 'timestamp'>
    ): void {
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

    /**
     * Log an SP-initiated login (AuthnRequest sent to the IdP).
     */
    samlLoginInitiated(details: SAMLLoginInitiatedDetails): void {
        this.logStrict({
            requestId: this.context.requestId,
            action: 'SAML_LOGIN_INITIATED',
            ip: this.context.ip,
            actor: { type: 'ANONYMOUS' },
            details,
        });
    }

    /**
     * Log a SAML assertion received event.
     */
    samlAssertionReceived(
        actor: AuditActor,
        details: SAMLAssertionDetails
    ): void {
        this.logStrict({
            requestId: this.context.requestId,
            action: 'SAML_ASSERTION_RECEIVED',
            ip: this.context.ip,
            actor,
            details,
        });
    }

    /**
     * Log a successful login event.
     */
    loginSuccess(actor: AuditActor, details: LoginDetails): void {
        this.logStrict({
            requestId: this.context.requestId,
            action: 'LOGIN_SUCCESS',
            ip: this.context.ip,
            actor,
            details,
        });
    }

    /**
     * Log a failed login attempt.
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
}

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Extract the client IP from an API Gateway HTTP API v2 request.
 * The first X-Forwarded-For hop wins over the gateway's source IP.
 */
export function extractClientIp(event: APIGatewayProxyEventV2): string {
    const forwardedFor = event.headers?.['x-forwarded-for'];
    return forwardedFor
        ? forwardedFor.split(',')[0].trim()
        : event.requestContext?.http?.sourceIp || 'unknown';
}

/**
 * Extract audit context from an API Gateway HTTP API v2 request.
 *
 * @example
 * ```typescript
 * export const handler = async (event: APIGatewayProxyEventV2, context: Context) => {
 *   const audit = withContext(event, context);
 *   audit.loginFailure({ method: 'saml', reason: 'SignatureInvalid' });
 * };
 * ```
 */
export function withContext(
    event: APIGatewayProxyEventV2,
    lambdaContext?: Context
): AuditLogger {
    const requestId =
        lambdaContext?.awsRequestId ||
        event.requestContext?.requestId ||
        event.headers?.['x-request-id'] ||
        'unknown';

    return new AuditLogger({
        requestId,
        ip: extractClientIp(event),
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

export interface LoggerOptions {
    /** Emit DEBUG entries (SAML_DEBUG) */
    debug?: boolean;
}

/**
 * General-purpose structured logger for non-audit events.
 * DEBUG entries are dropped unless the logger was created with `debug: true`.
 */
export class Logger {
    private readonly requestId: string;
    private readonly debugEnabled: boolean;

    constructor(requestId: string, options: LoggerOptions = {}) {
        this.requestId = requestId;
        this.debugEnabled = options.debug ?? false;
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
        if (!this.debugEnabled) {
            return;
        }
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
export function createLogger(
    event: APIGatewayProxyEventV2,
    lambdaContext?: Context,
    options?: LoggerOptions
): Logger {
    const requestId =
        lambdaContext?.awsRequestId ||
        event.requestContext?.requestId ||
        'unknown';

    return new Logger(requestId, options);
}

/**
 * Create a Logger for code that runs outside a request (cold start, settings load).
 */
export function createSystemLogger(processName: string, options?: LoggerOptions): Logger {
    return new Logger(`system-${processName}`, options);
}
