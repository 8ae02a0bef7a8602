/**
 * SAML SSO - Audit Schema
 *
 * Structured audit logging interfaces. All audit events are
 * JSON-formatted so CloudWatch Logs Insights can query them.
 *
 * Every entry carries timestamp, actor, action and source IP.
 */

// =============================================================================
// Audit Actions
// =============================================================================

/**
 * Security-relevant actions recorded by the SSO handlers.
 */
export type AuditAction =
    | 'LOGIN_SUCCESS'
    | 'LOGIN_FAILURE'
    | 'SAML_LOGIN_INITIATED'
    | 'SAML_ASSERTION_RECEIVED';

// =============================================================================
// Actor Types
// =============================================================================

/**
 * The entity performing the audited action.
 */
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
 *   action: 'LOGIN_SUCCESS',
 *   ip: '192.0.2.10',
 *   actor: { type: 'USER', sub: 'alice@example.com' },
 *   details: { method: 'saml' }
 * };
 * ```
 */
export interface AuditLogEntry {
    /** Always 'AUDIT', so audit entries can be filtered from other levels */
    level: 'AUDIT';

    /** ISO 8601 UTC timestamp */
    timestamp: string;

    /** Request ID for tracing; filled from context when omitted */
    requestId?: string;

    action: AuditAction;

    /** Source IP; filled from context when omitted */
    ip?: string;

    actor: AuditActor;

    /** Action-specific metadata */
    details: Record<string, unknown>;
}

// =============================================================================
// Action-Specific Detail Types
// =============================================================================

/** Details for LOGIN_SUCCESS and LOGIN_FAILURE actions */
export interface LoginDetails {
    method: 'saml';
    email?: string;
    /** Failure kind (LOGIN_FAILURE only) */
    reason?: string;
    /** IdP that asserted (or failed to assert) the identity */
    idpEntityId?: string;
}

/** Details for SAML_LOGIN_INITIATED action */
export interface SAMLLoginInitiatedDetails {
    idpEntityId: string;
    requestId: string;
    signed: boolean;
}

/** Details for SAML_ASSERTION_RECEIVED action */
export interface SAMLAssertionDetails {
    issuer: string;
    assertionId: string;
    valid: boolean;
    validationError?: string;
    nameId?: string;
}

// =============================================================================
// Strictly-Typed Audit Entry Variants
// =============================================================================

export interface LoginSuccessEntry extends Omit<AuditLogEntry, 'action' | 'details'> {
    action: 'LOGIN_SUCCESS';
    details: LoginDetails;
}

export interface LoginFailureEntry extends Omit<AuditLogEntry, 'action' | 'details'> {
    action: 'LOGIN_FAILURE';
    details: LoginDetails;
}

export interface SAMLLoginInitiatedEntry extends Omit<AuditLogEntry, 'action' | 'details'> {
    action: 'SAML_LOGIN_INITIATED';
    details: SAMLLoginInitiatedDetails;
}

export interface SAMLAssertionEntry extends Omit<AuditLogEntry, 'action' | 'details'> {
    action: 'SAML_ASSERTION_RECEIVED';
    details: SAMLAssertionDetails;
}

/** Union of all strictly-typed audit entries */
export type StrictAuditLogEntry =
    | LoginSuccessEntry
    | LoginFailureEntry
    | SAMLLoginInitiatedEntry
    | SAMLAssertionEntry;

// =============================================================================
// Audit Logger Interface
// =============================================================================

/**
 * Contract for the AuditLogger utility class.
 */
export interface AuditLogger {
    /**
     * Log a strictly-typed audit event.
     */
    logStrict(entry: Omit<StrictAuditLogEntry, 'level' | 'timestamp'>): void;
}
