/**
 * SAML SSO - Shared Utilities
 *
 * Central export for the modules shared by the SSO Lambda functions.
 * No hardcoded configuration: all values come from environment variables
 * read by the strategy modules.
 *
 * Modules:
 * - Storage: DynamoDB operations for pending AuthnRequests, with retry
 * - Audit Logger: structured JSON logging to CloudWatch
 * - Response Helpers: HTTP response formatting with security headers
 * - Validation: RelayState and URL checks
 * - Crypto: SAML identifier generation
 * - Constants: entity types, key prefixes, auth methods
 * - Errors: error kinds, HTTP status codes and messages
 * - Type Guards: runtime discrimination for DynamoDB items
 */

// =============================================================================
// Storage
// =============================================================================

export * as storage from './storage';

export type { PendingAuthnRequest, RetryConfig } from './storage';

// =============================================================================
// Audit Logger
// =============================================================================

export {
    AuditLogger,
    Logger,
    withContext,
    createLogger,
    createSystemLogger,
    extractClientIp,
} from './audit-logger';

export type { AuditContext, LogLevel, LoggerOptions } from './audit-logger';

// =============================================================================
// HTTP Response Helpers
// =============================================================================

export {
    success,
    xml,
    error,
    badRequest,
    methodNotAllowed,
    redirect,
    SECURITY_HEADERS,
} from './response';

export type { ErrorBody } from './response';

// =============================================================================
// Error Constants
// =============================================================================

export {
    SamlErrorKinds,
    ValidationErrorKinds,
    HttpStatus,
    ErrorMessages,
} from './errors';

export type {
    SamlErrorKind,
    ValidationErrorKind,
    HttpStatusCode,
} from './errors';

// =============================================================================
// Validation Utilities
// =============================================================================

export {
    isValidRelayState,
    isHttpUrl,
} from './validation';

// =============================================================================
// Cryptographic Utilities
// =============================================================================

export { generateSamlId } from './crypto';

// =============================================================================
// Constants
// =============================================================================

export {
    EntityTypes,
    KeyPrefixes,
    METADATA_SK,
    AuthMethods,
} from './constants';

export type {
    EntityType,
    AuthMethod,
} from './constants';

// =============================================================================
// Type Guards
// =============================================================================

export { isPendingAuthnRequestItem } from './type-guards';
