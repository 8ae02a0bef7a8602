/**
 * SAML SSO - Storage Module
 *
 * DynamoDB operations for the single-table layout.
 *
 * @module storage
 */

export { withRetry, isRetryableError } from './retry';

export type { RetryConfig } from './retry';

export {
    savePendingAuthnRequest,
    consumePendingAuthnRequest,
} from './authn-request-operations';

export type { PendingAuthnRequest } from './authn-request-operations';
