/**
 * SAML SSO - Cryptographic Utilities
 *
 * Protocol identifiers from the Node.js CSPRNG.
 *
 * @see SAML 2.0 Core Specification, Section 1.3.4 (ID and ID Reference Values)
 */

import { randomBytes } from 'node:crypto';

/** 160 bits, above the 128-bit floor SAML sets for identifiers */
const SAML_ID_ENTROPY_BYTES = 20;

/**
 * Generate a SAML protocol identifier.
 *
 * xs:ID values must be NCNames, so the hex body gets a leading underscore.
 *
 * @example
 * ```typescript
 * generateSamlId(); // '_3f2a...' (41 characters)
 * ```
 */
export function generateSamlId(byteLength = SAML_ID_ENTROPY_BYTES): string {
    return `_${randomBytes(byteLength).toString('hex')}`;
}
