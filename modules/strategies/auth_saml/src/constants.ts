/**
 * SAML Strategy - Protocol Constants
 *
 * Namespace, binding and algorithm URIs plus the SP's default settings.
 *
 * @see https://docs.oasis-open.org/security/saml/v2.0/saml-core-2.0-os.pdf
 * @see https://www.w3.org/TR/xmldsig-core1/
 */

// =============================================================================
// Namespaces
// =============================================================================

export const SAML_NAMESPACES = {
    PROTOCOL: 'urn:oasis:names:tc:SAML:2.0:protocol',
    ASSERTION: 'urn:oasis:names:tc:SAML:2.0:assertion',
    METADATA: 'urn:oasis:names:tc:SAML:2.0:metadata',
    DSIG: 'http://www.w3.org/2000/09/xmldsig#',
} as const;

// =============================================================================
// Bindings
// =============================================================================

export const BINDINGS = {
    HTTP_POST: 'urn:oasis:names:tc:SAML:2.0:bindings:HTTP-POST',
    HTTP_REDIRECT: 'urn:oasis:names:tc:SAML:2.0:bindings:HTTP-Redirect',
} as const;

// =============================================================================
// Identifiers
// =============================================================================

export const NAMEID_FORMATS = {
    EMAIL: 'urn:oasis:names:tc:SAML:1.1:nameid-format:emailAddress',
    PERSISTENT: 'urn:oasis:names:tc:SAML:2.0:nameid-format:persistent',
    TRANSIENT: 'urn:oasis:names:tc:SAML:2.0:nameid-format:transient',
    UNSPECIFIED: 'urn:oasis:names:tc:SAML:1.1:nameid-format:unspecified',
} as const;

export const STATUS_CODES = {
    SUCCESS: 'urn:oasis:names:tc:SAML:2.0:status:Success',
} as const;

export const AUTHN_CONTEXT = {
    PASSWORD_PROTECTED_TRANSPORT: 'urn:oasis:names:tc:SAML:2.0:ac:classes:PasswordProtectedTransport',
} as const;

export const SUBJECT_CONFIRMATION_BEARER = 'urn:oasis:names:tc:SAML:2.0:cm:bearer';

// =============================================================================
// Algorithms
// =============================================================================

export const SIGNATURE_ALGORITHMS = {
    RSA_SHA256: 'http://www.w3.org/2001/04/xmldsig-more#rsa-sha256',
    RSA_SHA512: 'http://www.w3.org/2001/04/xmldsig-more#rsa-sha512',
    /** Rejected, listed for detection only */
    RSA_SHA1: 'http://www.w3.org/2000/09/xmldsig#rsa-sha1',
} as const;

export type SignatureAlgorithm =
    | typeof SIGNATURE_ALGORITHMS.RSA_SHA256
    | typeof SIGNATURE_ALGORITHMS.RSA_SHA512;

export const DIGEST_ALGORITHMS = {
    SHA256: 'http://www.w3.org/2001/04/xmlenc#sha256',
    SHA512: 'http://www.w3.org/2001/04/xmlenc#sha512',
    /** Rejected, listed for detection only */
    SHA1: 'http://www.w3.org/2000/09/xmldsig#sha1',
} as const;

export type DigestAlgorithm =
    | typeof DIGEST_ALGORITHMS.SHA256
    | typeof DIGEST_ALGORITHMS.SHA512;

export const TRANSFORMS = {
    ENVELOPED_SIGNATURE: 'http://www.w3.org/2000/09/xmldsig#enveloped-signature',
    EXCLUSIVE_C14N: 'http://www.w3.org/2001/10/xml-exc-c14n#',
    EXCLUSIVE_C14N_WITH_COMMENTS: 'http://www.w3.org/2001/10/xml-exc-c14n#WithComments',
} as const;

/** node:crypto sign/verify names for the redirect binding */
export const NODE_SIGN_ALGORITHMS: Record<SignatureAlgorithm, string> = {
    [SIGNATURE_ALGORITHMS.RSA_SHA256]: 'RSA-SHA256',
    [SIGNATURE_ALGORITHMS.RSA_SHA512]: 'RSA-SHA512',
};

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULTS = {
    ACS_PATH: '/sso/saml/acs',
    METADATA_PATH: '/sso/saml/metadata',
    NAME_ID_FORMAT: NAMEID_FORMATS.EMAIL,
    SIGNATURE_ALGORITHM: SIGNATURE_ALGORITHMS.RSA_SHA256,
    DIGEST_ALGORITHM: DIGEST_ALGORITHMS.SHA256,
    /** Tolerance for IdP clock drift (seconds) */
    CLOCK_SKEW_SECONDS: 300,
    /** How long an issued AuthnRequest stays answerable (seconds) */
    REQUEST_TTL_SECONDS: 600,
    /** Metadata validUntil offset (2 days) */
    METADATA_VALID_SECONDS: 2 * 24 * 60 * 60,
    /** Metadata cacheDuration (1 week) */
    METADATA_CACHE_DURATION: 'PT604800S',
} as const;

/** Attribute names used when no SAML_USER_*_ATTRIBUTE override is set */
export const DEFAULT_ATTRIBUTE_NAMES = {
    id: 'email',
    email: 'email',
    firstName: 'firstName',
    lastName: 'lastName',
    displayName: 'displayName',
} as const;
