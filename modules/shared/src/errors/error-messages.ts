/**
 * SAML SSO - Error Messages
 *
 * Human-readable descriptions used as the `message` of error bodies.
 * None of them interpolate certificate or key material.
 */

export const ErrorMessages = {
    // -------------------------------------------------------------------------
    // Configuration
    // -------------------------------------------------------------------------

    /** Required environment variable missing */
    MISSING_SETTING: (field: string) => `${field} not set`,

    /** PROXY_BASE_URL missing */
    MISSING_BASE_URL: 'PROXY_BASE_URL not set. Required for SAML SSO redirects',

    /** Certificate could not be parsed */
    INVALID_CERTIFICATE: (field: string) => `${field} is not a valid X.509 certificate`,

    /** IdP certificate does not carry an RSA public key */
    UNSUPPORTED_KEY_TYPE: (field: string) => `${field} must contain an RSA public key`,

    /** Private key could not be parsed */
    INVALID_PRIVATE_KEY: (field: string) => `${field} is not a valid PEM private key`,

    /** SP private key configured without its certificate */
    KEY_WITHOUT_CERTIFICATE: 'SAML_SP_PRIVATE_KEY requires SAML_SP_X509_CERT',

    /** SP private key does not belong to the SP certificate */
    KEY_CERTIFICATE_MISMATCH: 'SAML_SP_PRIVATE_KEY does not match SAML_SP_X509_CERT',

    /** Unknown algorithm name */
    UNSUPPORTED_ALGORITHM: (field: string) => `${field} names an unsupported algorithm`,

    /** URL setting is not http(s) */
    INVALID_URL: (field: string) => `${field} must be an absolute http(s) URL`,

    /** Generated metadata failed self-validation */
    INVALID_METADATA: (errors: string) => `Invalid SAML metadata: ${errors}`,

    // -------------------------------------------------------------------------
    // ACS Endpoint
    // -------------------------------------------------------------------------

    /** SAMLResponse form field missing */
    MISSING_SAML_RESPONSE: 'Missing SAMLResponse',

    /** RelayState too long or carrying control characters */
    INVALID_RELAY_STATE: 'RelayState must be at most 80 bytes of printable text',

    /** InResponseTo unknown or already consumed */
    UNKNOWN_REQUEST: 'SAML Response does not answer an outstanding AuthnRequest',

    /** Posted RelayState differs from the one stored with the AuthnRequest */
    RELAY_STATE_MISMATCH: 'RelayState does not match the AuthnRequest',

    /** Fallback for errors outside the SAML core */
    INTERNAL_ERROR: 'An unexpected error occurred',
} as const;
