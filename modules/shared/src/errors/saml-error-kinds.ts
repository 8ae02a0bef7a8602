/**
 * SAML SSO - Error Kinds
 *
 * Stable identifiers returned as `kind` in error bodies and recorded as
 * the `reason` of LOGIN_FAILURE audit entries.
 */

/**
 * Response validation failures, surfaced as 401.
 */
export const ValidationErrorKinds = {
    /** Signature missing where policy requires one, or not verifying */
    SIGNATURE_INVALID: 'SignatureInvalid',
    /** Outside the Conditions / SubjectConfirmationData time window */
    EXPIRED: 'Expired',
    /** SP entity ID not among the Audience values */
    AUDIENCE_MISMATCH: 'AudienceMismatch',
    /** Issuer differs from the configured IdP entity ID */
    ISSUER_MISMATCH: 'IssuerMismatch',
    /** Assertion carries no AuthnStatement */
    NO_AUTHN_STATEMENT: 'NoAuthnStatement',
    /** Assertion carries no AttributeStatement while policy wants one */
    NO_ATTRIBUTE_STATEMENT: 'NoAttributeStatement',
    /** IdP returned a non-Success top-level status */
    STATUS_ERROR: 'StatusError',
    /** Unparseable or structurally invalid input, InResponseTo mismatch */
    MALFORMED: 'Malformed',
} as const;

export type ValidationErrorKind = typeof ValidationErrorKinds[keyof typeof ValidationErrorKinds];

/**
 * All error kinds, including the 500-class ones.
 */
export const SamlErrorKinds = {
    ...ValidationErrorKinds,
    /** Missing or invalid configuration */
    CONFIG_ERROR: 'ConfigError',
    /** Anything not raised by the SAML core itself */
    INTERNAL_ERROR: 'InternalError',
} as const;

export type SamlErrorKind = typeof SamlErrorKinds[keyof typeof SamlErrorKinds];
