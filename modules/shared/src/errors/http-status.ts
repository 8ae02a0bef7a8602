/**
 * SAML SSO - HTTP Status Codes
 *
 * Status codes returned by the SSO endpoints.
 *
 * @see RFC 9110 - HTTP Semantics
 */

export const HttpStatus = {
    /** Request succeeded */
    OK: 200,
    /** Redirect to the IdP (POST-redirect-GET pattern) */
    SEE_OTHER: 303,
    /** Missing or malformed request parameters */
    BAD_REQUEST: 400,
    /** SAML Response failed validation */
    UNAUTHORIZED: 401,
    /** HTTP method not allowed for this endpoint */
    METHOD_NOT_ALLOWED: 405,
    /** Configuration failure or unexpected server error */
    INTERNAL_SERVER_ERROR: 500,
} as const;

/** Type representing valid HTTP status code values */
export type HttpStatusCode = typeof HttpStatus[keyof typeof HttpStatus];
