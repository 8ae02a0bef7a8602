/**
 * SAML SSO - Standardized HTTP Response Helpers
 *
 * Consistent response formatting for the SSO Lambda functions.
 *
 * - Error responses use application/json with a `{ kind, message, http_status }` body
 * - Redirects use 303 See Other
 * - Metadata is served as application/xml
 * - All responses include the same security headers
 *
 * Note: HTTP API Gateway v2 does not support response header manipulation
 * at the gateway level. Security headers are added at the Lambda response
 * level for consistent enforcement across all endpoints.
 *
 * @see RFC 6797 - HTTP Strict Transport Security (HSTS)
 */

import type { APIGatewayProxyResultV2 } from 'aws-lambda';

// =============================================================================
// Response Headers
// =============================================================================

/**
 * Security headers applied to all responses.
 *
 * - Strict-Transport-Security: 2 years with includeSubDomains and preload
 * - X-Content-Type-Options: nosniff
 * - X-Frame-Options: DENY
 * - Referrer-Policy: strict-origin-when-cross-origin
 */
export const SECURITY_HEADERS = {
    'Strict-Transport-Security': 'max-age=63072000; includeSubDomains; preload',
    'X-Content-Type-Options': 'nosniff',
    'X-Frame-Options': 'DENY',
    'Referrer-Policy': 'strict-origin-when-cross-origin',
} as const;

const JSON_HEADERS = {
    'Content-Type': 'application/json',
    'Cache-Control': 'no-store',
    'Pragma': 'no-cache',
    'Content-Security-Policy': "default-src 'none'; frame-ancestors 'none'",
    ...SECURITY_HEADERS,
} as const;

const REDIRECT_HEADERS = {
    'Cache-Control': 'no-store',
    'Pragma': 'no-cache',
    ...SECURITY_HEADERS,
} as const;

/**
 * Metadata is public and may be cached by IdPs for an hour.
 */
const XML_HEADERS = {
    'Content-Type': 'application/xml; charset=utf-8',
    'Cache-Control': 'public, max-age=3600',
    ...SECURITY_HEADERS,
} as const;

// =============================================================================
// Success Responses
// =============================================================================

/**
 * Return a successful JSON response.
 *
 * @param body - Response body (will be JSON stringified)
 * @param statusCode - HTTP status code (default: 200)
 *
 * @example
 * ```typescript
 * return success({ identity, relay_state: relayState ?? null });
 * ```
 */
export function success<T>(body: T, statusCode = 200): APIGatewayProxyResultV2 {
    return {
        statusCode,
        headers: JSON_HEADERS,
        body: JSON.stringify(body),
    };
}

/**
 * Return an XML document (SP metadata).
 */
export function xml(body: string, statusCode = 200): APIGatewayProxyResultV2 {
    return {
        statusCode,
        headers: XML_HEADERS,
        body,
    };
}

// =============================================================================
// Error Responses
// =============================================================================

/**
 * Error response body. `kind` is a stable machine-readable identifier,
 * `message` is safe to show to the end user.
 */
export interface ErrorBody {
    kind: string;
    message: string;
    http_status: number;
}

/**
 * Return an error response.
 *
 * @example
 * ```typescript
 * return error(401, 'SignatureInvalid', 'SAML signature verification failed');
 * ```
 */
export function error(
    statusCode: number,
    kind: string,
    message: string
): APIGatewayProxyResultV2 {
    const body: ErrorBody = {
        kind,
        message,
        http_status: statusCode,
    };

    return {
        statusCode,
        headers: JSON_HEADERS,
        body: JSON.stringify(body),
    };
}

/**
 * 400 Bad Request - Missing or malformed request parameters.
 */
export function badRequest(message: string): APIGatewayProxyResultV2 {
    return error(400, 'BadRequest', message);
}

/**
 * 405 Method Not Allowed.
 */
export function methodNotAllowed(): APIGatewayProxyResultV2 {
    return error(405, 'MethodNotAllowed', 'Method not allowed');
}

// =============================================================================
// Redirect Responses
// =============================================================================

/**
 * Return an HTTP 303 See Other redirect response.
 *
 * @example
 * ```typescript
 * return redirect('https://idp.example.com/sso?SAMLRequest=...');
 * ```
 */
export function redirect(url: string): APIGatewayProxyResultV2 {
    return {
        statusCode: 303,
        headers: {
            ...REDIRECT_HEADERS,
            Location: url,
        },
        body: '',
    };
}
