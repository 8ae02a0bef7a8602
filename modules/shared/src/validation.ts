/**
 * SAML SSO - Request Validation Utilities
 *
 * Input checks for the parameters the SSO endpoints accept from browsers
 * and from configuration.
 *
 * @see SAML 2.0 Bindings Specification, Section 3.4.3 (RelayState)
 * @see RFC 3986 - Uniform Resource Identifier (URI)
 */

// =============================================================================
// Constants
// =============================================================================

/** RelayState MUST NOT exceed 80 bytes (HTTP-Redirect binding) */
const MAX_RELAY_STATE_BYTES = 80;

/** Maximum URL length accepted from configuration */
const MAX_URL_LENGTH = 2048;

// =============================================================================
// RelayState Validation
// =============================================================================

/**
 * Validate a RelayState value.
 *
 * RelayState is opaque to the SP core and echoed back by the IdP. It is
 * limited to 80 bytes of UTF-8 without control characters.
 *
 * @returns True if valid
 */
export function isValidRelayState(relayState: string | undefined | null): boolean {
    if (relayState === null || relayState === undefined || typeof relayState !== 'string') {
        return false;
    }

    if (relayState.length === 0 || Buffer.byteLength(relayState, 'utf8') > MAX_RELAY_STATE_BYTES) {
        return false;
    }

    return !/[\u0000-\u001f\u007f]/.test(relayState);
}

// =============================================================================
// URL Validation
// =============================================================================

/**
 * Check that a value is an absolute http(s) URL without a fragment.
 *
 * @returns True if well-formed (also narrows type to string)
 */
export function isHttpUrl(url: string | undefined | null): url is string {
    if (url === null || url === undefined || typeof url !== 'string') {
        return false;
    }

    if (url.length > MAX_URL_LENGTH) {
        return false;
    }

    try {
        const parsed = new URL(url);
        if (parsed.hash) {
            return false;
        }
        return parsed.protocol === 'https:' || parsed.protocol === 'http:';
    } catch {
        return false;
    }
}
