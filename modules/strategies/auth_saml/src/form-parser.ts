/**
 * SAML Strategy - Form Body Parser
 *
 * Parses the URL-encoded body the IdP's auto-submitting form POSTs to the ACS.
 */

/**
 * Parse a URL-encoded form body. API Gateway may deliver it base64
 * encoded. When a field repeats, the first occurrence wins.
 */
export function parseFormBody(
    body: string | null | undefined,
    isBase64Encoded: boolean
): Record<string, string> {
    if (!body) {
        return {};
    }

    const decodedBody = isBase64Encoded
        ? Buffer.from(body, 'base64').toString('utf-8')
        : body;

    const fields = new Map<string, string>();
    for (const [key, value] of new URLSearchParams(decodedBody)) {
        if (!fields.has(key)) {
            fields.set(key, value);
        }
    }

    return Object.fromEntries(fields);
}
