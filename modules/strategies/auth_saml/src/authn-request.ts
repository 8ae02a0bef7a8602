/**
 * SAML Strategy - AuthnRequest Builder
 *
 * Builds the SP-initiated AuthnRequest and encodes it for the
 * HTTP-Redirect binding. No network I/O: the caller sends the browser to
 * the returned URL.
 *
 * Redirect binding encoding:
 *   SAMLRequest = urlencode(base64(deflateRaw(xml)))
 *   signed over  "SAMLRequest=…[&RelayState=…]&SigAlg=…" (exactly these
 *                bytes, in this order), then "&Signature=…" is appended
 *
 * @see SAML 2.0 Core Specification, Section 3.4.1
 * @see SAML 2.0 Bindings Specification, Section 3.4.4
 */

import { deflateRawSync } from 'node:zlib';
import { generateSamlId } from '@proxy-sso/shared';
import {
    AUTHN_CONTEXT,
    BINDINGS,
    SAML_NAMESPACES,
} from './constants';
import { ConfigError } from './errors';
import { signRedirectQuery } from './signature';
import type { AuthnRequestResult, IdPSettings, SecurityPolicy, SPSettings } from './types';
import { escapeXml, toSamlInstant } from './xml';

export interface AuthnRequestSettings {
    sp: SPSettings;
    idp: IdPSettings;
    security: SecurityPolicy;
}

export interface AuthnRequestOptions {
    /** Clock override for tests */
    now?: Date;
    /** Request ID override for tests */
    requestId?: string;
}

// =============================================================================
// Serialization
// =============================================================================

/**
 * Serialize a minimal AuthnRequest.
 */
export function serializeAuthnRequest(
    settings: AuthnRequestSettings,
    requestId: string,
    issueInstant: string
): string {
    const { sp, idp, security } = settings;

    const requestedAuthnContext = security.requestedAuthnContext
        ? `<samlp:RequestedAuthnContext Comparison="${security.authnContextComparison}">` +
            `<saml:AuthnContextClassRef>${AUTHN_CONTEXT.PASSWORD_PROTECTED_TRANSPORT}</saml:AuthnContextClassRef>` +
            '</samlp:RequestedAuthnContext>'
        : '';

    return (
        `<samlp:AuthnRequest xmlns:samlp="${SAML_NAMESPACES.PROTOCOL}" xmlns:saml="${SAML_NAMESPACES.ASSERTION}"` +
        ` ID="${escapeXml(requestId)}"` +
        ' Version="2.0"' +
        ` IssueInstant="${issueInstant}"` +
        ` Destination="${escapeXml(idp.ssoUrl)}"` +
        ` ProtocolBinding="${BINDINGS.HTTP_POST}"` +
        ` AssertionConsumerServiceURL="${escapeXml(sp.acsUrl)}">` +
        `<saml:Issuer>${escapeXml(sp.entityId)}</saml:Issuer>` +
        `<samlp:NameIDPolicy Format="${escapeXml(sp.nameIdFormat)}" AllowCreate="true"/>` +
        requestedAuthnContext +
        '</samlp:AuthnRequest>'
    );
}

/**
 * DEFLATE (raw, no zlib header) then base64.
 */
export function deflateAndEncode(xml: string): string {
    return deflateRawSync(Buffer.from(xml, 'utf8')).toString('base64');
}

// =============================================================================
// Builder
// =============================================================================

/**
 * Build the redirect URL for an SP-initiated login.
 *
 * @param relayState - Opaque value the IdP echoes back to the ACS
 *
 * @example
 * ```typescript
 * const { redirectUrl, requestId } = buildAuthnRequest(settings, '/ui/');
 * await store.remember(requestId, { relayState: '/ui/' });
 * return redirect(redirectUrl);
 * ```
 */
export function buildAuthnRequest(
    settings: AuthnRequestSettings,
    relayState?: string,
    options: AuthnRequestOptions = {}
): AuthnRequestResult {
    const { sp, idp, security } = settings;

    const requestId = options.requestId ?? generateSamlId();
    const issueInstant = toSamlInstant(options.now ?? new Date());

    const xml = serializeAuthnRequest(settings, requestId, issueInstant);

    let query = `SAMLRequest=${encodeURIComponent(deflateAndEncode(xml))}`;
    if (relayState !== undefined) {
        query += `&RelayState=${encodeURIComponent(relayState)}`;
    }

    if (security.signRequests) {
        if (!sp.privateKey) {
            throw new ConfigError('SAML_SP_PRIVATE_KEY', 'Request signing is enabled but no SP private key is configured');
        }
        query += `&SigAlg=${encodeURIComponent(security.signatureAlgorithm)}`;
        const signature = signRedirectQuery(query, sp.privateKey, security.signatureAlgorithm);
        query += `&Signature=${encodeURIComponent(signature)}`;
    }

    const separator = idp.ssoUrl.includes('?') ? '&' : '?';

    return {
        redirectUrl: `${idp.ssoUrl}${separator}${query}`,
        requestId,
        issueInstant,
        destination: idp.ssoUrl,
        ...(relayState !== undefined && { relayState }),
    };
}
