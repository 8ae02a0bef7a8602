/**
 * SAML Strategy - Type Definitions
 *
 * Settings, parsed assertion and identity types shared by the SAML
 * SP core and its Lambda handlers.
 */

import type { DigestAlgorithm, SignatureAlgorithm } from './constants';

// =============================================================================
// Settings Model
// =============================================================================

export interface SPSettings {
    /** SP entity ID (also the expected Audience) */
    entityId: string;
    /** PROXY_BASE_URL without trailing slash */
    baseUrl: string;
    /** Assertion Consumer Service URL (HTTP-POST) */
    acsUrl: string;
    metadataUrl: string;
    nameIdFormat: string;
    /** PEM certificate published in metadata */
    certificate?: string;
    /** PEM private key; its presence turns request and metadata signing on */
    privateKey?: string;
}

export interface IdPSettings {
    entityId: string;
    ssoUrl: string;
    sloUrl?: string;
    /** PEM certificate, parsed and checked to hold an RSA key */
    certificate: string;
}

export interface SecurityPolicy {
    signRequests: boolean;
    requireSignedAssertions: boolean;
    requireSignedMessages: boolean;
    requireEncryptedAssertions: boolean;
    requestedAuthnContext: boolean;
    authnContextComparison: 'exact';
    wantAttributeStatement: boolean;
    signatureAlgorithm: SignatureAlgorithm;
    digestAlgorithm: DigestAlgorithm;
    clockSkewSeconds: number;
}

/**
 * SAML attribute names looked up for each identity field.
 */
export interface AttributeNameConfig {
    id: string;
    email: string;
    firstName: string;
    lastName: string;
    displayName: string;
}

export interface SamlSettings {
    sp: SPSettings;
    idp: IdPSettings;
    security: SecurityPolicy;
    attributes: AttributeNameConfig;
    debug: boolean;
    /** DynamoDB table for pending AuthnRequests; no store when unset */
    requestTable?: string;
}

/**
 * Configuration source, `process.env` by default.
 */
export type EnvSource = Readonly<Record<string, string | undefined>>;

// =============================================================================
// AuthnRequest
// =============================================================================

export interface AuthnRequestResult {
    /** IdP SSO URL with SAMLRequest, RelayState, SigAlg and Signature appended */
    redirectUrl: string;
    requestId: string;
    issueInstant: string;
    destination: string;
    relayState?: string;
}

// =============================================================================
// Assertion
// =============================================================================

export interface AssertionSubject {
    nameId: string;
    nameIdFormat?: string;
}

export interface AssertionConditions {
    notBefore?: string;
    notOnOrAfter?: string;
    /** Every Audience value across all AudienceRestriction elements */
    audiences: string[];
}

export interface AuthnStatementInfo {
    authnInstant: string;
    sessionIndex?: string;
    sessionNotOnOrAfter?: string;
    authnContextClassRef?: string;
}

/**
 * A validated assertion. Attribute values keep document order; the first
 * value of each name is the canonical one.
 */
export interface Assertion {
    id: string;
    issuer: string;
    issueInstant: string;
    subject: AssertionSubject;
    conditions: AssertionConditions;
    authn: AuthnStatementInfo;
    attributes: Record<string, string[]>;
    responseId: string;
    inResponseTo?: string;
    /** Element whose signature established trust */
    signedBy: 'assertion' | 'response' | 'none';
}

// =============================================================================
// Identity
// =============================================================================

export interface CanonicalIdentity {
    id: string;
    email: string;
    firstName?: string;
    lastName?: string;
    displayName: string;
    provider: 'saml';
    /** Filled by provisioning outside the SSO core */
    teamIds: string[];
}
