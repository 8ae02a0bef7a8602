/**
 * SAML Strategy - Settings Model
 *
 * Builds the immutable SamlSettings value from environment variables.
 * Reads only the source passed in; no network or XML work happens here,
 * so a missing required variable fails before anything else runs.
 *
 * Required: SAML_IDP_ENTITY_ID, SAML_IDP_SSO_URL, SAML_IDP_X509_CERT,
 * PROXY_BASE_URL (checked in that order).
 */

import { X509Certificate, createPrivateKey } from 'node:crypto';
import type { KeyObject } from 'node:crypto';
import { ErrorMessages, isHttpUrl } from '@proxy-sso/shared';
import {
    DEFAULT_ATTRIBUTE_NAMES,
    DEFAULTS,
    DIGEST_ALGORITHMS,
    SIGNATURE_ALGORITHMS,
} from './constants';
import type { DigestAlgorithm, SignatureAlgorithm } from './constants';
import { ConfigError } from './errors';
import type {
    AttributeNameConfig,
    EnvSource,
    IdPSettings,
    SamlSettings,
    SecurityPolicy,
    SPSettings,
} from './types';

// =============================================================================
// Environment Readers
// =============================================================================

function optional(env: EnvSource, name: string): string | undefined {
    const value = env[name]?.trim();
    return value ? value : undefined;
}

function required(env: EnvSource, name: string, message?: string): string {
    const value = optional(env, name);
    if (!value) {
        throw new ConfigError(name, message ?? ErrorMessages.MISSING_SETTING(name));
    }
    return value;
}

function url(env: EnvSource, name: string, message?: string): string {
    const value = required(env, name, message);
    if (!isHttpUrl(value)) {
        throw new ConfigError(name, ErrorMessages.INVALID_URL(name));
    }
    return value;
}

function flag(env: EnvSource, name: string, fallback: boolean): boolean {
    const value = optional(env, name);
    if (value === undefined) {
        return fallback;
    }
    return ['true', '1', 'yes', 'on'].includes(value.toLowerCase());
}

function positiveInt(env: EnvSource, name: string, fallback: number): number {
    const value = optional(env, name);
    if (value === undefined) {
        return fallback;
    }
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new ConfigError(name, `${name} must be a non-negative integer`);
    }
    return parsed;
}

// =============================================================================
// PEM Handling
// =============================================================================

/**
 * Normalize certificate or key material to PEM.
 *
 * Accepts full PEM, PEM whose newlines arrived as literal "\n" (common
 * in .env files), or a bare base64 body.
 */
export function normalizePem(value: string, label: 'CERTIFICATE' | 'PRIVATE KEY'): string {
    const unescaped = value.replace(/\\n/g, '\n').trim();

    if (unescaped.includes('-----BEGIN')) {
        return `${unescaped}\n`;
    }

    const body = unescaped.replace(/\s+/g, '');
    const lines = body.match(/.{1,64}/g) ?? [];
    return `-----BEGIN ${label}-----\n${lines.join('\n')}\n-----END ${label}-----\n`;
}

function parseCertificate(field: string, value: string): { pem: string; cert: X509Certificate } {
    const pem = normalizePem(value, 'CERTIFICATE');
    try {
        return { pem, cert: new X509Certificate(pem) };
    } catch {
        throw new ConfigError(field, ErrorMessages.INVALID_CERTIFICATE(field));
    }
}

function parsePrivateKey(field: string, value: string): { pem: string; key: KeyObject } {
    const pem = normalizePem(value, 'PRIVATE KEY');
    try {
        return { pem, key: createPrivateKey(pem) };
    } catch {
        throw new ConfigError(field, ErrorMessages.INVALID_PRIVATE_KEY(field));
    }
}

// =============================================================================
// Algorithms
// =============================================================================

const SIGNATURE_ALGORITHM_NAMES: Record<string, SignatureAlgorithm> = {
    'rsa-sha256': SIGNATURE_ALGORITHMS.RSA_SHA256,
    'rsa-sha512': SIGNATURE_ALGORITHMS.RSA_SHA512,
    [SIGNATURE_ALGORITHMS.RSA_SHA256]: SIGNATURE_ALGORITHMS.RSA_SHA256,
    [SIGNATURE_ALGORITHMS.RSA_SHA512]: SIGNATURE_ALGORITHMS.RSA_SHA512,
};

const DIGEST_ALGORITHM_NAMES: Record<string, DigestAlgorithm> = {
    'sha256': DIGEST_ALGORITHMS.SHA256,
    'sha512': DIGEST_ALGORITHMS.SHA512,
    [DIGEST_ALGORITHMS.SHA256]: DIGEST_ALGORITHMS.SHA256,
    [DIGEST_ALGORITHMS.SHA512]: DIGEST_ALGORITHMS.SHA512,
};

function algorithm<T>(env: EnvSource, name: string, names: Record<string, T>, fallback: T): T {
    const value = optional(env, name);
    if (value === undefined) {
        return fallback;
    }
    const resolved = names[value.toLowerCase()] ?? names[value];
    if (resolved === undefined) {
        throw new ConfigError(name, ErrorMessages.UNSUPPORTED_ALGORITHM(name));
    }
    return resolved;
}

// =============================================================================
// Deep Freeze
// =============================================================================

function deepFreeze<T extends object>(value: T): Readonly<T> {
    for (const child of Object.values(value)) {
        if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) {
            deepFreeze(child);
        }
    }
    return Object.freeze(value);
}

// =============================================================================
// Settings Builder
// =============================================================================

/**
 * Build SAML settings from a configuration source.
 *
 * @param env - Configuration source (default: process.env)
 * @throws ConfigError naming the offending variable
 *
 * @example
 * ```typescript
 * const settings = buildSettings({
 *     SAML_IDP_ENTITY_ID: 'https://idp.example.com',
 *     SAML_IDP_SSO_URL: 'https://idp.example.com/sso',
 *     SAML_IDP_X509_CERT: certPem,
 *     PROXY_BASE_URL: 'https://proxy.example.com',
 * });
 * ```
 */
export function buildSettings(env: EnvSource = process.env): Readonly<SamlSettings> {
    // -------------------------------------------------------------------------
    // IdP
    // -------------------------------------------------------------------------

    const idpEntityId = required(env, 'SAML_IDP_ENTITY_ID');
    const idpSsoUrl = url(env, 'SAML_IDP_SSO_URL');
    const idpCertRaw = required(env, 'SAML_IDP_X509_CERT');
    const baseUrlRaw = url(env, 'PROXY_BASE_URL', ErrorMessages.MISSING_BASE_URL);

    const idpCert = parseCertificate('SAML_IDP_X509_CERT', idpCertRaw);
    if (idpCert.cert.publicKey.asymmetricKeyType !== 'rsa') {
        throw new ConfigError('SAML_IDP_X509_CERT', ErrorMessages.UNSUPPORTED_KEY_TYPE('SAML_IDP_X509_CERT'));
    }

    const idpSloUrl = optional(env, 'SAML_IDP_SLO_URL');
    if (idpSloUrl !== undefined && !isHttpUrl(idpSloUrl)) {
        throw new ConfigError('SAML_IDP_SLO_URL', ErrorMessages.INVALID_URL('SAML_IDP_SLO_URL'));
    }

    const idp: IdPSettings = {
        entityId: idpEntityId,
        ssoUrl: idpSsoUrl,
        ...(idpSloUrl !== undefined && { sloUrl: idpSloUrl }),
        certificate: idpCert.pem,
    };

    // -------------------------------------------------------------------------
    // SP
    // -------------------------------------------------------------------------

    const baseUrl = baseUrlRaw.replace(/\/+$/, '');
    const acsPathRaw = optional(env, 'SAML_ACS_PATH') ?? DEFAULTS.ACS_PATH;
    const acsPath = acsPathRaw.startsWith('/') ? acsPathRaw : `/${acsPathRaw}`;
    const metadataUrl = `${baseUrl}${DEFAULTS.METADATA_PATH}`;

    const spCertRaw = optional(env, 'SAML_SP_X509_CERT');
    const spKeyRaw = optional(env, 'SAML_SP_PRIVATE_KEY');

    const spCert = spCertRaw !== undefined ? parseCertificate('SAML_SP_X509_CERT', spCertRaw) : undefined;
    let spKeyPem: string | undefined;

    if (spKeyRaw !== undefined) {
        if (!spCert) {
            throw new ConfigError('SAML_SP_PRIVATE_KEY', ErrorMessages.KEY_WITHOUT_CERTIFICATE);
        }
        const spKey = parsePrivateKey('SAML_SP_PRIVATE_KEY', spKeyRaw);
        if (!spCert.cert.checkPrivateKey(spKey.key)) {
            throw new ConfigError('SAML_SP_PRIVATE_KEY', ErrorMessages.KEY_CERTIFICATE_MISMATCH);
        }
        spKeyPem = spKey.pem;
    }

    const sp: SPSettings = {
        entityId: optional(env, 'SAML_ENTITY_ID') ?? metadataUrl,
        baseUrl,
        acsUrl: `${baseUrl}${acsPath}`,
        metadataUrl,
        nameIdFormat: optional(env, 'SAML_NAME_ID_FORMAT') ?? DEFAULTS.NAME_ID_FORMAT,
        ...(spCert && { certificate: spCert.pem }),
        ...(spKeyPem !== undefined && { privateKey: spKeyPem }),
    };

    // -------------------------------------------------------------------------
    // Security policy
    // -------------------------------------------------------------------------

    const security: SecurityPolicy = {
        signRequests: spKeyPem !== undefined,
        requireSignedAssertions: flag(env, 'SAML_WANT_ASSERTIONS_SIGNED', true),
        requireSignedMessages: flag(env, 'SAML_WANT_MESSAGES_SIGNED', false),
        requireEncryptedAssertions: flag(env, 'SAML_WANT_ASSERTIONS_ENCRYPTED', false),
        requestedAuthnContext: flag(env, 'SAML_REQUESTED_AUTHN_CONTEXT', true),
        authnContextComparison: 'exact',
        wantAttributeStatement: flag(env, 'SAML_WANT_ATTRIBUTE_STATEMENT', false),
        signatureAlgorithm: algorithm(env, 'SAML_SIGNATURE_ALGORITHM', SIGNATURE_ALGORITHM_NAMES, DEFAULTS.SIGNATURE_ALGORITHM),
        digestAlgorithm: algorithm(env, 'SAML_DIGEST_ALGORITHM', DIGEST_ALGORITHM_NAMES, DEFAULTS.DIGEST_ALGORITHM),
        clockSkewSeconds: positiveInt(env, 'SAML_CLOCK_SKEW_SECONDS', DEFAULTS.CLOCK_SKEW_SECONDS),
    };

    // -------------------------------------------------------------------------
    // Attribute names
    // -------------------------------------------------------------------------

    const attributes: AttributeNameConfig = {
        id: optional(env, 'SAML_USER_ID_ATTRIBUTE') ?? DEFAULT_ATTRIBUTE_NAMES.id,
        email: optional(env, 'SAML_USER_EMAIL_ATTRIBUTE') ?? DEFAULT_ATTRIBUTE_NAMES.email,
        firstName: optional(env, 'SAML_USER_FIRST_NAME_ATTRIBUTE') ?? DEFAULT_ATTRIBUTE_NAMES.firstName,
        lastName: optional(env, 'SAML_USER_LAST_NAME_ATTRIBUTE') ?? DEFAULT_ATTRIBUTE_NAMES.lastName,
        displayName: optional(env, 'SAML_USER_DISPLAY_NAME_ATTRIBUTE') ?? DEFAULT_ATTRIBUTE_NAMES.displayName,
    };

    const requestTable = optional(env, 'SAML_REQUEST_TABLE');

    return deepFreeze<SamlSettings>({
        sp,
        idp,
        security,
        attributes,
        debug: flag(env, 'SAML_DEBUG', false),
        ...(requestTable !== undefined && { requestTable }),
    });
}

/**
 * Whether the IdP half of the configuration is present, so the web layer
 * can route SSO through SAML. Does not validate the values.
 */
export function isSamlConfigured(env: EnvSource = process.env): boolean {
    return ['SAML_IDP_ENTITY_ID', 'SAML_IDP_SSO_URL', 'SAML_IDP_X509_CERT']
        .every(name => optional(env, name) !== undefined);
}

/**
 * Log-safe summary of the settings. Certificates and keys are reduced
 * to presence flags.
 */
export function describeSettings(settings: SamlSettings): Record<string, unknown> {
    return {
        spEntityId: settings.sp.entityId,
        acsUrl: settings.sp.acsUrl,
        metadataUrl: settings.sp.metadataUrl,
        nameIdFormat: settings.sp.nameIdFormat,
        hasSpCertificate: settings.sp.certificate !== undefined,
        hasSpKey: settings.sp.privateKey !== undefined,
        idpEntityId: settings.idp.entityId,
        idpSsoUrl: settings.idp.ssoUrl,
        idpSloUrl: settings.idp.sloUrl ?? null,
        signRequests: settings.security.signRequests,
        requireSignedAssertions: settings.security.requireSignedAssertions,
        requireSignedMessages: settings.security.requireSignedMessages,
        requireEncryptedAssertions: settings.security.requireEncryptedAssertions,
        wantAttributeStatement: settings.security.wantAttributeStatement,
        signatureAlgorithm: settings.security.signatureAlgorithm,
        digestAlgorithm: settings.security.digestAlgorithm,
        clockSkewSeconds: settings.security.clockSkewSeconds,
        requestStore: settings.requestTable ? 'dynamodb' : 'none',
        debug: settings.debug,
    };
}
