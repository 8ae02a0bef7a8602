/**
 * SAML Strategy - Service Provider Metadata
 *
 * Lambda handler for GET /sso/saml/metadata, plus the generator and the
 * self-check it runs before anything is served.
 *
 * The document carries the entity ID, the ACS endpoint (HTTP-POST), the
 * NameID format and, when configured, the SP signing certificate. With an
 * SP private key it is signed with an enveloped signature.
 *
 * @see https://docs.oasis-open.org/security/saml/v2.0/saml-metadata-2.0-os.pdf
 */

import type { APIGatewayProxyEventV2, APIGatewayProxyResultV2, Context } from 'aws-lambda';
import {
    ErrorMessages,
    createLogger,
    generateSamlId,
    methodNotAllowed,
    xml as xmlResponse,
} from '@proxy-sso/shared';
import {
    BINDINGS,
    DEFAULTS,
    SAML_NAMESPACES,
} from './constants';
import { ConfigError, toErrorResponse } from './errors';
import { loadRuntime } from './runtime';
import type { RuntimeResolver } from './runtime';
import { signXml } from './signature';
import type { SamlSettings } from './types';
import {
    attr,
    childElements,
    escapeXml,
    parseInstant,
    parseXml,
    textOf,
    toSamlInstant,
} from './xml';

const MD = SAML_NAMESPACES.METADATA;

export interface MetadataOptions {
    /** Clock override for tests */
    now?: Date;
    /** EntityDescriptor ID override for tests */
    id?: string;
}

// =============================================================================
// Generation
// =============================================================================

/**
 * Base64 body of a PEM certificate.
 */
export function certificateBody(pem: string): string {
    return pem
        .replace(/-----BEGIN CERTIFICATE-----/g, '')
        .replace(/-----END CERTIFICATE-----/g, '')
        .replace(/\s+/g, '');
}

/**
 * Generate unsigned SP metadata.
 */
export function generateSpMetadata(settings: SamlSettings, options: MetadataOptions = {}): string {
    const { sp, security } = settings;
    const now = options.now ?? new Date();
    const validUntil = toSamlInstant(new Date(now.getTime() + DEFAULTS.METADATA_VALID_SECONDS * 1000));
    const id = options.id ?? generateSamlId();

    const keyDescriptor = sp.certificate
        ? '<md:KeyDescriptor use="signing">' +
            `<ds:KeyInfo xmlns:ds="${SAML_NAMESPACES.DSIG}">` +
            `<ds:X509Data><ds:X509Certificate>${certificateBody(sp.certificate)}</ds:X509Certificate></ds:X509Data>` +
            '</ds:KeyInfo>' +
            '</md:KeyDescriptor>'
        : '';

    return (
        '<?xml version="1.0" encoding="UTF-8"?>' +
        `<md:EntityDescriptor xmlns:md="${MD}"` +
        ` ID="${escapeXml(id)}"` +
        ` entityID="${escapeXml(sp.entityId)}"` +
        ` validUntil="${validUntil}"` +
        ` cacheDuration="${DEFAULTS.METADATA_CACHE_DURATION}">` +
        '<md:SPSSODescriptor' +
        ` AuthnRequestsSigned="${security.signRequests}"` +
        ` WantAssertionsSigned="${security.requireSignedAssertions}"` +
        ` protocolSupportEnumeration="${SAML_NAMESPACES.PROTOCOL}">` +
        keyDescriptor +
        `<md:NameIDFormat>${escapeXml(sp.nameIdFormat)}</md:NameIDFormat>` +
        '<md:AssertionConsumerService' +
        ` Binding="${BINDINGS.HTTP_POST}"` +
        ` Location="${escapeXml(sp.acsUrl)}"` +
        ' index="1"/>' +
        '</md:SPSSODescriptor>' +
        '</md:EntityDescriptor>'
    );
}

// =============================================================================
// Self-Validation
// =============================================================================

/**
 * Structural check of SP metadata.
 *
 * @returns Error codes; empty when the document is usable
 */
export function validateSpMetadata(metadata: string, now: Date = new Date()): string[] {
    let doc: Document;
    try {
        doc = parseXml(metadata);
    } catch {
        return ['invalid_xml'];
    }

    const root = doc.documentElement;
    if (root.namespaceURI !== MD || root.localName !== 'EntityDescriptor') {
        return ['noEntityDescriptor_xml'];
    }

    const errors: string[] = [];

    if (!attr(root, 'entityID')) {
        errors.push('entityId_missing');
    }

    const descriptors = childElements(root, MD, 'SPSSODescriptor');
    const otherRoles = childElements(root, MD).filter(el => el.localName.endsWith('Descriptor') && el.localName !== 'SPSSODescriptor');

    if (descriptors.length === 0) {
        errors.push('noSPSSODescriptor');
    } else if (descriptors.length > 1 || otherRoles.length > 0) {
        errors.push('onlyspssodescriptor_allowed');
    } else {
        const descriptor = descriptors[0];
        const acs = childElements(descriptor, MD, 'AssertionConsumerService');
        if (acs.length === 0 || acs.some(el => !attr(el, 'Location') || !attr(el, 'Binding'))) {
            errors.push('noAssertionConsumerService');
        }
        const nameIdFormats = childElements(descriptor, MD, 'NameIDFormat').map(el => textOf(el));
        if (nameIdFormats.length === 0 || nameIdFormats.some(format => format === undefined)) {
            errors.push('noNameIDFormat');
        }
    }

    const validUntil = attr(root, 'validUntil');
    if (validUntil !== undefined) {
        try {
            if (parseInstant(validUntil) <= now.getTime()) {
                errors.push('expired_xml');
            }
        } catch {
            errors.push('invalid_validUntil');
        }
    }

    return errors;
}

/**
 * Generate, sign when an SP key exists, and self-validate SP metadata.
 *
 * @throws ConfigError (field `saml_metadata`) when the result fails validation
 */
export function getSpMetadata(settings: SamlSettings, options: MetadataOptions = {}): string {
    const { sp, security } = settings;
    const id = options.id ?? generateSamlId();
    let metadata = generateSpMetadata(settings, { ...options, id });

    if (sp.privateKey && sp.certificate) {
        metadata = signXml(metadata, {
            privateKey: sp.privateKey,
            certificate: sp.certificate,
            referenceId: id,
            signatureAlgorithm: security.signatureAlgorithm,
            digestAlgorithm: security.digestAlgorithm,
        });
    }

    const errors = validateSpMetadata(metadata, options.now);
    if (errors.length > 0) {
        throw new ConfigError('saml_metadata', ErrorMessages.INVALID_METADATA(errors.join(', ')));
    }

    return metadata;
}

// =============================================================================
// Lambda Handler
// =============================================================================

export function createMetadataHandler(resolveRuntime: RuntimeResolver = loadRuntime) {
    return async (
        event: APIGatewayProxyEventV2,
        context: Context
    ): Promise<APIGatewayProxyResultV2> => {
        const log = createLogger(event, context);

        if (event.requestContext.http.method !== 'GET') {
            return methodNotAllowed();
        }

        try {
            const { settings } = resolveRuntime();
            const metadata = getSpMetadata(settings);

            log.info('Returning SP metadata', {
                entityId: settings.sp.entityId,
                signed: settings.sp.privateKey !== undefined,
            });

            return xmlResponse(metadata);
        } catch (err) {
            log.error('SAML metadata error', {
                error: err instanceof Error ? err.message : String(err),
                ...(err instanceof ConfigError && { field: err.field }),
            });
            return toErrorResponse(err);
        }
    };
}

export const handler = createMetadataHandler();
