/**
 * SAML Strategy - Attribute Mapper
 *
 * Maps a validated assertion onto the proxy's canonical identity.
 * Pure; missing attributes fall back rather than fail.
 *
 * Fallbacks:
 * - id, email: NameID
 * - displayName: "first last" when both are present, otherwise email
 */

import { AuthMethods } from '@proxy-sso/shared';
import type { Assertion, AttributeNameConfig, CanonicalIdentity } from './types';

/**
 * First value of a SAML attribute. An empty value counts as absent.
 */
export function firstValue(
    attributes: Readonly<Record<string, readonly string[]>>,
    name: string
): string | undefined {
    if (!Object.prototype.hasOwnProperty.call(attributes, name)) {
        return undefined;
    }
    const value = attributes[name][0];
    return value ? value : undefined;
}

export function mapIdentity(assertion: Assertion, names: AttributeNameConfig): CanonicalIdentity {
    const nameId = assertion.subject.nameId;
    const attributes = assertion.attributes;

    const id = firstValue(attributes, names.id) ?? nameId;
    const email = firstValue(attributes, names.email) ?? nameId;
    const firstName = firstValue(attributes, names.firstName);
    const lastName = firstValue(attributes, names.lastName);

    const displayName = firstValue(attributes, names.displayName)
        ?? (firstName !== undefined && lastName !== undefined ? `${firstName} ${lastName}` : email);

    return {
        id,
        email,
        ...(firstName !== undefined && { firstName }),
        ...(lastName !== undefined && { lastName }),
        displayName,
        provider: AuthMethods.SAML,
        teamIds: [],
    };
}
