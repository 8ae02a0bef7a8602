/**
 * SAML SSO - Type Guards
 *
 * Runtime type guards for DynamoDB entity discrimination.
 * Items read back from DynamoDB are untyped records; each guard checks
 * the discriminator, the key pattern and the fields the caller relies on.
 *
 * @see https://www.typescriptlang.org/docs/handbook/2/narrowing.html#using-type-predicates
 */

import type { PendingAuthnRequestItem } from '../../shared_types/saml';
import { EntityTypes, KeyPrefixes, METADATA_SK } from './constants';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

/**
 * Check if a record is a PendingAuthnRequestItem.
 * Key Pattern: PK=AUTHN_REQUEST#<request_id>, SK=METADATA
 */
export function isPendingAuthnRequestItem(item: unknown): item is PendingAuthnRequestItem {
    if (!isRecord(item)) {
        return false;
    }

    return (
        item.entityType === EntityTypes.SAML_AUTHN_REQUEST &&
        typeof item.PK === 'string' &&
        item.PK.startsWith(KeyPrefixes.AUTHN_REQUEST) &&
        item.SK === METADATA_SK &&
        typeof item.requestId === 'string' &&
        typeof item.idpEntityId === 'string' &&
        typeof item.ttl === 'number' &&
        typeof item.createdAt === 'string' &&
        (item.relayState === undefined || typeof item.relayState === 'string')
    );
}
