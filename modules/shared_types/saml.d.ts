/**
 * SAML SSO - Pending AuthnRequest Entity
 *
 * One item per outstanding SP-initiated login. The ACS handler deletes it
 * when the matching Response arrives, so each request ID is accepted once.
 *
 * Key Pattern:
 *   PK: AUTHN_REQUEST#<request_id>
 *   SK: METADATA
 *
 * @see SAML 2.0 Core Specification, Section 3.2.2 (InResponseTo)
 */

import type { BaseItem } from './base';

export interface PendingAuthnRequestItem extends BaseItem {
    PK: `AUTHN_REQUEST#${string}`;
    SK: 'METADATA';
    entityType: 'SAML_AUTHN_REQUEST';

    /** AuthnRequest ID, echoed by the IdP as InResponseTo */
    requestId: string;

    /** IdP the request was sent to */
    idpEntityId: string;

    /** RelayState sent alongside the request, if any */
    relayState?: string;

    /** Expiry (Unix epoch seconds), also the DynamoDB TTL attribute */
    ttl: number;
}
