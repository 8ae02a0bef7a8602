/**
 * SAML SSO - Pending AuthnRequest Storage Operations
 *
 * DynamoDB operations backing the request-ID store used for replay defense.
 *
 * Key Pattern:
 *   PK: AUTHN_REQUEST#<request_id>
 *   SK: METADATA
 *
 * Lifecycle:
 *   1. Saved by the login handler when the AuthnRequest is issued
 *   2. Consumed (conditionally deleted) by the ACS handler when a Response
 *      with a matching InResponseTo arrives
 *   3. Left behind items expire through the table's TTL attribute
 *
 * @module storage/authn-request-operations
 */

import {
    DynamoDBDocumentClient,
    PutCommand,
    DeleteCommand,
} from '@aws-sdk/lib-dynamodb';
import type { PendingAuthnRequestItem } from '../../../shared_types/saml';
import { EntityTypes, KeyPrefixes, METADATA_SK } from '../constants';
import { isPendingAuthnRequestItem } from '../type-guards';
import { withRetry } from './retry';

export interface PendingAuthnRequest {
    requestId: string;
    idpEntityId: string;
    relayState?: string;
    /** Unix epoch seconds after which the request is no longer answerable */
    expiresAt: number;
}

function requestKey(requestId: string): { PK: `AUTHN_REQUEST#${string}`; SK: typeof METADATA_SK } {
    return {
        PK: `${KeyPrefixes.AUTHN_REQUEST}${requestId}`,
        SK: METADATA_SK,
    };
}

/**
 * Save an outstanding AuthnRequest.
 *
 * The condition rejects a second write under the same ID; IDs carry 160
 * random bits, so a collision means a bug rather than bad luck.
 */
export async function savePendingAuthnRequest(
    client: DynamoDBDocumentClient,
    tableName: string,
    request: PendingAuthnRequest
): Promise<void> {
    const item: PendingAuthnRequestItem = {
        ...requestKey(request.requestId),
        entityType: EntityTypes.SAML_AUTHN_REQUEST,
        requestId: request.requestId,
        idpEntityId: request.idpEntityId,
        ...(request.relayState !== undefined && { relayState: request.relayState }),
        ttl: request.expiresAt,
        createdAt: new Date().toISOString(),
    };

    await withRetry(async () => {
        return client.send(
            new PutCommand({
                TableName: tableName,
                Item: item,
                ConditionExpression: 'attribute_not_exists(PK)',
            })
        );
    });
}

/**
 * Atomically consume an outstanding AuthnRequest.
 *
 * The conditional delete succeeds for exactly one caller, so a replayed
 * Response finds nothing to consume. DynamoDB TTL deletion lags, so an
 * item past its expiry is treated as absent.
 *
 * @param nowSeconds - Current Unix time in seconds (default: now)
 * @returns The consumed item, or null if unknown, consumed or expired
 */
export async function consumePendingAuthnRequest(
    client: DynamoDBDocumentClient,
    tableName: string,
    requestId: string,
    nowSeconds = Math.floor(Date.now() / 1000)
): Promise<PendingAuthnRequestItem | null> {
    try {
        const result = await withRetry(async () => {
            return client.send(
                new DeleteCommand({
                    TableName: tableName,
                    Key: requestKey(requestId),
                    ConditionExpression: 'attribute_exists(PK)',
                    ReturnValues: 'ALL_OLD',
                })
            );
        });

        if (!isPendingAuthnRequestItem(result.Attributes)) {
            return null;
        }

        if (result.Attributes.ttl <= nowSeconds) {
            return null;
        }

        return result.Attributes;
    } catch (error) {
        if (error instanceof Error && error.name === 'ConditionalCheckFailedException') {
            return null;
        }
        throw error;
    }
}
