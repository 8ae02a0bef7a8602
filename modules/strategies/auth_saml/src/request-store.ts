/**
 * SAML Strategy - Request-ID Store
 *
 * Remembers issued AuthnRequest IDs so the ACS accepts each Response
 * once, and only in answer to a request this SP sent. Entries expire
 * after DEFAULTS.REQUEST_TTL_SECONDS.
 *
 * - DynamoRequestIdStore: shared across Lambda instances; conditional
 *   delete makes consumption atomic
 * - InMemoryRequestIdStore: single process (local runs, tests)
 */

import type { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { storage } from '@proxy-sso/shared';
import { DEFAULTS } from './constants';

export interface PendingRequest {
    requestId: string;
    idpEntityId: string;
    relayState?: string;
    /** Unix epoch seconds */
    expiresAt: number;
}

export interface RememberOptions {
    idpEntityId: string;
    relayState?: string;
    /** Clock override for tests */
    now?: Date;
}

export interface RequestIdStore {
    remember(requestId: string, options: RememberOptions): Promise<void>;
    /**
     * Remove and return the pending request. Resolves null when the ID is
     * unknown, already consumed or expired.
     */
    consume(requestId: string, now?: Date): Promise<PendingRequest | null>;
}

function epochSeconds(date: Date): number {
    return Math.floor(date.getTime() / 1000);
}

function toPending(requestId: string, options: RememberOptions, ttlSeconds: number): PendingRequest {
    return {
        requestId,
        idpEntityId: options.idpEntityId,
        ...(options.relayState !== undefined && { relayState: options.relayState }),
        expiresAt: epochSeconds(options.now ?? new Date()) + ttlSeconds,
    };
}

// =============================================================================
// In-Memory Store
// =============================================================================

export class InMemoryRequestIdStore implements RequestIdStore {
    private readonly pending = new Map<string, PendingRequest>();

    constructor(private readonly ttlSeconds: number = DEFAULTS.REQUEST_TTL_SECONDS) {}

    async remember(requestId: string, options: RememberOptions): Promise<void> {
        const now = options.now ?? new Date();
        this.evictExpired(epochSeconds(now));
        this.pending.set(requestId, toPending(requestId, { ...options, now }, this.ttlSeconds));
    }

    async consume(requestId: string, now: Date = new Date()): Promise<PendingRequest | null> {
        const entry = this.pending.get(requestId);
        if (!entry) {
            return null;
        }
        this.pending.delete(requestId);
        return entry.expiresAt > epochSeconds(now) ? entry : null;
    }

    get size(): number {
        return this.pending.size;
    }

    private evictExpired(nowSeconds: number): void {
        for (const [requestId, entry] of this.pending) {
            if (entry.expiresAt <= nowSeconds) {
                this.pending.delete(requestId);
            }
        }
    }
}

// =============================================================================
// DynamoDB Store
// =============================================================================

export class DynamoRequestIdStore implements RequestIdStore {
    constructor(
        private readonly client: DynamoDBDocumentClient,
        private readonly tableName: string,
        private readonly ttlSeconds: number = DEFAULTS.REQUEST_TTL_SECONDS
    ) {}

    async remember(requestId: string, options: RememberOptions): Promise<void> {
        await storage.savePendingAuthnRequest(
            this.client,
            this.tableName,
            toPending(requestId, options, this.ttlSeconds)
        );
    }

    async consume(requestId: string, now: Date = new Date()): Promise<PendingRequest | null> {
        const item = await storage.consumePendingAuthnRequest(
            this.client,
            this.tableName,
            requestId,
            epochSeconds(now)
        );

        if (!item) {
            return null;
        }

        return {
            requestId: item.requestId,
            idpEntityId: item.idpEntityId,
            ...(item.relayState !== undefined && { relayState: item.relayState }),
            expiresAt: item.ttl,
        };
    }
}
