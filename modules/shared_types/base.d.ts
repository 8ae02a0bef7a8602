/**
 * SAML SSO - Base DynamoDB Schema Types
 *
 * Foundation interfaces for the single-table layout shared by the
 * SSO Lambdas. All persisted entities extend BaseItem.
 *
 * Key Design:
 * - PK (Partition Key): Entity-specific prefix pattern (e.g., AUTHN_REQUEST#<id>)
 * - SK (Sort Key): Entity type identifier
 *
 * TTL Strategy:
 * - Pending AuthnRequests live only as long as a login attempt may take
 *
 * @see https://docs.aws.amazon.com/amazondynamodb/latest/developerguide/TTL.html
 */

// =============================================================================
// Key Values
// =============================================================================

/** Sort Key values */
export type SKValue = 'METADATA';

// =============================================================================
// Entity Type Discriminators
// =============================================================================

export type EntityType = 'SAML_AUTHN_REQUEST';

// =============================================================================
// Base Item Interface
// =============================================================================

/**
 * Base interface for all DynamoDB items.
 */
export interface BaseItem {
    /** Partition Key - Entity-specific prefix pattern */
    PK: string;
    /** Sort Key - Entity type identifier */
    SK: SKValue;
    /** TTL for automatic expiration (Unix epoch seconds) */
    ttl?: number;
    /** Entity type discriminator for type guards */
    entityType: EntityType;
    /** ISO 8601 creation timestamp */
    createdAt: string;
}
