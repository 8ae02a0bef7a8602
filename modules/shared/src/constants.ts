/**
 * SAML SSO - Shared Constants
 *
 * DynamoDB entity discriminators, key prefixes and auth method identifiers.
 */

// =============================================================================
// Entity Types (DynamoDB Single Table Design)
// =============================================================================

export const EntityTypes = {
    SAML_AUTHN_REQUEST: 'SAML_AUTHN_REQUEST',
} as const;

export type EntityType = typeof EntityTypes[keyof typeof EntityTypes];

/**
 * Partition key prefixes.
 */
export const KeyPrefixes = {
    AUTHN_REQUEST: 'AUTHN_REQUEST#',
} as const;

/** Sort key used by every item in the table */
export const METADATA_SK = 'METADATA' as const;

// =============================================================================
// Authentication Methods
// =============================================================================

export const AuthMethods = {
    SAML: 'saml',
} as const;

export type AuthMethod = typeof AuthMethods[keyof typeof AuthMethods];
