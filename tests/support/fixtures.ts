/**
 * Test Fixtures
 *
 * Throwaway RSA key pairs and the settings every spec starts from.
 * - idp: signs test Responses; its certificate is configured as the IdP's
 * - sp: SP signing pair for request and metadata signing
 * - rogue: a key the SP has never seen
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { buildSettings } from '@proxy-sso/auth-saml';
import type { EnvSource, SamlSettings } from '@proxy-sso/auth-saml';

function readFixture(name: string): string {
  return readFileSync(join(__dirname, '..', 'fixtures', name), 'utf-8');
}

export const IDP_KEY = readFixture('idp-key.pem');
export const IDP_CERT = readFixture('idp-cert.pem');
export const SP_KEY = readFixture('sp-key.pem');
export const SP_CERT = readFixture('sp-cert.pem');
export const ROGUE_KEY = readFixture('rogue-key.pem');
export const ROGUE_CERT = readFixture('rogue-cert.pem');

export const IDP_ENTITY_ID = 'https://idp.example.test/metadata';
export const IDP_SSO_URL = 'https://idp.example.test/sso';
export const SP_BASE_URL = 'https://proxy.example.test';
export const ACS_URL = `${SP_BASE_URL}/sso/saml/acs`;
export const SP_ENTITY_ID = `${SP_BASE_URL}/sso/saml/metadata`;

/** Fixed clock for specs that pass `now` explicitly */
export const NOW = new Date('2026-03-01T12:00:00Z');

/**
 * Minimal valid configuration: the four required variables.
 */
export function baseEnv(overrides: Record<string, string | undefined> = {}): EnvSource {
  return {
    SAML_IDP_ENTITY_ID: IDP_ENTITY_ID,
    SAML_IDP_SSO_URL: IDP_SSO_URL,
    SAML_IDP_X509_CERT: IDP_CERT,
    PROXY_BASE_URL: SP_BASE_URL,
    ...overrides,
  };
}

export function testSettings(overrides: Record<string, string | undefined> = {}): Readonly<SamlSettings> {
  return buildSettings(baseEnv(overrides));
}
