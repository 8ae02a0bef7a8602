/**
 * MAP-01: Attribute Mapper
 *
 * Validates mapping of NameID and attribute values onto the canonical
 * identity, including every fallback.
 */

import { describe, it, expect } from 'vitest';
import { firstValue, mapIdentity, validateResponse } from '@proxy-sso/auth-saml';
import type { Assertion } from '@proxy-sso/auth-saml';
import { NOW, testSettings } from '../../support/fixtures';
import { createSignedResponse, encodeResponse } from '../../support/saml';

function assertionWith(attributes: Record<string, string[]>, nameId = 'user@example.test'): Assertion {
  return {
    id: '_a1',
    issuer: 'https://idp.example.test/metadata',
    issueInstant: '2026-03-01T12:00:00Z',
    subject: { nameId },
    conditions: { audiences: [] },
    authn: { authnInstant: '2026-03-01T12:00:00Z' },
    attributes,
    responseId: '_r1',
    signedBy: 'assertion',
  };
}

describe('MAP-01: Attribute Mapper', () => {
  const names = testSettings().attributes;

  describe('mapIdentity', () => {
    it('should map a validated assertion end to end', () => {
      const samlResponse = encodeResponse(createSignedResponse({
        attributes: { email: ['a@b.com'], firstName: ['A'], lastName: ['B'] },
      }));

      const identity = mapIdentity(validateResponse(samlResponse, testSettings(), { now: NOW }), names);

      expect(identity).toEqual({
        id: 'a@b.com',
        email: 'a@b.com',
        firstName: 'A',
        lastName: 'B',
        displayName: 'A B',
        provider: 'saml',
        teamIds: [],
      });
    });

    it('should fall back to the NameID when attributes are absent', () => {
      expect(mapIdentity(assertionWith({}), names)).toEqual({
        id: 'user@example.test',
        email: 'user@example.test',
        displayName: 'user@example.test',
        provider: 'saml',
        teamIds: [],
      });
    });

    it('should prefer an explicit display name', () => {
      const identity = mapIdentity(assertionWith({
        firstName: ['Ada'],
        lastName: ['Lovelace'],
        displayName: ['Countess'],
      }), names);

      expect(identity.displayName).toBe('Countess');
    });

    it('should use the email as display name when only one name part is present', () => {
      const identity = mapIdentity(assertionWith({ email: ['ada@example.test'], firstName: ['Ada'] }), names);

      expect(identity.firstName).toBe('Ada');
      expect(identity.lastName).toBeUndefined();
      expect(identity.displayName).toBe('ada@example.test');
    });

    it('should take the first value of a multi-valued attribute', () => {
      const identity = mapIdentity(assertionWith({ email: ['primary@example.test', 'alias@example.test'] }), names);

      expect(identity.email).toBe('primary@example.test');
    });

    it('should honour configured attribute names', () => {
      const custom = testSettings({
        SAML_USER_ID_ATTRIBUTE: 'uid',
        SAML_USER_EMAIL_ATTRIBUTE: 'mail',
        SAML_USER_FIRST_NAME_ATTRIBUTE: 'givenName',
        SAML_USER_LAST_NAME_ATTRIBUTE: 'sn',
      }).attributes;

      const identity = mapIdentity(assertionWith({
        uid: ['u-42'],
        mail: ['grace@example.test'],
        givenName: ['Grace'],
        sn: ['Hopper'],
      }), custom);

      expect(identity).toEqual({
        id: 'u-42',
        email: 'grace@example.test',
        firstName: 'Grace',
        lastName: 'Hopper',
        displayName: 'Grace Hopper',
        provider: 'saml',
        teamIds: [],
      });
    });
  });

  describe('firstValue', () => {
    it('should treat an empty value as absent', () => {
      expect(firstValue({ email: [''] }, 'email')).toBeUndefined();
    });

    it('should treat an empty value list as absent', () => {
      expect(firstValue({ email: [] }, 'email')).toBeUndefined();
    });

    it('should ignore inherited property names', () => {
      expect(firstValue({}, 'constructor')).toBeUndefined();
    });
  });
});
