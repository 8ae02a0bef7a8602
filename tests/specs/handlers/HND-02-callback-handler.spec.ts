/**
 * HND-02: ACS Callback Handler
 *
 * Validates POST /sso/saml/acs end to end: login, signed Response,
 * identity, replay defense and the error surface.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { APIGatewayProxyResultV2 } from 'aws-lambda';
import {
  ConfigError,
  InMemoryRequestIdStore,
  createCallbackHandler,
  createLoginHandler,
} from '@proxy-sso/auth-saml';
import type { SamlRuntime } from '@proxy-sso/auth-saml';
import { IDP_CERT, IDP_ENTITY_ID, ROGUE_KEY, testSettings } from '../../support/fixtures';
import {
  createEvent,
  createSignedResponse,
  encodeResponse,
  formBody,
  lambdaContext,
  structured,
} from '../../support/saml';
import type { SignedResponseOptions } from '../../support/saml';
import { locationOf, requestIdFromRedirect } from '../../support/flow';
import { findAudit, findLog, logRecords } from '../../support/logs';

const ALICE = {
  id: 'alice@example.test',
  email: 'alice@example.test',
  displayName: 'alice@example.test',
  provider: 'saml',
  teamIds: [],
};

function acsEvent(fields: Record<string, string>) {
  return createEvent('POST', '/sso/saml/acs', {
    headers: { 'content-type': 'application/x-www-form-urlencoded', 'x-forwarded-for': '192.0.2.10' },
    body: formBody(fields),
  });
}

function postedResponse(options: SignedResponseOptions = {}): string {
  return encodeResponse(createSignedResponse({ now: new Date(), ...options }));
}

function parsedBody(result: APIGatewayProxyResultV2): unknown {
  return JSON.parse(String(structured(result).body));
}

function logCalls(): unknown[][] {
  return vi.mocked(console.log).mock.calls;
}

describe('HND-02: ACS Callback Handler', () => {
  let runtime: SamlRuntime;

  beforeEach(() => {
    runtime = { settings: testSettings(), store: new InMemoryRequestIdStore() };
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const login = () => createLoginHandler(() => runtime);
  const callback = () => createCallbackHandler(() => runtime);

  async function startLogin(relayState?: string): Promise<string> {
    const event = createEvent('GET', '/sso/saml/login', {
      ...(relayState !== undefined && { queryStringParameters: { RelayState: relayState } }),
    });
    return requestIdFromRedirect(locationOf(await login()(event, lambdaContext)));
  }

  describe('successful login', () => {
    it('should return the identity and RelayState', async () => {
      const requestId = await startLogin('/ui/keys');

      const result = await callback()(acsEvent({
        SAMLResponse: postedResponse({ inResponseTo: requestId }),
        RelayState: '/ui/keys',
      }), lambdaContext);

      expect(structured(result).statusCode).toBe(200);
      expect(parsedBody(result)).toEqual({ identity: ALICE, relay_state: '/ui/keys' });
    });

    it('should return a null relay_state when none was posted', async () => {
      const requestId = await startLogin();

      const result = await callback()(acsEvent({
        SAMLResponse: postedResponse({ inResponseTo: requestId }),
      }), lambdaContext);

      expect(parsedBody(result)).toEqual({ identity: ALICE, relay_state: null });
    });

    it('should accept a base64 encoded form body', async () => {
      const requestId = await startLogin();
      const event = createEvent('POST', '/sso/saml/acs', {
        isBase64Encoded: true,
        body: Buffer.from(formBody({ SAMLResponse: postedResponse({ inResponseTo: requestId }) })).toString('base64'),
      });

      const result = structured(await callback()(event, lambdaContext));

      expect(result.statusCode).toBe(200);
    });

    it('should accept an unsolicited Response when no store is configured', async () => {
      runtime = { settings: testSettings(), store: null };

      const result = structured(await callback()(acsEvent({ SAMLResponse: postedResponse() }), lambdaContext));

      expect(result.statusCode).toBe(200);
    });

    it('should audit the successful login', async () => {
      const requestId = await startLogin();

      await callback()(acsEvent({ SAMLResponse: postedResponse({ inResponseTo: requestId }) }), lambdaContext);

      expect(findAudit(logCalls(), 'LOGIN_SUCCESS')?.details).toEqual({
        method: 'saml',
        email: 'alice@example.test',
        idpEntityId: IDP_ENTITY_ID,
      });
      expect(findLog(logCalls(), 'SAML authentication successful')?.data).toEqual({
        idpEntityId: IDP_ENTITY_ID,
        nameId: 'alice@example.test',
        signedBy: 'assertion',
      });
    });
  });

  describe('replay defense', () => {
    it('should reject a replayed Response', async () => {
      const requestId = await startLogin();
      const samlResponse = postedResponse({ inResponseTo: requestId });

      const first = structured(await callback()(acsEvent({ SAMLResponse: samlResponse }), lambdaContext));
      const second = await callback()(acsEvent({ SAMLResponse: samlResponse }), lambdaContext);

      expect(first.statusCode).toBe(200);
      expect(structured(second).statusCode).toBe(401);
      expect(parsedBody(second)).toEqual({
        kind: 'Malformed',
        message: 'Malformed: SAML Response does not answer an outstanding AuthnRequest',
        http_status: 401,
      });
    });

    it('should reject an unsolicited Response when a store is configured', async () => {
      const result = await callback()(acsEvent({ SAMLResponse: postedResponse() }), lambdaContext);

      expect(parsedBody(result)).toEqual({
        kind: 'Malformed',
        message: 'Malformed: Unsolicited Response: no InResponseTo',
        http_status: 401,
      });
    });

    it('should reject a Response to a request this SP never sent', async () => {
      const result = await callback()(acsEvent({
        SAMLResponse: postedResponse({ inResponseTo: '_forged-request' }),
      }), lambdaContext);

      expect(structured(result).statusCode).toBe(401);
    });
  });

  describe('RelayState binding', () => {
    it('should return the RelayState stored at login when none was posted', async () => {
      const requestId = await startLogin('/ui/');

      const result = await callback()(acsEvent({
        SAMLResponse: postedResponse({ inResponseTo: requestId }),
      }), lambdaContext);

      expect(parsedBody(result)).toEqual({ identity: ALICE, relay_state: '/ui/' });
    });

    it('should reject a posted RelayState that differs from the stored one', async () => {
      const requestId = await startLogin('/ui/');

      const result = await callback()(acsEvent({
        SAMLResponse: postedResponse({ inResponseTo: requestId }),
        RelayState: 'https://evil.example/',
      }), lambdaContext);

      expect(structured(result).statusCode).toBe(401);
      expect(parsedBody(result)).toEqual({
        kind: 'Malformed',
        message: 'Malformed: RelayState does not match the AuthnRequest',
        http_status: 401,
      });
    });

    it('should reject a posted RelayState when login stored none', async () => {
      const requestId = await startLogin();

      const result = await callback()(acsEvent({
        SAMLResponse: postedResponse({ inResponseTo: requestId }),
        RelayState: '/ui/keys',
      }), lambdaContext);

      expect(structured(result).statusCode).toBe(401);
    });

    it('should return the posted RelayState when no store is configured', async () => {
      runtime = { settings: testSettings(), store: null };

      const result = await callback()(acsEvent({
        SAMLResponse: postedResponse(),
        RelayState: '/ui/keys',
      }), lambdaContext);

      expect(parsedBody(result)).toEqual({ identity: ALICE, relay_state: '/ui/keys' });
    });
  });

  describe('failures', () => {
    it('should answer 400 without a SAMLResponse', async () => {
      const result = await callback()(acsEvent({ RelayState: '/ui' }), lambdaContext);

      expect(structured(result).statusCode).toBe(400);
      expect(parsedBody(result)).toEqual({
        kind: 'BadRequest',
        message: 'Missing SAMLResponse',
        http_status: 400,
      });
    });

    it('should answer 401 for a signature from another key', async () => {
      const requestId = await startLogin();

      const result = await callback()(acsEvent({
        SAMLResponse: postedResponse({ inResponseTo: requestId, privateKey: ROGUE_KEY }),
      }), lambdaContext);

      const body = parsedBody(result);
      expect(structured(result).statusCode).toBe(401);
      expect(body).toMatchObject({ kind: 'SignatureInvalid', http_status: 401 });
      expect(JSON.stringify(body).includes('SignatureInvalid: Assertion signature rejected')).toBe(true);
    });

    it('should log the rejection with the IdP, NameID and kind', async () => {
      await callback()(acsEvent({
        SAMLResponse: postedResponse({ privateKey: ROGUE_KEY, nameId: 'mallory@example.test' }),
      }), lambdaContext);

      expect(findLog(logCalls(), 'SAML response rejected')?.data).toMatchObject({
        kind: 'SignatureInvalid',
        idpEntityId: IDP_ENTITY_ID,
        nameId: 'mallory@example.test',
      });
      expect(findAudit(logCalls(), 'LOGIN_FAILURE')?.details).toEqual({
        method: 'saml',
        reason: 'SignatureInvalid',
        idpEntityId: IDP_ENTITY_ID,
      });
    });

    it('should never log certificate material', async () => {
      await callback()(acsEvent({ SAMLResponse: postedResponse({ privateKey: ROGUE_KEY }) }), lambdaContext);

      const certLine = IDP_CERT.split('\n')[1];
      const logged = logRecords(logCalls()).map(record => JSON.stringify(record));

      expect(logged.length).toBeGreaterThan(0);
      expect(logged.filter(line => line.includes(certLine))).toEqual([]);
    });

    it('should answer 401 for an expired assertion', async () => {
      const requestId = await startLogin();

      const result = await callback()(acsEvent({
        SAMLResponse: postedResponse({ inResponseTo: requestId, notOnOrAfterOffset: -900 }),
      }), lambdaContext);

      expect(parsedBody(result)).toEqual({
        kind: 'Expired',
        message: 'Expired: Assertion has expired',
        http_status: 401,
      });
    });

    it('should answer 500 for a configuration error', async () => {
      const broken = createCallbackHandler(() => {
        throw new ConfigError('SAML_IDP_X509_CERT', 'SAML_IDP_X509_CERT is required');
      });

      const result = await broken(acsEvent({ SAMLResponse: postedResponse() }), lambdaContext);

      expect(parsedBody(result)).toEqual({
        kind: 'ConfigError',
        message: 'SAML_IDP_X509_CERT is required',
        http_status: 500,
      });
    });

    it('should reject other methods', async () => {
      const result = structured(await callback()(createEvent('GET', '/sso/saml/acs'), lambdaContext));

      expect(result.statusCode).toBe(405);
    });
  });
});
