/**
 * SAML Test Helpers
 *
 * A stand-in IdP: builds SAML Responses around a fixed clock and signs
 * them with xml-crypto the way an IdP would.
 */

import { SignedXml } from 'xml-crypto';
import type {
  APIGatewayProxyEventV2,
  APIGatewayProxyResultV2,
  APIGatewayProxyStructuredResultV2,
  Context,
} from 'aws-lambda';
import {
  ACS_URL,
  IDP_ENTITY_ID,
  IDP_KEY,
  NOW,
  SP_ENTITY_ID,
} from './fixtures';

const EXC_C14N = 'http://www.w3.org/2001/10/xml-exc-c14n#';
const ENVELOPED = 'http://www.w3.org/2000/09/xmldsig#enveloped-signature';
const RSA_SHA256 = 'http://www.w3.org/2001/04/xmldsig-more#rsa-sha256';
const SHA256 = 'http://www.w3.org/2001/04/xmlenc#sha256';

export const SUCCESS = 'urn:oasis:names:tc:SAML:2.0:status:Success';

// =============================================================================
// Response Builder
// =============================================================================

export interface TestResponseOptions {
  /** Clock the timestamps are relative to (default: NOW) */
  now?: Date;
  nameId?: string;
  audience?: string;
  /** Assertion issuer */
  issuer?: string;
  /** Response issuer (default: same as issuer) */
  responseIssuer?: string;
  inResponseTo?: string;
  destination?: string;
  recipient?: string;
  /** Conditions NotBefore offset in seconds (default: -60) */
  notBeforeOffset?: number;
  /** Conditions NotOnOrAfter offset in seconds (default: 300) */
  notOnOrAfterOffset?: number;
  /** Bearer SubjectConfirmationData NotOnOrAfter offset (default: 300) */
  subjectNotOnOrAfterOffset?: number;
  /** AuthnStatement SessionNotOnOrAfter offset (default: omitted) */
  sessionNotOnOrAfterOffset?: number;
  statusCode?: string;
  attributes?: Record<string, string[]>;
  includeAuthnStatement?: boolean;
  includeAttributeStatement?: boolean;
  assertionId?: string;
  responseId?: string;
}

export const ASSERTION_ID = '_assertion-0001';
export const RESPONSE_ID = '_response-0001';

function iso(base: Date, offsetSeconds: number): string {
  return new Date(base.getTime() + offsetSeconds * 1000).toISOString();
}

function escapeXml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/**
 * Build an unsigned SAML Response.
 */
export function buildResponseXml(options: TestResponseOptions = {}): string {
  const now = options.now ?? NOW;
  const issuer = options.issuer ?? IDP_ENTITY_ID;
  const responseIssuer = options.responseIssuer ?? issuer;
  const nameId = options.nameId ?? 'alice@example.test';
  const assertionId = options.assertionId ?? ASSERTION_ID;
  const responseId = options.responseId ?? RESPONSE_ID;
  const attributes = options.attributes ?? { email: ['alice@example.test'] };

  const inResponseTo = options.inResponseTo !== undefined
    ? ` InResponseTo="${escapeXml(options.inResponseTo)}"`
    : '';

  const attributesXml = Object.entries(attributes)
    .map(([name, values]) =>
      `<saml:Attribute Name="${escapeXml(name)}">` +
      values.map(value => `<saml:AttributeValue>${escapeXml(value)}</saml:AttributeValue>`).join('') +
      '</saml:Attribute>')
    .join('');

  const attributeStatement = options.includeAttributeStatement === false
    ? ''
    : `<saml:AttributeStatement>${attributesXml}</saml:AttributeStatement>`;

  const sessionEnd = options.sessionNotOnOrAfterOffset !== undefined
    ? ` SessionNotOnOrAfter="${iso(now, options.sessionNotOnOrAfterOffset)}"`
    : '';

  const authnStatement = options.includeAuthnStatement === false
    ? ''
    : `<saml:AuthnStatement AuthnInstant="${iso(now, -5)}" SessionIndex="_session-0001"${sessionEnd}>` +
      '<saml:AuthnContext>' +
      '<saml:AuthnContextClassRef>urn:oasis:names:tc:SAML:2.0:ac:classes:PasswordProtectedTransport</saml:AuthnContextClassRef>' +
      '</saml:AuthnContext>' +
      '</saml:AuthnStatement>';

  const assertion = `<saml:Assertion xmlns:saml="urn:oasis:names:tc:SAML:2.0:assertion" ID="${assertionId}" IssueInstant="${iso(now, 0)}" Version="2.0">
    <saml:Issuer>${escapeXml(issuer)}</saml:Issuer>
    <saml:Subject>
      <saml:NameID Format="urn:oasis:names:tc:SAML:1.1:nameid-format:emailAddress">${escapeXml(nameId)}</saml:NameID>
      <saml:SubjectConfirmation Method="urn:oasis:names:tc:SAML:2.0:cm:bearer">
        <saml:SubjectConfirmationData NotOnOrAfter="${iso(now, options.subjectNotOnOrAfterOffset ?? 300)}" Recipient="${escapeXml(options.recipient ?? ACS_URL)}"${inResponseTo}/>
      </saml:SubjectConfirmation>
    </saml:Subject>
    <saml:Conditions NotBefore="${iso(now, options.notBeforeOffset ?? -60)}" NotOnOrAfter="${iso(now, options.notOnOrAfterOffset ?? 300)}">
      <saml:AudienceRestriction>
        <saml:Audience>${escapeXml(options.audience ?? SP_ENTITY_ID)}</saml:Audience>
      </saml:AudienceRestriction>
    </saml:Conditions>
    ${authnStatement}
    ${attributeStatement}
  </saml:Assertion>`;

  return `<?xml version="1.0" encoding="UTF-8"?>
<samlp:Response xmlns:samlp="urn:oasis:names:tc:SAML:2.0:protocol" ID="${responseId}" Version="2.0" IssueInstant="${iso(now, 0)}" Destination="${escapeXml(options.destination ?? ACS_URL)}"${inResponseTo}>
  <saml:Issuer xmlns:saml="urn:oasis:names:tc:SAML:2.0:assertion">${escapeXml(responseIssuer)}</saml:Issuer>
  <samlp:Status>
    <samlp:StatusCode Value="${escapeXml(options.statusCode ?? SUCCESS)}"/>
  </samlp:Status>
  ${assertion}
</samlp:Response>`;
}

// =============================================================================
// Signing
// =============================================================================

export interface SignOptions {
  privateKey?: string;
  signatureAlgorithm?: string;
  digestAlgorithm?: string;
}

/**
 * Add an enveloped signature as the first child of the element with `id`.
 */
export function signElement(xml: string, id: string, options: SignOptions = {}): string {
  const xpath = `//*[@ID='${id}']`;

  const sig = new SignedXml({
    privateKey: options.privateKey ?? IDP_KEY,
    canonicalizationAlgorithm: EXC_C14N,
    signatureAlgorithm: options.signatureAlgorithm ?? RSA_SHA256,
  });

  sig.addReference({
    xpath,
    transforms: [ENVELOPED, EXC_C14N],
    digestAlgorithm: options.digestAlgorithm ?? SHA256,
  });

  sig.computeSignature(xml, {
    location: { reference: xpath, action: 'prepend' },
  });

  return sig.getSignedXml();
}

export interface SignedResponseOptions extends TestResponseOptions, SignOptions {
  /** Sign the Assertion (default: true) */
  signAssertion?: boolean;
  /** Sign the Response (default: false) */
  signResponse?: boolean;
}

/**
 * Build a Response and sign it; the Assertion first, then the Response.
 */
export function createSignedResponse(options: SignedResponseOptions = {}): string {
  let xml = buildResponseXml(options);

  if (options.signAssertion !== false) {
    xml = signElement(xml, options.assertionId ?? ASSERTION_ID, options);
  }
  if (options.signResponse) {
    xml = signElement(xml, options.responseId ?? RESPONSE_ID, options);
  }

  return xml;
}

/**
 * Base64 for the HTTP-POST binding.
 */
export function encodeResponse(xml: string): string {
  return Buffer.from(xml, 'utf-8').toString('base64');
}

// =============================================================================
// Lambda Events
// =============================================================================

export function createEvent(
  method: string,
  path: string,
  overrides: Partial<APIGatewayProxyEventV2> = {}
): APIGatewayProxyEventV2 {
  return {
    version: '2.0',
    routeKey: `${method} ${path}`,
    rawPath: path,
    rawQueryString: '',
    headers: { 'x-forwarded-for': '192.0.2.10', 'user-agent': 'vitest' },
    isBase64Encoded: false,
    requestContext: {
      accountId: '123456789012',
      apiId: 'test-api',
      domainName: 'proxy.example.test',
      domainPrefix: 'proxy',
      http: {
        method,
        path,
        protocol: 'HTTP/1.1',
        sourceIp: '192.0.2.10',
        userAgent: 'vitest',
      },
      requestId: 'test-request-id',
      routeKey: `${method} ${path}`,
      stage: '$default',
      time: '01/Mar/2026:12:00:00 +0000',
      timeEpoch: NOW.getTime(),
    },
    ...overrides,
  };
}

export function formBody(fields: Record<string, string>): string {
  return new URLSearchParams(fields).toString();
}

export const lambdaContext: Context = {
  callbackWaitsForEmptyEventLoop: false,
  functionName: 'saml-test',
  functionVersion: '$LATEST',
  invokedFunctionArn: 'arn:aws:lambda:us-east-1:123456789012:function:saml-test',
  memoryLimitInMB: '128',
  awsRequestId: 'test-aws-request-id',
  logGroupName: '/aws/lambda/saml-test',
  logStreamName: 'test-stream',
  getRemainingTimeInMillis: () => 30000,
  done: () => undefined,
  fail: () => undefined,
  succeed: () => undefined,
};

/**
 * Narrow a handler result to the structured form the handlers return.
 */
export function structured(result: APIGatewayProxyResultV2): APIGatewayProxyStructuredResultV2 {
  if (typeof result === 'string') {
    throw new Error('Expected a structured Lambda result');
  }
  return result;
}
