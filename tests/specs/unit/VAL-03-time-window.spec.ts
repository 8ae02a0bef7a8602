/**
 * VAL-03: Time Window
 *
 * Validates NotBefore / NotOnOrAfter handling with the configured clock
 * skew, on Conditions, on the bearer SubjectConfirmationData and on the
 * AuthnStatement SessionNotOnOrAfter.
 */

import { describe, it, expect } from 'vitest';
import { validateResponse } from '@proxy-sso/auth-saml';
import { NOW, testSettings } from '../../support/fixtures';
import { validationErrorFrom } from '../../support/errors';
import { ASSERTION_ID, createSignedResponse, encodeResponse } from '../../support/saml';

describe('VAL-03: Time Window', () => {
  const settings = testSettings();

  it('should reject an assertion whose NotOnOrAfter is in the past', () => {
    const samlResponse = encodeResponse(createSignedResponse({ notOnOrAfterOffset: -600 }));

    const err = validationErrorFrom(() => validateResponse(samlResponse, settings, { now: NOW }));

    expect(err.kind).toBe('Expired');
    expect(err.message).toBe('Assertion has expired');
  });

  it('should reject an assertion that is not yet valid', () => {
    const samlResponse = encodeResponse(createSignedResponse({ notBeforeOffset: 600 }));

    const err = validationErrorFrom(() => validateResponse(samlResponse, settings, { now: NOW }));

    expect(err.kind).toBe('Expired');
    expect(err.message).toBe('Assertion is not yet valid');
  });

  it('should tolerate drift inside the clock skew', () => {
    const samlResponse = encodeResponse(createSignedResponse({
      notBeforeOffset: 120,
      notOnOrAfterOffset: -120,
    }));

    expect(validateResponse(samlResponse, settings, { now: NOW }).id).toBe(ASSERTION_ID);
  });

  it('should apply a configured clock skew', () => {
    const tight = testSettings({ SAML_CLOCK_SKEW_SECONDS: '60' });
    const samlResponse = encodeResponse(createSignedResponse({ notOnOrAfterOffset: -120 }));

    const err = validationErrorFrom(() => validateResponse(samlResponse, tight, { now: NOW }));

    expect(err.kind).toBe('Expired');
  });

  it('should treat NotOnOrAfter as exclusive', () => {
    const noSkew = testSettings({ SAML_CLOCK_SKEW_SECONDS: '0' });
    const samlResponse = encodeResponse(createSignedResponse({ notOnOrAfterOffset: 0 }));

    const err = validationErrorFrom(() => validateResponse(samlResponse, noSkew, { now: NOW }));

    expect(err.message).toBe('Assertion has expired');
  });

  it('should reject an expired bearer subject confirmation', () => {
    const samlResponse = encodeResponse(createSignedResponse({ subjectNotOnOrAfterOffset: -600 }));

    const err = validationErrorFrom(() => validateResponse(samlResponse, settings, { now: NOW }));

    expect(err.kind).toBe('Expired');
    expect(err.message).toBe('Subject confirmation has expired');
  });

  it('should reject an authentication session that has ended', () => {
    const samlResponse = encodeResponse(createSignedResponse({ sessionNotOnOrAfterOffset: -600 }));

    const err = validationErrorFrom(() => validateResponse(samlResponse, settings, { now: NOW }));

    expect(err.kind).toBe('Expired');
    expect(err.message).toBe('Authentication session has expired');
  });

  it('should accept a SessionNotOnOrAfter inside the clock skew', () => {
    const samlResponse = encodeResponse(createSignedResponse({ sessionNotOnOrAfterOffset: -120 }));

    const assertion = validateResponse(samlResponse, settings, { now: NOW });

    expect(assertion.id).toBe(ASSERTION_ID);
  });

  it('should check signatures before the time window', () => {
    const samlResponse = encodeResponse(createSignedResponse({ signAssertion: false, notOnOrAfterOffset: -600 }));

    const err = validationErrorFrom(() => validateResponse(samlResponse, settings, { now: NOW }));

    expect(err.kind).toBe('SignatureInvalid');
  });
});
