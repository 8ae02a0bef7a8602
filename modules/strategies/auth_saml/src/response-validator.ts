/**
 * SAML Strategy - Response Validator
 *
 * Validates a POST-bound SAML Response and extracts its assertion.
 * Checks run in a fixed order and the first failure throws; nothing is
 * returned unless every check passed.
 *
 *   1. Decode and parse; top-level status; exactly one plain Assertion
 *   2. Signatures (assertion-level first), per SecurityPolicy
 *   3. Time window: Conditions, bearer SubjectConfirmationData, session
 *   4. Audience
 *   5. Issuer
 *   6. InResponseTo, Destination, Recipient
 *   7. AuthnStatement, AttributeStatement, NameID
 *
 * Everything after step 2 is read from the one Assertion element whose
 * signature (or enclosing Response signature) was verified.
 *
 * @see SAML 2.0 Core Specification, Sections 2.3 - 2.7 and 3.2.2
 * @see SAML 2.0 Profiles Specification, Section 4.1.4.3
 */

import { ValidationErrorKinds } from '@proxy-sso/shared';
import type { ValidationErrorKind } from '@proxy-sso/shared';
import {
    SAML_NAMESPACES,
    STATUS_CODES,
    SUBJECT_CONFIRMATION_BEARER,
} from './constants';
import { ValidationError } from './errors';
import type { ValidationContext } from './errors';
import { checkSignature, hasSignature } from './signature';
import type {
    Assertion,
    AssertionConditions,
    AuthnStatementInfo,
    IdPSettings,
    SecurityPolicy,
    SPSettings,
} from './types';
import {
    attr,
    childElements,
    descendants,
    firstChild,
    parseInstant,
    parseXml,
    textOf,
} from './xml';

const SAMLP = SAML_NAMESPACES.PROTOCOL;
const SAML = SAML_NAMESPACES.ASSERTION;

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

export interface ValidatorSettings {
    sp: SPSettings;
    idp: IdPSettings;
    security: SecurityPolicy;
}

export interface ValidateOptions {
    /** ID of the AuthnRequest this Response must answer */
    expectedRequestId?: string;
    /** Clock override for tests */
    now?: Date;
}

// =============================================================================
// Failure Helper
// =============================================================================

class Check {
    readonly context: ValidationContext;

    constructor(idpEntityId: string) {
        this.context = { idpEntityId };
    }

    fail(kind: ValidationErrorKind, message: string): ValidationError {
        return new ValidationError(kind, message, { ...this.context });
    }

    malformed(message: string): ValidationError {
        return this.fail(ValidationErrorKinds.MALFORMED, message);
    }

    instant(value: string | undefined, what: string): number | undefined {
        if (value === undefined) {
            return undefined;
        }
        try {
            return parseInstant(value);
        } catch {
            throw this.malformed(`${what} is not a valid timestamp`);
        }
    }
}

// =============================================================================
// Step 1: Decode and Structure
// =============================================================================

function decode(samlResponse: string, check: Check): string {
    const compact = samlResponse.replace(/\s+/g, '');
    if (!compact || !BASE64_PATTERN.test(compact)) {
        throw check.malformed('SAMLResponse is not valid base64');
    }
    return Buffer.from(compact, 'base64').toString('utf8');
}

function parseResponse(xml: string, check: Check): Element {
    let doc: Document;
    try {
        doc = parseXml(xml);
    } catch (err) {
        throw check.malformed(`SAMLResponse is not well-formed XML (${err instanceof Error ? err.message : 'parse error'})`);
    }

    const root = doc.documentElement;
    if (root.namespaceURI !== SAMLP || root.localName !== 'Response') {
        throw check.malformed('Document element is not a samlp:Response');
    }
    if (attr(root, 'Version') !== '2.0') {
        throw check.malformed('Response Version must be 2.0');
    }
    if (!attr(root, 'ID')) {
        throw check.malformed('Response has no ID');
    }

    return root;
}

function checkStatus(response: Element, check: Check): void {
    const status = firstChild(response, SAMLP, 'Status');
    const code = status ? firstChild(status, SAMLP, 'StatusCode') : null;
    const value = code ? attr(code, 'Value') : undefined;

    if (value === STATUS_CODES.SUCCESS) {
        return;
    }

    const subCode = code ? firstChild(code, SAMLP, 'StatusCode') : null;
    const subValue = subCode ? attr(subCode, 'Value') : undefined;
    const statusMessage = status ? textOf(firstChild(status, SAMLP, 'StatusMessage')) : undefined;

    const detail = [value ?? 'missing status', subValue, statusMessage]
        .filter((part): part is string => part !== undefined)
        .join(' / ');

    throw check.fail(ValidationErrorKinds.STATUS_ERROR, `IdP returned a non-success status: ${detail}`);
}

function locateAssertion(response: Element, security: SecurityPolicy, check: Check): Element {
    const doc = response.ownerDocument;

    if (descendants(doc, SAML, 'EncryptedAssertion').length > 0) {
        throw check.malformed('Encrypted assertions are not supported');
    }

    const assertions = descendants(doc, SAML, 'Assertion');
    if (security.requireEncryptedAssertions && assertions.length > 0) {
        throw check.malformed('Policy requires encrypted assertions');
    }
    if (assertions.length !== 1) {
        throw check.malformed(`Expected exactly one Assertion, found ${assertions.length}`);
    }

    const assertion = assertions[0];
    if (assertion.parentNode !== response) {
        throw check.malformed('Assertion must be a direct child of the Response');
    }

    return assertion;
}

// =============================================================================
// Step 2: Signatures
// =============================================================================

function verifySignatures(
    response: Element,
    assertion: Element,
    xml: string,
    settings: ValidatorSettings,
    check: Check
): Assertion['signedBy'] {
    const { idp, security } = settings;
    let signedBy: Assertion['signedBy'] = 'none';

    if (hasSignature(assertion)) {
        const result = checkSignature(assertion, idp.certificate, xml);
        if (!result.valid) {
            throw check.fail(ValidationErrorKinds.SIGNATURE_INVALID, `Assertion signature rejected: ${result.reason}`);
        }
        signedBy = 'assertion';
    }

    const responseSigned = hasSignature(response);
    if (responseSigned) {
        const result = checkSignature(response, idp.certificate, xml);
        if (!result.valid) {
            throw check.fail(ValidationErrorKinds.SIGNATURE_INVALID, `Response signature rejected: ${result.reason}`);
        }
        if (signedBy === 'none') {
            signedBy = 'response';
        }
    }

    if (security.requireSignedAssertions && signedBy === 'none') {
        throw check.fail(ValidationErrorKinds.SIGNATURE_INVALID, 'Neither the Assertion nor the Response is signed');
    }
    if (security.requireSignedMessages && !responseSigned) {
        throw check.fail(ValidationErrorKinds.SIGNATURE_INVALID, 'Response is not signed');
    }

    return signedBy;
}

// =============================================================================
// Step 3: Time Window
// =============================================================================

function bearerConfirmations(subject: Element | null): Element[] {
    if (!subject) {
        return [];
    }
    return childElements(subject, SAML, 'SubjectConfirmation')
        .filter(confirmation => attr(confirmation, 'Method') === SUBJECT_CONFIRMATION_BEARER)
        .map(confirmation => firstChild(confirmation, SAML, 'SubjectConfirmationData'))
        .filter((data): data is Element => data !== null);
}

function checkTimeWindow(
    assertion: Element,
    bearerData: Element[],
    nowMs: number,
    skewMs: number,
    check: Check
): void {
    const conditions = firstChild(assertion, SAML, 'Conditions');

    if (conditions) {
        const notBefore = check.instant(attr(conditions, 'NotBefore'), 'Conditions NotBefore');
        if (notBefore !== undefined && nowMs + skewMs < notBefore) {
            throw check.fail(ValidationErrorKinds.EXPIRED, 'Assertion is not yet valid');
        }

        const notOnOrAfter = check.instant(attr(conditions, 'NotOnOrAfter'), 'Conditions NotOnOrAfter');
        if (notOnOrAfter !== undefined && nowMs - skewMs >= notOnOrAfter) {
            throw check.fail(ValidationErrorKinds.EXPIRED, 'Assertion has expired');
        }
    }

    for (const data of bearerData) {
        const notOnOrAfter = check.instant(attr(data, 'NotOnOrAfter'), 'SubjectConfirmationData NotOnOrAfter');
        if (notOnOrAfter !== undefined && nowMs - skewMs >= notOnOrAfter) {
            throw check.fail(ValidationErrorKinds.EXPIRED, 'Subject confirmation has expired');
        }
    }

    const authnStatement = firstChild(assertion, SAML, 'AuthnStatement');
    if (authnStatement) {
        const sessionEnd = check.instant(attr(authnStatement, 'SessionNotOnOrAfter'), 'SessionNotOnOrAfter');
        if (sessionEnd !== undefined && nowMs - skewMs >= sessionEnd) {
            throw check.fail(ValidationErrorKinds.EXPIRED, 'Authentication session has expired');
        }
    }
}

// =============================================================================
// Step 4: Audience
// =============================================================================

/**
 * Each AudienceRestriction must list the SP. An assertion without any
 * restriction is accepted.
 */
function checkAudience(assertion: Element, spEntityId: string, check: Check): AssertionConditions {
    const conditions = firstChild(assertion, SAML, 'Conditions');
    const restrictions = conditions ? childElements(conditions, SAML, 'AudienceRestriction') : [];
    const audiences: string[] = [];

    for (const restriction of restrictions) {
        const values = childElements(restriction, SAML, 'Audience')
            .map(audience => textOf(audience))
            .filter((value): value is string => value !== undefined);

        if (!values.includes(spEntityId)) {
            throw check.fail(
                ValidationErrorKinds.AUDIENCE_MISMATCH,
                `Assertion audience does not include ${spEntityId}`
            );
        }
        audiences.push(...values);
    }

    const notBefore = conditions ? attr(conditions, 'NotBefore') : undefined;
    const notOnOrAfter = conditions ? attr(conditions, 'NotOnOrAfter') : undefined;

    return {
        ...(notBefore !== undefined && { notBefore }),
        ...(notOnOrAfter !== undefined && { notOnOrAfter }),
        audiences,
    };
}

// =============================================================================
// Step 5: Issuer
// =============================================================================

function checkIssuer(response: Element, assertion: Element, idpEntityId: string, check: Check): string {
    const assertionIssuer = textOf(firstChild(assertion, SAML, 'Issuer'));
    if (assertionIssuer === undefined) {
        throw check.malformed('Assertion has no Issuer');
    }
    if (assertionIssuer !== idpEntityId) {
        throw check.fail(ValidationErrorKinds.ISSUER_MISMATCH, `Unexpected assertion issuer ${assertionIssuer}`);
    }

    const responseIssuer = textOf(firstChild(response, SAML, 'Issuer'));
    if (responseIssuer !== undefined && responseIssuer !== idpEntityId) {
        throw check.fail(ValidationErrorKinds.ISSUER_MISMATCH, `Unexpected response issuer ${responseIssuer}`);
    }

    return assertionIssuer;
}

// =============================================================================
// Step 6: Correlation and Destination
// =============================================================================

function checkCorrelation(
    response: Element,
    bearerData: Element[],
    acsUrl: string,
    expectedRequestId: string | undefined,
    check: Check
): string | undefined {
    const inResponseTo = attr(response, 'InResponseTo');

    if (expectedRequestId !== undefined) {
        if (inResponseTo !== expectedRequestId) {
            throw check.malformed('InResponseTo does not match the outstanding AuthnRequest');
        }
        for (const data of bearerData) {
            const dataInResponseTo = attr(data, 'InResponseTo');
            if (dataInResponseTo !== undefined && dataInResponseTo !== expectedRequestId) {
                throw check.malformed('SubjectConfirmationData InResponseTo does not match the outstanding AuthnRequest');
            }
        }
    }

    for (const data of bearerData) {
        const dataInResponseTo = attr(data, 'InResponseTo');
        if (dataInResponseTo !== undefined && inResponseTo !== undefined && dataInResponseTo !== inResponseTo) {
            throw check.malformed('SubjectConfirmationData InResponseTo differs from the Response');
        }
    }

    const destination = attr(response, 'Destination');
    if (destination !== undefined && destination !== acsUrl) {
        throw check.malformed('Response Destination does not match the ACS URL');
    }

    for (const data of bearerData) {
        const recipient = attr(data, 'Recipient');
        if (recipient !== undefined && recipient !== acsUrl) {
            throw check.malformed('SubjectConfirmationData Recipient does not match the ACS URL');
        }
    }

    return inResponseTo;
}

// =============================================================================
// Step 7: Statements and Subject
// =============================================================================

function extractAuthn(assertion: Element, check: Check): AuthnStatementInfo {
    const statement = firstChild(assertion, SAML, 'AuthnStatement');
    if (!statement) {
        throw check.fail(ValidationErrorKinds.NO_AUTHN_STATEMENT, 'Assertion has no AuthnStatement');
    }

    const authnInstant = attr(statement, 'AuthnInstant');
    if (authnInstant === undefined) {
        throw check.malformed('AuthnStatement has no AuthnInstant');
    }

    const context = firstChild(statement, SAML, 'AuthnContext');
    const classRef = context ? textOf(firstChild(context, SAML, 'AuthnContextClassRef')) : undefined;
    const sessionIndex = attr(statement, 'SessionIndex');
    const sessionNotOnOrAfter = attr(statement, 'SessionNotOnOrAfter');

    return {
        authnInstant,
        ...(sessionIndex !== undefined && { sessionIndex }),
        ...(sessionNotOnOrAfter !== undefined && { sessionNotOnOrAfter }),
        ...(classRef !== undefined && { authnContextClassRef: classRef }),
    };
}

/**
 * Collect attribute values by Name. Values of repeated Attribute elements
 * are appended in document order.
 */
export function extractAttributes(assertion: Element): Record<string, string[]> {
    const collected = new Map<string, string[]>();

    for (const statement of childElements(assertion, SAML, 'AttributeStatement')) {
        for (const attribute of childElements(statement, SAML, 'Attribute')) {
            const name = attr(attribute, 'Name');
            if (name === undefined) {
                continue;
            }
            const values = childElements(attribute, SAML, 'AttributeValue')
                .map(value => value.textContent?.trim() ?? '');
            collected.set(name, [...(collected.get(name) ?? []), ...values]);
        }
    }

    return Object.fromEntries(collected);
}

// =============================================================================
// Validator
// =============================================================================

/**
 * Validate a base64 SAMLResponse form value.
 *
 * @throws ValidationError with kind SignatureInvalid, Expired,
 *   AudienceMismatch, IssuerMismatch, NoAuthnStatement,
 *   NoAttributeStatement, StatusError or Malformed
 *
 * @example
 * ```typescript
 * const assertion = validateResponse(form.SAMLResponse, settings, {
 *     expectedRequestId: pending.requestId,
 * });
 * ```
 */
export function validateResponse(
    samlResponse: string,
    settings: ValidatorSettings,
    options: ValidateOptions = {}
): Assertion {
    const { sp, idp, security } = settings;
    const check = new Check(idp.entityId);

    // 1. Structure
    const xml = decode(samlResponse, check);
    const response = parseResponse(xml, check);
    checkStatus(response, check);
    const assertion = locateAssertion(response, security, check);

    const assertionId = attr(assertion, 'ID');
    const issueInstant = attr(assertion, 'IssueInstant');
    if (assertionId === undefined || issueInstant === undefined || attr(assertion, 'Version') !== '2.0') {
        throw check.malformed('Assertion must carry ID, IssueInstant and Version 2.0');
    }

    const subject = firstChild(assertion, SAML, 'Subject');
    const nameIdElement = subject ? firstChild(subject, SAML, 'NameID') : null;
    const nameId = textOf(nameIdElement);
    if (nameId !== undefined) {
        check.context.nameId = nameId;
    }

    // 2. Signatures
    const signedBy = verifySignatures(response, assertion, xml, settings, check);

    // 3. Time window
    const bearerData = bearerConfirmations(subject);
    const nowMs = (options.now ?? new Date()).getTime();
    checkTimeWindow(assertion, bearerData, nowMs, security.clockSkewSeconds * 1000, check);

    // 4. Audience
    const conditions = checkAudience(assertion, sp.entityId, check);

    // 5. Issuer
    const issuer = checkIssuer(response, assertion, idp.entityId, check);

    // 6. Correlation
    const inResponseTo = checkCorrelation(response, bearerData, sp.acsUrl, options.expectedRequestId, check);

    // 7. Statements and subject
    const authn = extractAuthn(assertion, check);

    if (security.wantAttributeStatement && childElements(assertion, SAML, 'AttributeStatement').length === 0) {
        throw check.fail(ValidationErrorKinds.NO_ATTRIBUTE_STATEMENT, 'Assertion has no AttributeStatement');
    }

    if (subject && firstChild(subject, SAML, 'EncryptedID')) {
        throw check.malformed('Encrypted NameID is not supported');
    }
    if (!nameIdElement || nameId === undefined) {
        throw check.malformed('Assertion has no NameID');
    }

    const nameIdFormat = attr(nameIdElement, 'Format');

    return {
        id: assertionId,
        issuer,
        issueInstant,
        subject: {
            nameId,
            ...(nameIdFormat !== undefined && { nameIdFormat }),
        },
        conditions,
        authn,
        attributes: extractAttributes(assertion),
        responseId: attr(response, 'ID') ?? '',
        ...(inResponseTo !== undefined && { inResponseTo }),
        signedBy,
    };
}
