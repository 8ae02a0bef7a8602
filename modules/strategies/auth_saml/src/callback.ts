/**
 * SAML Strategy - Assertion Consumer Service (ACS) Handler
 *
 * Lambda handler for POST /sso/saml/acs
 * Receives the IdP's POST-bound Response and returns the canonical
 * identity for the web layer to open a session with.
 *
 * Flow:
 * 1. Parse SAMLResponse and RelayState from the form body
 * 2. Validate the Response (signatures, time window, audience, issuer, ...)
 * 3. Consume the matching AuthnRequest ID when a store is configured
 * 4. Map attributes to a CanonicalIdentity
 * 5. Return 200 { identity, relay_state }, preferring the RelayState
 *    stored with the AuthnRequest
 *
 * Validation failures are 401, configuration failures 500. Each failure
 * is logged with the IdP entity ID, the NameID when known and the kind.
 */

import type { APIGatewayProxyEventV2, APIGatewayProxyResultV2, Context } from 'aws-lambda';
import {
    ErrorMessages,
    ValidationErrorKinds,
    badRequest,
    createLogger,
    methodNotAllowed,
    success,
    withContext,
} from '@proxy-sso/shared';
import type { AuditLogger, Logger } from '@proxy-sso/shared';
import { mapIdentity } from './attribute-mapper';
import { ConfigError, ValidationError, toErrorResponse } from './errors';
import { parseFormBody } from './form-parser';
import type { PendingRequest, RequestIdStore } from './request-store';
import { validateResponse } from './response-validator';
import { loadRuntime } from './runtime';
import type { RuntimeResolver } from './runtime';
import type { Assertion, SamlSettings } from './types';

// =============================================================================
// Replay Defense
// =============================================================================

/**
 * Consume the AuthnRequest the assertion answers. With a store configured,
 * unsolicited Responses and unknown or reused request IDs are rejected,
 * as is a posted RelayState other than the one stored at login.
 *
 * @returns the pending request, or null when no store is configured
 */
async function consumeRequest(
    store: RequestIdStore | null,
    assertion: Assertion,
    settings: SamlSettings,
    postedRelayState: string | undefined
): Promise<PendingRequest | null> {
    if (!store) {
        return null;
    }

    const context = { idpEntityId: settings.idp.entityId, nameId: assertion.subject.nameId };

    if (assertion.inResponseTo === undefined) {
        throw new ValidationError(ValidationErrorKinds.MALFORMED, 'Unsolicited Response: no InResponseTo', context);
    }

    const pending = await store.consume(assertion.inResponseTo);
    if (!pending || pending.idpEntityId !== settings.idp.entityId) {
        throw new ValidationError(ValidationErrorKinds.MALFORMED, ErrorMessages.UNKNOWN_REQUEST, context);
    }

    if (postedRelayState !== undefined && postedRelayState !== pending.relayState) {
        throw new ValidationError(ValidationErrorKinds.MALFORMED, ErrorMessages.RELAY_STATE_MISMATCH, context);
    }

    return pending;
}

// =============================================================================
// Failure Logging
// =============================================================================

function logFailure(err: unknown, log: Logger, audit: AuditLogger): void {
    if (err instanceof ValidationError) {
        audit.samlAssertionReceived({ type: 'ANONYMOUS' }, {
            issuer: err.context.idpEntityId,
            assertionId: 'unknown',
            valid: false,
            validationError: err.kind,
            ...(err.context.nameId !== undefined && { nameId: err.context.nameId }),
        });
        audit.loginFailure({
            method: 'saml',
            reason: err.kind,
            idpEntityId: err.context.idpEntityId,
        });
        log.warn('SAML response rejected', {
            kind: err.kind,
            reason: err.message,
            idpEntityId: err.context.idpEntityId,
            nameId: err.context.nameId ?? null,
        });
        return;
    }

    if (err instanceof ConfigError) {
        log.error('SAML configuration error', { field: err.field, error: err.message });
        return;
    }

    audit.loginFailure({ method: 'saml', reason: 'InternalError' });
    log.error('SAML callback error', {
        error: err instanceof Error ? err.message : String(err),
        stack: err instanceof Error ? err.stack : undefined,
    });
}

// =============================================================================
// Lambda Handler
// =============================================================================

export function createCallbackHandler(resolveRuntime: RuntimeResolver = loadRuntime) {
    return async (
        event: APIGatewayProxyEventV2,
        context: Context
    ): Promise<APIGatewayProxyResultV2> => {
        let log = createLogger(event, context);
        const audit = withContext(event, context);

        if (event.requestContext.http.method !== 'POST') {
            return methodNotAllowed();
        }

        try {
            const { settings, store } = resolveRuntime();
            log = createLogger(event, context, { debug: settings.debug });

            const form = parseFormBody(event.body, event.isBase64Encoded);
            const samlResponse = form.SAMLResponse;
            const relayState = form.RelayState;

            if (!samlResponse) {
                log.warn('Missing SAMLResponse in ACS request');
                return badRequest(ErrorMessages.MISSING_SAML_RESPONSE);
            }

            const assertion = validateResponse(samlResponse, settings);
            const pending = await consumeRequest(store, assertion, settings, relayState);

            const identity = mapIdentity(assertion, settings.attributes);

            audit.samlAssertionReceived({ type: 'USER', sub: identity.id }, {
                issuer: assertion.issuer,
                assertionId: assertion.id,
                valid: true,
                nameId: assertion.subject.nameId,
            });
            audit.loginSuccess({ type: 'USER', sub: identity.id }, {
                method: 'saml',
                email: identity.email,
                idpEntityId: assertion.issuer,
            });

            log.info('SAML authentication successful', {
                idpEntityId: assertion.issuer,
                nameId: assertion.subject.nameId,
                signedBy: assertion.signedBy,
            });
            log.debug('SAML assertion attributes', {
                attributeNames: Object.keys(assertion.attributes),
                authnContextClassRef: assertion.authn.authnContextClassRef ?? null,
                sessionIndex: assertion.authn.sessionIndex ?? null,
            });

            return success({
                identity,
                // The stored value wins once a request has been matched
                relay_state: pending ? (pending.relayState ?? null) : (relayState ?? null),
            });
        } catch (err) {
            logFailure(err, log, audit);
            return toErrorResponse(err);
        }
    };
}

export const handler = createCallbackHandler();
