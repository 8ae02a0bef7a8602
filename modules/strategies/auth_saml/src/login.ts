/**
 * SAML Strategy - Login Handler
 *
 * Lambda handler for GET /sso/saml/login
 * Starts SP-initiated SSO: builds an AuthnRequest and redirects the
 * browser to the IdP with 303 See Other.
 *
 * RelayState is read from the `RelayState` or `state` query parameter.
 * When a request-ID store is configured, the request ID is remembered so
 * the ACS can match the Response to it.
 */

import type { APIGatewayProxyEventV2, APIGatewayProxyResultV2, Context } from 'aws-lambda';
import {
    ErrorMessages,
    badRequest,
    createLogger,
    isValidRelayState,
    methodNotAllowed,
    redirect,
    withContext,
} from '@proxy-sso/shared';
import { buildAuthnRequest } from './authn-request';
import { ConfigError, toErrorResponse } from './errors';
import { loadRuntime } from './runtime';
import type { RuntimeResolver } from './runtime';

export function createLoginHandler(resolveRuntime: RuntimeResolver = loadRuntime) {
    return async (
        event: APIGatewayProxyEventV2,
        context: Context
    ): Promise<APIGatewayProxyResultV2> => {
        let log = createLogger(event, context);
        const audit = withContext(event, context);

        if (event.requestContext.http.method !== 'GET') {
            return methodNotAllowed();
        }

        try {
            const { settings, store } = resolveRuntime();
            log = createLogger(event, context, { debug: settings.debug });

            const query = event.queryStringParameters ?? {};
            const relayState = query.RelayState ?? query.state;

            if (relayState !== undefined && !isValidRelayState(relayState)) {
                log.warn('Rejected RelayState', { length: relayState.length });
                return badRequest(ErrorMessages.INVALID_RELAY_STATE);
            }

            const request = buildAuthnRequest(settings, relayState);

            if (store) {
                await store.remember(request.requestId, {
                    idpEntityId: settings.idp.entityId,
                    ...(relayState !== undefined && { relayState }),
                });
            }

            audit.samlLoginInitiated({
                idpEntityId: settings.idp.entityId,
                requestId: request.requestId,
                signed: settings.security.signRequests,
            });

            log.debug('AuthnRequest issued', {
                requestId: request.requestId,
                destination: request.destination,
                issueInstant: request.issueInstant,
                tracked: store !== null,
            });

            return redirect(request.redirectUrl);
        } catch (err) {
            if (err instanceof ConfigError) {
                log.error('SAML configuration error', { field: err.field, error: err.message });
            } else {
                log.error('SAML login error', {
                    error: err instanceof Error ? err.message : String(err),
                    stack: err instanceof Error ? err.stack : undefined,
                });
            }
            return toErrorResponse(err);
        }
    };
}

export const handler = createLoginHandler();
