/**
 * SAML Strategy - Error Types
 *
 * ConfigError is fatal to the request (500). ValidationError is terminal
 * for the login attempt (401); the user restarts the flow. Messages never
 * contain certificate or key material.
 */

import type { APIGatewayProxyResultV2 } from 'aws-lambda';
import {
    ErrorMessages,
    HttpStatus,
    SamlErrorKinds,
    error,
} from '@proxy-sso/shared';
import type { ErrorBody, SamlErrorKind, ValidationErrorKind } from '@proxy-sso/shared';

// =============================================================================
// Error Classes
// =============================================================================

export class SamlError extends Error {
    readonly kind: SamlErrorKind;
    readonly httpStatus: number;

    constructor(kind: SamlErrorKind, message: string, httpStatus: number) {
        super(message);
        this.name = kind;
        this.kind = kind;
        this.httpStatus = httpStatus;
    }
}

/**
 * Missing or invalid configuration. `field` names the environment variable.
 */
export class ConfigError extends SamlError {
    readonly field: string;

    constructor(field: string, message: string) {
        super(SamlErrorKinds.CONFIG_ERROR, message, HttpStatus.INTERNAL_SERVER_ERROR);
        this.field = field;
    }
}

/**
 * Diagnostic context attached to validation failures for logging.
 */
export interface ValidationContext {
    idpEntityId: string;
    nameId?: string;
}

export class ValidationError extends SamlError {
    declare readonly kind: ValidationErrorKind;
    readonly context: ValidationContext;

    constructor(kind: ValidationErrorKind, message: string, context: ValidationContext) {
        super(kind, message, HttpStatus.UNAUTHORIZED);
        this.context = context;
    }
}

// =============================================================================
// Rendering
// =============================================================================

/**
 * Render any thrown value as an error body. Errors raised outside the
 * SAML core are reported as InternalError without their message.
 */
export function toErrorBody(err: unknown): ErrorBody {
    if (err instanceof SamlError) {
        return {
            kind: err.kind,
            message: err instanceof ValidationError ? `${err.kind}: ${err.message}` : err.message,
            http_status: err.httpStatus,
        };
    }

    return {
        kind: SamlErrorKinds.INTERNAL_ERROR,
        message: ErrorMessages.INTERNAL_ERROR,
        http_status: HttpStatus.INTERNAL_SERVER_ERROR,
    };
}

/**
 * Render any thrown value as an API Gateway error response.
 */
export function toErrorResponse(err: unknown): APIGatewayProxyResultV2 {
    const body = toErrorBody(err);
    return error(body.http_status, body.kind, body.message);
}
