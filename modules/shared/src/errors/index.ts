/**
 * SAML SSO - Error Constants Module
 *
 * Error kinds, HTTP status codes and messages shared by the SSO handlers.
 *
 * ```typescript
 * import { SamlErrorKinds, ErrorMessages } from '@proxy-sso/shared';
 *
 * return error(400, 'BadRequest', ErrorMessages.MISSING_SAML_RESPONSE);
 * ```
 *
 * @module errors
 */

export { SamlErrorKinds, ValidationErrorKinds } from './saml-error-kinds';

export type { SamlErrorKind, ValidationErrorKind } from './saml-error-kinds';

export { HttpStatus } from './http-status';

export type { HttpStatusCode } from './http-status';

export { ErrorMessages } from './error-messages';
