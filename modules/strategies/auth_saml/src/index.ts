/**
 * SAML Strategy
 *
 * SAML 2.0 Service Provider for the proxy admin UI:
 * - Settings: environment → immutable SamlSettings
 * - AuthnRequest builder (HTTP-Redirect binding, optional signing)
 * - Response validator (HTTP-POST binding)
 * - Attribute mapper → CanonicalIdentity
 * - SP metadata generation and self-check
 *
 * Lambda entry points live in login.ts, callback.ts and metadata.ts.
 */

export { buildSettings, isSamlConfigured, describeSettings, normalizePem } from './config';
export { buildAuthnRequest, serializeAuthnRequest, deflateAndEncode } from './authn-request';
export type { AuthnRequestSettings, AuthnRequestOptions } from './authn-request';
export { validateResponse, extractAttributes } from './response-validator';
export type { ValidatorSettings, ValidateOptions } from './response-validator';
export { mapIdentity, firstValue } from './attribute-mapper';
export { checkSignature, verifySignature, hasSignature, signXml, signRedirectQuery } from './signature';
export type { SignatureCheck, SignXmlOptions } from './signature';
export { generateSpMetadata, validateSpMetadata, getSpMetadata, certificateBody } from './metadata';
export type { MetadataOptions } from './metadata';
export { InMemoryRequestIdStore, DynamoRequestIdStore } from './request-store';
export type { PendingRequest, RememberOptions, RequestIdStore } from './request-store';
export { loadRuntime, resetRuntime } from './runtime';
export type { SamlRuntime, RuntimeResolver } from './runtime';
export { parseXml, serializeXml } from './xml';
export { parseFormBody } from './form-parser';
export { SamlError, ConfigError, ValidationError, toErrorBody, toErrorResponse } from './errors';
export type { ValidationContext } from './errors';
export { createLoginHandler } from './login';
export { createCallbackHandler } from './callback';
export { createMetadataHandler } from './metadata';
export * from './constants';
export type * from './types';
