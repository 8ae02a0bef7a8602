/**
 * SAML Strategy - Lambda Runtime State
 *
 * Settings are built on the first invocation and kept for the life of the
 * execution environment. A failed build is not cached, so the next
 * invocation retries after the configuration is fixed.
 */

import { createSystemLogger } from '@proxy-sso/shared';
import { buildSettings, describeSettings } from './config';
import { getDocClient } from './dynamo-client';
import { DynamoRequestIdStore } from './request-store';
import type { RequestIdStore } from './request-store';
import type { EnvSource, SamlSettings } from './types';

export interface SamlRuntime {
    settings: Readonly<SamlSettings>;
    /** Null when SAML_REQUEST_TABLE is unset */
    store: RequestIdStore | null;
}

export type RuntimeResolver = () => SamlRuntime;

let runtime: SamlRuntime | null = null;

export function loadRuntime(env: EnvSource = process.env): SamlRuntime {
    if (!runtime) {
        const settings = buildSettings(env);
        const store = settings.requestTable
            ? new DynamoRequestIdStore(getDocClient(), settings.requestTable)
            : null;

        createSystemLogger('saml-settings').info('SAML settings loaded', describeSettings(settings));

        runtime = { settings, store };
    }
    return runtime;
}

/**
 * Drop the cached runtime so the next call rebuilds it.
 */
export function resetRuntime(): void {
    runtime = null;
}
