/**
 * mTLS Guard
 * Ensures transport credentials are configured in protected environments.
 */

import { ConfigGuard, type GuardRule } from './config-guard.js';
import { type ConfigLookup, envLookup } from '../config/lookup.js';

const PROTECTED_ENVS = new Set(['production', 'staging']);

export const SERVER_TRANSPORT_KEYS = ['TLS_KEYSTORE_PATH', 'TLS_KEYSTORE_PASSWORD', 'TLS_CLIENT_TRUST_PATH'] as const;

export const MTLS_CONFIG_REQUIREMENTS: GuardRule[] = SERVER_TRANSPORT_KEYS.map(name => ({ type: 'required' as const, name }));

export function enforceMtlsConfig(lookup: ConfigLookup = envLookup): void {
    const env = lookup('NODE_ENV') ?? 'development';
    if (!PROTECTED_ENVS.has(env)) {
        return;
    }

    ConfigGuard.enforce(MTLS_CONFIG_REQUIREMENTS, lookup);
}
