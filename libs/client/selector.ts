/**
 * Strategy Selector
 * Builds a fully configured ConnectionStrategy from a role name and a
 * key lookup.
 *
 * Fail-closed rules:
 * - IDENTIFIED / PRIVILEGED: every required key must be present and
 *   non-blank, and the referenced material must load. Otherwise a
 *   ConfigurationError names the key; there is no fallback to a lower tier.
 * - Unrecognised or absent role: UNAUTHENTICATED, the "no credentials, no
 *   claims" posture.
 */

import { type ConfigLookup, envLookup, readValue } from '../config/lookup.js';
import { ConfigurationError } from '../errors/ConfigurationError.js';
import { SecureTransportFactory, type ClientTransport } from '../bootstrap/mtls.js';
import { loadKeyBundle, loadTrustList, type MaterialReader, readMaterialFile } from '../pki/trustMaterial.js';
import { logger } from '../logging/logger.js';
import { type ConnectionStrategy, describeStrategy, identified, privileged, unauthenticated } from './strategy.js';

export const CLIENT_CONFIG_KEYS = {
    role: 'CLIENT_ROLE',
    keystorePath: 'MTLS_KEYSTORE_PATH',
    keystorePassword: 'MTLS_KEYSTORE_PASSWORD',
    truststorePath: 'MTLS_TRUSTSTORE_PATH',
    truststorePassword: 'MTLS_TRUSTSTORE_PASSWORD',
    token: 'API_TOKEN',
} as const;

/** Required keys per role, in the order they are checked. */
export const REQUIRED_KEYS = {
    UNAUTHENTICATED: [],
    IDENTIFIED: [CLIENT_CONFIG_KEYS.keystorePath, CLIENT_CONFIG_KEYS.keystorePassword, CLIENT_CONFIG_KEYS.truststorePath],
    PRIVILEGED: [CLIENT_CONFIG_KEYS.keystorePath, CLIENT_CONFIG_KEYS.keystorePassword, CLIENT_CONFIG_KEYS.truststorePath, CLIENT_CONFIG_KEYS.token],
} as const satisfies Record<ConnectionStrategy['kind'], readonly string[]>;

const log = logger.child({ component: 'StrategySelector' });

function required(lookup: ConfigLookup, key: string): string {
    const value = readValue(lookup, key);
    if (value === undefined) {
        throw ConfigurationError.missing(key);
    }
    return value;
}

function parseRole(value: string | undefined): ConnectionStrategy['kind'] {
    const role = value?.toUpperCase();
    if (role === 'IDENTIFIED' || role === 'PRIVILEGED') {
        return role;
    }
    if (role !== undefined && role !== 'UNAUTHENTICATED') {
        log.warn({ role: value }, 'Unrecognised client role, using UNAUTHENTICATED');
    }
    return 'UNAUTHENTICATED';
}

export function selectStrategy(lookup: ConfigLookup = envLookup, read: MaterialReader = readMaterialFile): ConnectionStrategy {
    const role = parseRole(readValue(lookup, CLIENT_CONFIG_KEYS.role));

    // Presence of every key is checked before any material is touched.
    for (const key of REQUIRED_KEYS[role]) {
        required(lookup, key);
    }

    const strategy = buildStrategy(role, lookup, read);
    log.info(describeStrategy(strategy), 'Connection strategy selected');
    return strategy;
}

function buildStrategy(role: ConnectionStrategy['kind'], lookup: ConfigLookup, read: MaterialReader): ConnectionStrategy {
    switch (role) {
        case 'UNAUTHENTICATED':
            return unauthenticated();
        case 'IDENTIFIED':
            return identified(buildTransport(lookup, read));
        case 'PRIVILEGED':
            return privileged(buildTransport(lookup, read), required(lookup, CLIENT_CONFIG_KEYS.token));
    }
}

function buildTransport(lookup: ConfigLookup, read: MaterialReader): ClientTransport {
    const bundle = loadKeyBundle(
        required(lookup, CLIENT_CONFIG_KEYS.keystorePath),
        required(lookup, CLIENT_CONFIG_KEYS.keystorePassword),
        read
    );
    const serverTrust = loadTrustList(
        required(lookup, CLIENT_CONFIG_KEYS.truststorePath),
        readValue(lookup, CLIENT_CONFIG_KEYS.truststorePassword),
        read
    );
    return SecureTransportFactory.forClient(bundle, serverTrust);
}
