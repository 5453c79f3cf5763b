import https from 'https';
import tls from 'tls';
import type { KeyBundle, TrustList } from '../pki/trustMaterial.js';
import { ConfigurationError } from '../errors/ConfigurationError.js';

/**
 * mTLS Primitives
 * Builds hardened TLS options from trust material, one role per context.
 *
 * The client validates the server against its own server-trust list; the
 * server validates clients against a separate client-trust list. The two are
 * never shared even when they hold the same CA.
 */

const MIN_TLS_VERSION = 'TLSv1.2';

export interface ClientTransport {
    readonly role: 'client';
    readonly subject: string;
    readonly options: Readonly<https.AgentOptions>;
}

export interface ServerTransport {
    readonly role: 'server';
    readonly subject: string;
    readonly options: Readonly<https.ServerOptions>;
}

function assertUsable(options: tls.SecureContextOptions, label: string): void {
    try {
        tls.createSecureContext(options);
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new ConfigurationError('CONFIG_INVALID_MATERIAL', label, `Cannot build ${label} TLS context: ${message}`, { cause: err });
    }
}

export const SecureTransportFactory = {
    /**
     * Options for outbound mTLS calls: presents the bundle's certificate when
     * the server asks for one, and only accepts servers chaining to serverTrust.
     */
    forClient: (bundle: KeyBundle, serverTrust: TrustList): ClientTransport => {
        const { key, cert } = bundle.tlsIdentity();
        const options = {
            key,
            cert,
            ca: serverTrust.pem,
            minVersion: MIN_TLS_VERSION,
            rejectUnauthorized: true // FAIL-CLOSED
        } as const satisfies https.AgentOptions;

        assertUsable(options, 'client');
        return Object.freeze({ role: 'client', subject: bundle.subject, options: Object.freeze(options) });
    },

    /**
     * Options for an mTLS listener: a client certificate is required and must
     * chain to clientTrust, otherwise the handshake aborts.
     */
    forServer: (bundle: KeyBundle, clientTrust: TrustList): ServerTransport => {
        const { key, cert } = bundle.tlsIdentity();
        const options = {
            key,
            cert,
            ca: clientTrust.pem,
            minVersion: MIN_TLS_VERSION,
            requestCert: true,
            rejectUnauthorized: true // FAIL-CLOSED
        } as const satisfies https.ServerOptions;

        assertUsable(options, 'server');
        return Object.freeze({ role: 'server', subject: bundle.subject, options: Object.freeze(options) });
    }
};
