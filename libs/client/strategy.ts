/**
 * Connection Strategy
 *
 * Closed set of client postures, each with two operations on different
 * lifetimes:
 * - configure: once per client, shapes the reusable connection (TLS identity
 *   and server trust). Never sees request state.
 * - decorate: once per outgoing request, attaches per-request credentials.
 *
 *   kind             | configure                 | decorate
 *   UNAUTHENTICATED  | unchanged                 | unchanged
 *   IDENTIFIED       | client cert + peer trust  | unchanged
 *   PRIVILEGED       | client cert + peer trust  | Authorization: Bearer <token>
 */

import type https from 'https';
import type { ClientTransport } from '../bootstrap/mtls.js';

export type ConnectionStrategy = Readonly<
    | { kind: 'UNAUTHENTICATED' }
    | { kind: 'IDENTIFIED'; transport: ClientTransport }
    | { kind: 'PRIVILEGED'; transport: ClientTransport; token: string }
>;

export type TransportBuilder = Readonly<https.AgentOptions>;

export interface RequestBuilder {
    readonly method: string;
    readonly path: string;
    readonly headers: Readonly<Record<string, string>>;
}

export const AUTHORIZATION_HEADER = 'authorization';

export function unauthenticated(): ConnectionStrategy {
    return Object.freeze({ kind: 'UNAUTHENTICATED' });
}

export function identified(transport: ClientTransport): ConnectionStrategy {
    return Object.freeze({ kind: 'IDENTIFIED', transport });
}

export function privileged(transport: ClientTransport, token: string): ConnectionStrategy {
    return Object.freeze({ kind: 'PRIVILEGED', transport, token });
}

export function configure(strategy: ConnectionStrategy, builder: TransportBuilder): TransportBuilder {
    switch (strategy.kind) {
        case 'UNAUTHENTICATED':
            return builder;
        case 'IDENTIFIED':
        case 'PRIVILEGED':
            return Object.freeze({ ...builder, ...strategy.transport.options });
    }
}

export function decorate(strategy: ConnectionStrategy, request: RequestBuilder): RequestBuilder {
    switch (strategy.kind) {
        case 'UNAUTHENTICATED':
        case 'IDENTIFIED':
            return request;
        case 'PRIVILEGED':
            return Object.freeze({
                ...request,
                headers: Object.freeze({ ...request.headers, [AUTHORIZATION_HEADER]: `Bearer ${strategy.token}` }),
            });
    }
}

/**
 * Safe to log: never includes the token or key material.
 */
export function describeStrategy(strategy: ConnectionStrategy): Record<string, string> {
    return strategy.kind === 'UNAUTHENTICATED'
        ? { kind: strategy.kind }
        : { kind: strategy.kind, subject: strategy.transport.subject };
}
