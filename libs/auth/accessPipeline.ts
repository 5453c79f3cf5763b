/**
 * Access Pipeline
 *
 * Per-request evaluation, in order:
 * 1. Certificate identity: taken from the TLS layer's verified peer.
 * 2. Tier assignment: IDENTIFIED when a subject was extracted.
 * 3. Escalation: IDENTIFIED → PRIVILEGED on an accepted bearer credential.
 * 4. Route requirement: current tier against the route's minimum.
 *
 * Every stage returns a new frozen state; the tier never decreases. The
 * outcome depends only on (peer, authorization header, route, policy), so
 * re-evaluating the same request yields the same decision.
 *
 * A connection whose client certificate failed verification is closed by the
 * TLS stack and never gets here.
 */

import type {
    AccessDecision,
    AccessRequest,
    AccessState,
    BearerToken,
    CertificateIdentity,
    NoCredential,
    PeerCertificateInfo,
} from '../context/identity.js';
import type { PrivilegeVerifier } from './privilege.js';
import type { RoutePolicy } from './routePolicy.js';
import { meetsTier } from './tiers.js';

/** Value bound to CN, up to the next comma. */
export const DEFAULT_SUBJECT_PATTERN = /CN=(.*?)(?:,|$)/;

/** Scheme, one space, then the credential as sent. */
const BEARER = /^Bearer (.+)$/i;

const NO_CREDENTIAL: NoCredential = Object.freeze({ kind: 'NONE' });

const UNAUTHENTICATED: AccessState = Object.freeze({ tier: 'UNAUTHENTICATED' });

export interface AccessPipelineOptions {
    readonly policy: RoutePolicy;
    readonly verifier: PrivilegeVerifier;
    readonly subjectPattern?: RegExp;
}

export function extractCertificateIdentity(
    peer: PeerCertificateInfo,
    subjectPattern: RegExp = DEFAULT_SUBJECT_PATTERN
): CertificateIdentity | NoCredential {
    if (!peer.authorized || !peer.subjectDn) {
        return NO_CREDENTIAL;
    }

    const subject = subjectPattern.exec(peer.subjectDn)?.[1]?.trim();
    if (!subject) {
        return NO_CREDENTIAL;
    }

    return Object.freeze({ kind: 'CERTIFICATE_IDENTITY', subject });
}

/**
 * Absent or malformed headers are "no escalation attempted".
 */
export function parseBearer(header: string | undefined): BearerToken | NoCredential {
    const value = header ? BEARER.exec(header)?.[1] : undefined;
    return value ? Object.freeze({ kind: 'BEARER_TOKEN', value }) : NO_CREDENTIAL;
}

export function identify(certificate: CertificateIdentity | NoCredential): AccessState {
    if (certificate.kind === 'NONE') {
        return UNAUTHENTICATED;
    }
    return Object.freeze({ tier: 'IDENTIFIED', subject: certificate.subject });
}

/**
 * Only an IDENTIFIED state can be raised. A rejected or absent credential
 * returns the input state unchanged.
 */
export function escalate(
    state: AccessState,
    bearer: BearerToken | NoCredential,
    verifier: PrivilegeVerifier
): AccessState {
    if (state.tier !== 'IDENTIFIED' || bearer.kind === 'NONE') {
        return state;
    }

    const principal = verifier.verify(bearer.value);
    if (principal === undefined) {
        return state;
    }

    return Object.freeze({ tier: 'PRIVILEGED', subject: state.subject, principal });
}

export function enforce(state: AccessState, policy: RoutePolicy, route: string): AccessDecision {
    const requiredTier = policy.requiredTier(route);

    if (requiredTier === undefined) {
        return Object.freeze({ outcome: 'DENIED', route, requiredTier: null, state, reason: 'ACCESS_ROUTE_UNDECLARED' });
    }

    if (meetsTier(state.tier, requiredTier)) {
        return Object.freeze({ outcome: 'ALLOWED', route, requiredTier, state });
    }

    return Object.freeze({
        outcome: 'DENIED',
        route,
        requiredTier,
        state,
        reason: state.tier === 'UNAUTHENTICATED' ? 'ACCESS_NO_IDENTITY' : 'ACCESS_INSUFFICIENT_TIER',
    });
}

export function evaluateAccess(request: AccessRequest, options: AccessPipelineOptions): AccessDecision {
    const certificate = extractCertificateIdentity(request.peer, options.subjectPattern);
    const identified = identify(certificate);
    const escalated = escalate(identified, parseBearer(request.authorization), options.verifier);
    return enforce(escalated, options.policy, request.route);
}
