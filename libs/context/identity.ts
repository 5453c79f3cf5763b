/**
 * Tiergate Access Context
 * Immutable per-request values threaded through the access pipeline.
 */

/**
 * Ordered: UNAUTHENTICATED < IDENTIFIED < PRIVILEGED.
 */
export type TrustTier = 'UNAUTHENTICATED' | 'IDENTIFIED' | 'PRIVILEGED';

export type NoCredential = { kind: 'NONE' };

/** Derived from the verified TLS peer certificate, never from request data. */
export type CertificateIdentity = { kind: 'CERTIFICATE_IDENTITY'; subject: string };

/** Caller-controlled; only meaningful after comparison with a server-held secret. */
export type BearerToken = { kind: 'BEARER_TOKEN'; value: string };

export type Credential = NoCredential | CertificateIdentity | BearerToken;

type UnauthenticatedState = {
    tier: 'UNAUTHENTICATED';
};

type IdentifiedState = {
    tier: 'IDENTIFIED';
    subject: string;
};

type PrivilegedState = {
    tier: 'PRIVILEGED';
    subject: string;
    principal: string;  // grant that accepted the bearer credential
};

export type AccessState = Readonly<UnauthenticatedState | IdentifiedState | PrivilegedState>;

export type AccessDenialCode =
    | 'ACCESS_NO_IDENTITY'
    | 'ACCESS_INSUFFICIENT_TIER'
    | 'ACCESS_ROUTE_UNDECLARED';

export type AccessDecision = Readonly<
    | { outcome: 'ALLOWED'; route: string; requiredTier: TrustTier; state: AccessState }
    | { outcome: 'DENIED'; route: string; requiredTier: TrustTier | null; state: AccessState; reason: AccessDenialCode }
>;

/**
 * What the transport layer reports about the connection's peer.
 * `authorized` is the TLS stack's verdict on the chain; `subjectDn` is the
 * distinguished name of the leaf, comma separated.
 */
export interface PeerCertificateInfo {
    readonly authorized: boolean;
    readonly subjectDn?: string;
}

export interface AccessRequest {
    readonly route: string;
    readonly peer: PeerCertificateInfo;
    readonly authorization?: string;
}
