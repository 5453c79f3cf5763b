import type { Request, Response, NextFunction, RequestHandler, ErrorRequestHandler } from 'express';
import crypto from 'crypto';
import tls from 'tls';
import type { AccessState, PeerCertificateInfo } from '../context/identity.js';
import { evaluateAccess } from '../auth/accessPipeline.js';
import type { PrivilegeVerifier } from '../auth/privilege.js';
import type { RoutePolicyHolder } from '../auth/routePolicy.js';
import { AccessDeniedError } from '../auth/AccessDeniedError.js';
import type { AccessAuditSink } from '../audit/accessAudit.js';
import { loggerAuditSink } from '../audit/accessAudit.js';
import { formatDistinguishedName } from '../pki/trustMaterial.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { logger, getAccessLogger } from '../logging/logger.js';

export interface AccessMiddlewareOptions {
    policy: RoutePolicyHolder;
    verifier: PrivilegeVerifier;
    subjectPattern?: RegExp;
    audit?: AccessAuditSink;
}

// Per-request state lives beside the request, not in ambient storage.
const states = new WeakMap<Request, AccessState>();
const requestIds = new WeakMap<Request, string>();

export function accessStateOf(req: Request): AccessState | undefined {
    return states.get(req);
}

export function requestIdOf(req: Request): string | undefined {
    return requestIds.get(req);
}

/**
 * Reads what the TLS layer verified about the peer. A plain socket, or a
 * TLS socket without a verified chain, yields an unauthorized peer.
 */
export function peerOf(req: Request): PeerCertificateInfo {
    const socket = req.socket;
    if (!(socket instanceof tls.TLSSocket) || !socket.authorized) {
        return { authorized: false };
    }

    const certificate = socket.getPeerCertificate();
    if (!certificate || !certificate.raw) {
        return { authorized: false };
    }

    return {
        authorized: true,
        subjectDn: formatDistinguishedName(new crypto.X509Certificate(certificate.raw)),
    };
}

function resolveRequestId(req: Request): string {
    const header = req.headers['x-request-id'];
    return typeof header === 'string' && header.trim() ? header.trim() : crypto.randomUUID();
}

/**
 * Express middleware running the access pipeline for every request.
 * The route policy is read once per request, so a concurrent swap never
 * changes a decision already in progress.
 */
export function createAccessMiddleware(options: AccessMiddlewareOptions): RequestHandler {
    const audit = options.audit ?? loggerAuditSink;

    return (req: Request, _res: Response, next: NextFunction): void => {
        const requestId = resolveRequestId(req);
        requestIds.set(req, requestId);

        const decision = evaluateAccess(
            {
                route: req.path,
                peer: peerOf(req),
                authorization: req.get('authorization'),
            },
            {
                policy: options.policy.current(),
                verifier: options.verifier,
                subjectPattern: options.subjectPattern,
            }
        );

        audit.recordDecision(requestId, decision);

        if (decision.outcome === 'DENIED') {
            next(AccessDeniedError.fromDecision(decision));
            return;
        }

        states.set(req, decision.state);
        getAccessLogger(requestId, decision.state).debug({ route: decision.route }, 'Request admitted');
        next();
    };
}

export const accessErrorHandler: ErrorRequestHandler = (err: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
        next(err);
        return;
    }

    if (err instanceof AccessDeniedError) {
        res.status(err.statusCode).json(err.toResponseBody());
        return;
    }

    const sanitized = ErrorSanitizer.sanitize(err, `HTTP ${req.method} ${req.path}`);
    logger.debug({ requestId: requestIdOf(req), incidentId: sanitized.incidentId }, 'Request failed');
    res.status(500).json({ error: 'INTERNAL_ERROR', incidentId: sanitized.incidentId });
};
