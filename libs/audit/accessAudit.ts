/**
 * Access Audit
 *
 * Two event families that never mix:
 * - ACCESS_ALLOW / ACCESS_DENY: decisions of the access pipeline.
 * - TRANSPORT_REJECT: TLS handshakes that failed before any request existed.
 *   These never produce an ACCESS_DENY record.
 */

import crypto from 'crypto';
import type { AccessDecision } from '../context/identity.js';
import { logger } from '../logging/logger.js';

export type AccessAuditEventType = 'ACCESS_ALLOW' | 'ACCESS_DENY' | 'TRANSPORT_REJECT';

export interface AccessAuditRecord {
    eventId: string;
    eventType: Exclude<AccessAuditEventType, 'TRANSPORT_REJECT'>;
    timestamp: string;
    requestId: string;
    decision: AccessDecision;
}

export interface TransportRejectionRecord {
    eventId: string;
    eventType: 'TRANSPORT_REJECT';
    timestamp: string;
    remoteAddress: string | null;
    code: string | null;
    reason: string;
}

export interface AccessAuditSink {
    recordDecision(requestId: string, decision: AccessDecision): void;
    recordTransportRejection(rejection: { remoteAddress?: string; code?: string; reason: string }): void;
}

const auditLog = logger.child({ component: 'AccessAudit' });

export function buildDecisionRecord(requestId: string, decision: AccessDecision): AccessAuditRecord {
    return {
        eventId: crypto.randomUUID(),
        eventType: decision.outcome === 'ALLOWED' ? 'ACCESS_ALLOW' : 'ACCESS_DENY',
        timestamp: new Date().toISOString(),
        requestId,
        decision,
    };
}

export function buildTransportRecord(rejection: { remoteAddress?: string; code?: string; reason: string }): TransportRejectionRecord {
    return {
        eventId: crypto.randomUUID(),
        eventType: 'TRANSPORT_REJECT',
        timestamp: new Date().toISOString(),
        remoteAddress: rejection.remoteAddress ?? null,
        code: rejection.code ?? null,
        reason: rejection.reason,
    };
}

/**
 * Default sink: one structured log line per event.
 */
export const loggerAuditSink: AccessAuditSink = {
    recordDecision(requestId, decision) {
        const record = buildDecisionRecord(requestId, decision);
        const fields = {
            auditEvent: record.eventType,
            eventId: record.eventId,
            requestId,
            route: decision.route,
            tier: decision.state.tier,
            subject: decision.state.tier === 'UNAUTHENTICATED' ? null : decision.state.subject,
            requiredTier: decision.requiredTier,
        };

        if (decision.outcome === 'ALLOWED') {
            auditLog.info(fields, 'Access allowed');
        } else {
            auditLog.warn({ ...fields, reason: decision.reason }, 'Access denied');
        }
    },

    recordTransportRejection(rejection) {
        const record = buildTransportRecord(rejection);
        auditLog.warn({ auditEvent: record.eventType, ...record }, 'TLS handshake rejected');
    },
};

/**
 * Keeps records in memory; for embedding applications that ship audit
 * events elsewhere, and for tests.
 */
export class MemoryAuditSink implements AccessAuditSink {
    readonly decisions: AccessAuditRecord[] = [];
    readonly transportRejections: TransportRejectionRecord[] = [];

    recordDecision(requestId: string, decision: AccessDecision): void {
        this.decisions.push(buildDecisionRecord(requestId, decision));
    }

    recordTransportRejection(rejection: { remoteAddress?: string; code?: string; reason: string }): void {
        this.transportRejections.push(buildTransportRecord(rejection));
    }
}
