/**
 * AccessDeniedError
 * Structured authorization rejection. The status code separates
 * "no identity was established" (401) from "identity established but the
 * tier is too low" (403).
 */

import type { AccessDecision, AccessDenialCode, TrustTier } from '../context/identity.js';

const STATUS_BY_CODE: Record<AccessDenialCode, number> = {
    ACCESS_NO_IDENTITY: 401,
    ACCESS_INSUFFICIENT_TIER: 403,
    ACCESS_ROUTE_UNDECLARED: 404,
};

const MESSAGE_BY_CODE: Record<AccessDenialCode, string> = {
    ACCESS_NO_IDENTITY: 'No client identity was established for this request',
    ACCESS_INSUFFICIENT_TIER: 'Client identity established but its trust tier is insufficient',
    ACCESS_ROUTE_UNDECLARED: 'Route has no declared access requirement',
};

export class AccessDeniedError extends Error {
    readonly code: AccessDenialCode;
    readonly statusCode: number;
    readonly route: string;
    readonly requiredTier: TrustTier | null;
    readonly currentTier: TrustTier;

    constructor(code: AccessDenialCode, route: string, requiredTier: TrustTier | null, currentTier: TrustTier) {
        super(MESSAGE_BY_CODE[code]);
        this.name = 'AccessDeniedError';
        this.code = code;
        this.statusCode = STATUS_BY_CODE[code];
        this.route = route;
        this.requiredTier = requiredTier;
        this.currentTier = currentTier;
        Object.setPrototypeOf(this, AccessDeniedError.prototype);
    }

    static fromDecision(decision: Extract<AccessDecision, { outcome: 'DENIED' }>): AccessDeniedError {
        return new AccessDeniedError(decision.reason, decision.route, decision.requiredTier, decision.state.tier);
    }

    toResponseBody(): Record<string, string> {
        return {
            error: this.code,
            message: this.message,
            ...(this.requiredTier ? { requiredTier: this.requiredTier } : {}),
            currentTier: this.currentTier,
        };
    }
}
