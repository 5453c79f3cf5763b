/**
 * Unit Tests: Access Pipeline
 *
 * Stages are pure; the transport layer's verdict arrives as
 * PeerCertificateInfo, so no sockets are involved here.
 *
 * @see libs/auth/accessPipeline.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
    enforce,
    escalate,
    evaluateAccess,
    extractCertificateIdentity,
    identify,
    parseBearer,
} from '../../libs/auth/accessPipeline.js';
import { SharedSecretVerifier } from '../../libs/auth/privilege.js';
import { RoutePolicy } from '../../libs/auth/routePolicy.js';
import { AccessDeniedError } from '../../libs/auth/AccessDeniedError.js';
import { tierRank } from '../../libs/auth/tiers.js';
import { decorate, privileged } from '../../libs/client/strategy.js';
import type { AccessRequest, AccessState, PeerCertificateInfo } from '../../libs/context/identity.js';

const policy = RoutePolicy.fromRecord({
    '/health': 'UNAUTHENTICATED',
    '/peasant': 'IDENTIFIED',
    '/king': 'PRIVILEGED',
});

const verifier = new SharedSecretVerifier([{ principal: 'king', secret: 'test-secret' }]);

const BOB: PeerCertificateInfo = { authorized: true, subjectDn: 'CN=Bob, O=Test Realm' };
const NOBODY: PeerCertificateInfo = { authorized: false };

const identified: AccessState = { tier: 'IDENTIFIED', subject: 'Bob' };
const unauthenticated: AccessState = { tier: 'UNAUTHENTICATED' };

describe('Access Pipeline', () => {
    describe('extractCertificateIdentity', () => {
        it('should take the subject from the common name', () => {
            assert.deepStrictEqual(extractCertificateIdentity(BOB), { kind: 'CERTIFICATE_IDENTITY', subject: 'Bob' });
        });

        it('should find the common name anywhere in the distinguished name', () => {
            assert.deepStrictEqual(
                extractCertificateIdentity({ authorized: true, subjectDn: 'O=Test Realm, CN=Bob' }),
                { kind: 'CERTIFICATE_IDENTITY', subject: 'Bob' }
            );
        });

        it('should ignore a subject on an unverified peer', () => {
            assert.deepStrictEqual(
                extractCertificateIdentity({ authorized: false, subjectDn: 'CN=Bob, O=Test Realm' }),
                { kind: 'NONE' }
            );
        });

        it('should yield nothing when the pattern does not match', () => {
            assert.deepStrictEqual(extractCertificateIdentity({ authorized: true, subjectDn: 'O=Test Realm' }), { kind: 'NONE' });
        });

        it('should yield nothing for an empty common name', () => {
            assert.deepStrictEqual(extractCertificateIdentity({ authorized: true, subjectDn: 'CN=, O=Test Realm' }), { kind: 'NONE' });
        });

        it('should honour a configured pattern', () => {
            assert.deepStrictEqual(
                extractCertificateIdentity({ authorized: true, subjectDn: 'UID=bob42, CN=Bob' }, /UID=([^,]+)/),
                { kind: 'CERTIFICATE_IDENTITY', subject: 'bob42' }
            );
        });
    });

    describe('parseBearer', () => {
        it('should read the token from a bearer header', () => {
            assert.deepStrictEqual(parseBearer('Bearer test-secret'), { kind: 'BEARER_TOKEN', value: 'test-secret' });
            assert.deepStrictEqual(parseBearer('bearer test-secret'), { kind: 'BEARER_TOKEN', value: 'test-secret' });
        });

        it('should take everything after the scheme as the token', () => {
            assert.deepStrictEqual(parseBearer('Bearer royal secret'), { kind: 'BEARER_TOKEN', value: 'royal secret' });
            assert.deepStrictEqual(parseBearer('Bearer  test-secret'), { kind: 'BEARER_TOKEN', value: ' test-secret' });
        });

        it('should treat absent or malformed headers as no credential', () => {
            for (const header of [undefined, '', 'Bearer', 'Bearer ', 'Basic dGVzdDp0ZXN0', 'Bearertest-secret', 'test-secret']) {
                assert.deepStrictEqual(parseBearer(header), { kind: 'NONE' }, JSON.stringify(header));
            }
        });
    });

    describe('identify', () => {
        it('should assign IDENTIFIED for a certificate identity', () => {
            assert.deepStrictEqual(identify({ kind: 'CERTIFICATE_IDENTITY', subject: 'Bob' }), identified);
        });

        it('should assign UNAUTHENTICATED without one', () => {
            assert.deepStrictEqual(identify({ kind: 'NONE' }), unauthenticated);
        });
    });

    describe('escalate', () => {
        it('should raise IDENTIFIED to PRIVILEGED on an accepted token', () => {
            const state = escalate(identified, { kind: 'BEARER_TOKEN', value: 'test-secret' }, verifier);

            assert.deepStrictEqual(state, { tier: 'PRIVILEGED', subject: 'Bob', principal: 'king' });
            assert.ok(Object.isFrozen(state));
            assert.deepStrictEqual(identified, { tier: 'IDENTIFIED', subject: 'Bob' });
        });

        it('should keep the identity when the token is rejected', () => {
            assert.strictEqual(escalate(identified, { kind: 'BEARER_TOKEN', value: 'wrong-secret' }, verifier), identified);
        });

        it('should never escalate without a certificate identity', () => {
            assert.strictEqual(escalate(unauthenticated, { kind: 'BEARER_TOKEN', value: 'test-secret' }, verifier), unauthenticated);
        });

        it('should leave a PRIVILEGED state alone', () => {
            const privileged: AccessState = { tier: 'PRIVILEGED', subject: 'Bob', principal: 'king' };
            assert.strictEqual(escalate(privileged, { kind: 'BEARER_TOKEN', value: 'wrong-secret' }, verifier), privileged);
        });
    });

    describe('enforce', () => {
        it('should deny an undeclared route regardless of tier', () => {
            const privileged: AccessState = { tier: 'PRIVILEGED', subject: 'Bob', principal: 'king' };
            const decision = enforce(privileged, policy, '/throne');

            assert.deepStrictEqual(decision, {
                outcome: 'DENIED',
                route: '/throne',
                requiredTier: null,
                state: privileged,
                reason: 'ACCESS_ROUTE_UNDECLARED',
            });
        });

        it('should distinguish a missing identity from an insufficient tier', () => {
            const anonymous = enforce(unauthenticated, policy, '/king');
            const citizen = enforce(identified, policy, '/king');

            assert.ok(anonymous.outcome === 'DENIED' && citizen.outcome === 'DENIED');
            assert.strictEqual(anonymous.reason, 'ACCESS_NO_IDENTITY');
            assert.strictEqual(citizen.reason, 'ACCESS_INSUFFICIENT_TIER');
        });
    });

    describe('evaluateAccess', () => {
        const cases: { label: string; request: AccessRequest; outcome: 'ALLOWED' | 'DENIED'; tier: AccessState['tier'] }[] = [
            { label: 'anonymous health check', request: { route: '/health', peer: NOBODY }, outcome: 'ALLOWED', tier: 'UNAUTHENTICATED' },
            { label: 'anonymous peasant', request: { route: '/peasant', peer: NOBODY }, outcome: 'DENIED', tier: 'UNAUTHENTICATED' },
            {
                label: 'anonymous caller with the privileged token',
                request: { route: '/king', peer: NOBODY, authorization: 'Bearer test-secret' },
                outcome: 'DENIED',
                tier: 'UNAUTHENTICATED',
            },
            { label: 'citizen health check', request: { route: '/health', peer: BOB }, outcome: 'ALLOWED', tier: 'IDENTIFIED' },
            { label: 'citizen peasant', request: { route: '/peasant', peer: BOB }, outcome: 'ALLOWED', tier: 'IDENTIFIED' },
            { label: 'citizen king', request: { route: '/king', peer: BOB }, outcome: 'DENIED', tier: 'IDENTIFIED' },
            {
                label: 'citizen king with a wrong token',
                request: { route: '/king', peer: BOB, authorization: 'Bearer wrong-secret' },
                outcome: 'DENIED',
                tier: 'IDENTIFIED',
            },
            {
                label: 'privileged king',
                request: { route: '/king', peer: BOB, authorization: 'Bearer test-secret' },
                outcome: 'ALLOWED',
                tier: 'PRIVILEGED',
            },
            {
                label: 'privileged peasant',
                request: { route: '/peasant', peer: BOB, authorization: 'Bearer test-secret' },
                outcome: 'ALLOWED',
                tier: 'PRIVILEGED',
            },
        ];

        for (const { label, request, outcome, tier } of cases) {
            it(`should decide ${label}`, () => {
                const decision = evaluateAccess(request, { policy, verifier });

                assert.strictEqual(decision.outcome, outcome);
                assert.strictEqual(decision.state.tier, tier);
            });
        }

        it('should escalate a client whose configured secret contains spaces', () => {
            const spaced = new SharedSecretVerifier([{ principal: 'king', secret: 'royal secret' }]);
            const strategy = privileged({ role: 'client', subject: 'CN=Bob, O=Test Realm', options: {} }, 'royal secret');
            const { headers } = decorate(strategy, { method: 'GET', path: '/king', headers: {} });

            const decision = evaluateAccess({ route: '/king', peer: BOB, authorization: headers.authorization }, { policy, verifier: spaced });

            assert.strictEqual(decision.outcome, 'ALLOWED');
            assert.deepStrictEqual(decision.state, { tier: 'PRIVILEGED', subject: 'Bob', principal: 'king' });
        });

        it('should reach the same decision every time for the same request', () => {
            for (const { request } of cases) {
                assert.deepStrictEqual(
                    evaluateAccess(request, { policy, verifier }),
                    evaluateAccess(request, { policy, verifier })
                );
            }
        });

        it('should never lower the tier a certificate established', () => {
            for (const authorization of [undefined, 'Bearer wrong-secret', 'Basic abc', 'Bearer test-secret']) {
                const decision = evaluateAccess({ route: '/health', peer: BOB, authorization }, { policy, verifier });
                assert.ok(tierRank(decision.state.tier) >= tierRank('IDENTIFIED'));
            }
        });

        it('should admit a higher tier wherever a lower one is admitted', () => {
            for (const [route] of policy.entries()) {
                const lower = evaluateAccess({ route, peer: BOB }, { policy, verifier });
                const higher = evaluateAccess({ route, peer: BOB, authorization: 'Bearer test-secret' }, { policy, verifier });
                if (lower.outcome === 'ALLOWED') {
                    assert.strictEqual(higher.outcome, 'ALLOWED', route);
                }
            }
        });
    });

    describe('AccessDeniedError', () => {
        it('should answer 401 when no identity was established', () => {
            const decision = evaluateAccess({ route: '/peasant', peer: NOBODY }, { policy, verifier });
            assert.ok(decision.outcome === 'DENIED');
            const error = AccessDeniedError.fromDecision(decision);

            assert.strictEqual(error.statusCode, 401);
            assert.deepStrictEqual(error.toResponseBody(), {
                error: 'ACCESS_NO_IDENTITY',
                message: 'No client identity was established for this request',
                requiredTier: 'IDENTIFIED',
                currentTier: 'UNAUTHENTICATED',
            });
        });

        it('should answer 403 when the tier is too low', () => {
            const decision = evaluateAccess({ route: '/king', peer: BOB }, { policy, verifier });
            assert.ok(decision.outcome === 'DENIED');

            assert.strictEqual(AccessDeniedError.fromDecision(decision).statusCode, 403);
        });

        it('should answer 404 without a required tier for an undeclared route', () => {
            const decision = evaluateAccess({ route: '/throne', peer: BOB }, { policy, verifier });
            assert.ok(decision.outcome === 'DENIED');
            const error = AccessDeniedError.fromDecision(decision);

            assert.strictEqual(error.statusCode, 404);
            assert.deepStrictEqual(error.toResponseBody(), {
                error: 'ACCESS_ROUTE_UNDECLARED',
                message: 'Route has no declared access requirement',
                currentTier: 'IDENTIFIED',
            });
        });
    });
});
