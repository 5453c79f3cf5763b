/**
 * Route Policy
 * Total, explicit mapping from route to minimum trust tier.
 *
 * - No default entry: a route missing from the policy is denied.
 * - Immutable once built. Updates build a new policy and swap the holder's
 *   reference; requests snapshot the reference at pipeline entry.
 */

import { z } from 'zod';
import { TrustTierSchema } from './tiers.js';
import type { TrustTier } from '../context/identity.js';
import { ConfigurationError } from '../errors/ConfigurationError.js';
import { logger } from '../logging/logger.js';

export const RoutePolicySchema = z.record(
    z.string().startsWith('/', { message: 'Route identifiers must start with /' }),
    TrustTierSchema
).refine(routes => Object.keys(routes).length > 0, { message: 'Route policy declares no routes' });

export class RoutePolicy {
    private readonly routes: ReadonlyMap<string, TrustTier>;

    private constructor(routes: Map<string, TrustTier>) {
        this.routes = routes;
        Object.freeze(this);
    }

    static fromRecord(record: unknown): RoutePolicy {
        const result = RoutePolicySchema.safeParse(record);
        if (!result.success) {
            const details = result.error.issues.map(e => `${e.path.join('.') || '<root>'}: ${e.message}`);
            throw new ConfigurationError('CONFIG_INVALID_POLICY', 'routePolicy', `Invalid route policy: ${details.join('; ')}`);
        }
        return new RoutePolicy(new Map(Object.entries(result.data)));
    }

    requiredTier(route: string): TrustTier | undefined {
        return this.routes.get(route);
    }

    entries(): [string, TrustTier][] {
        return [...this.routes.entries()];
    }
}

/**
 * Startup check: every route the application mounts has a policy entry.
 */
export function assertRoutesDeclared(policy: RoutePolicy, routes: readonly string[]): void {
    const undeclared = routes.filter(route => policy.requiredTier(route) === undefined);
    if (undeclared.length > 0) {
        throw new ConfigurationError(
            'CONFIG_INVALID_POLICY',
            'routePolicy',
            `Routes mounted without an access requirement: ${undeclared.join(', ')}`
        );
    }
}

export class RoutePolicyHolder {
    private active: RoutePolicy;

    constructor(initial: RoutePolicy) {
        this.active = initial;
    }

    current(): RoutePolicy {
        return this.active;
    }

    swap(next: RoutePolicy): RoutePolicy {
        const previous = this.active;
        this.active = next;
        logger.info({ component: 'RoutePolicy', routes: Object.fromEntries(next.entries()) }, 'Route policy replaced');
        return previous;
    }
}
