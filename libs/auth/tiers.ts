import { z } from 'zod';
import type { TrustTier } from '../context/identity.js';

/** Lowest first. */
export const TIER_ORDER = ['UNAUTHENTICATED', 'IDENTIFIED', 'PRIVILEGED'] as const satisfies readonly TrustTier[];

export const TrustTierSchema = z.enum(TIER_ORDER);

export function tierRank(tier: TrustTier): number {
    return TIER_ORDER.indexOf(tier);
}

/**
 * True when `current` is at or above `required`.
 */
export function meetsTier(current: TrustTier, required: TrustTier): boolean {
    return tierRank(current) >= tierRank(required);
}
