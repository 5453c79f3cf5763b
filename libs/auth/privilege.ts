/**
 * Privilege Verifier
 * Compares a caller-supplied bearer value against server-held secrets.
 *
 * Each grant names the privileged principal its secret stands for, so several
 * callers can hold distinct secrets. Provisioning and rotation of the secrets
 * belong to whatever fills the grant list.
 */

import crypto from 'crypto';
import { ConfigurationError } from '../errors/ConfigurationError.js';

export interface PrivilegeGrant {
    readonly principal: string;
    readonly secret: string;
}

export interface PrivilegeVerifier {
    /** Principal of the matching grant, or undefined. */
    verify(token: string): string | undefined;
}

function digest(value: string): Buffer {
    return crypto.createHash('sha256').update(value, 'utf8').digest();
}

export class SharedSecretVerifier implements PrivilegeVerifier {
    private readonly grants: readonly { principal: string; digest: Buffer }[];

    constructor(grants: readonly PrivilegeGrant[]) {
        if (grants.length === 0) {
            throw ConfigurationError.missing('PRIVILEGE_TOKEN');
        }

        const seen = new Set<string>();
        for (const grant of grants) {
            if (!grant.principal.trim()) {
                throw new ConfigurationError('CONFIG_INVALID_VALUE', 'PRIVILEGE_PRINCIPAL', 'Privilege grant has a blank principal');
            }
            if (!grant.secret.trim()) {
                throw new ConfigurationError('CONFIG_INVALID_VALUE', 'PRIVILEGE_TOKEN', `Privilege grant for ${grant.principal} has a blank secret`);
            }
            if (seen.has(grant.secret)) {
                throw new ConfigurationError('CONFIG_INVALID_VALUE', 'PRIVILEGE_TOKEN', 'Two privilege grants share one secret');
            }
            seen.add(grant.secret);
        }

        // Compared as SHA-256 digests, so lengths always match.
        this.grants = Object.freeze(grants.map(g => ({ principal: g.principal, digest: digest(g.secret) })));
    }

    verify(token: string): string | undefined {
        const presented = digest(token);
        let match: string | undefined;
        // Every grant is compared; no early exit.
        for (const grant of this.grants) {
            if (crypto.timingSafeEqual(presented, grant.digest) && match === undefined) {
                match = grant.principal;
            }
        }
        return match;
    }
}
