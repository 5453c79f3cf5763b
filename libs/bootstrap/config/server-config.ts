import { z } from 'zod';
import { type ConfigLookup, envLookup, readValue } from '../../config/lookup.js';
import { ConfigurationError } from '../../errors/ConfigurationError.js';
import { validate } from '../../validation/zod-middleware.js';
import { DEFAULT_SUBJECT_PATTERN } from '../../auth/accessPipeline.js';

/**
 * Gateway (server role) configuration.
 * Material references are paths; passwords stay out of logs via redaction.
 */

const SERVER_KEYS = [
    'TLS_KEYSTORE_PATH',
    'TLS_KEYSTORE_PASSWORD',
    'TLS_CLIENT_TRUST_PATH',
    'TLS_CLIENT_TRUST_PASSWORD',
    'PRIVILEGE_TOKEN',
    'PRIVILEGE_PRINCIPAL',
    'SUBJECT_PATTERN',
    'PORT',
    'HOST',
] as const;

export const ServerConfigSchema = z.object({
    TLS_KEYSTORE_PATH: z.string().min(1),
    TLS_KEYSTORE_PASSWORD: z.string().min(1),
    TLS_CLIENT_TRUST_PATH: z.string().min(1),
    TLS_CLIENT_TRUST_PASSWORD: z.string().optional(),
    PRIVILEGE_TOKEN: z.string().min(1),
    PRIVILEGE_PRINCIPAL: z.string().min(1).default('privileged'),
    SUBJECT_PATTERN: z.string().default(DEFAULT_SUBJECT_PATTERN.source),
    PORT: z.coerce.number().int().min(0).max(65535).default(8443),
    HOST: z.string().default('0.0.0.0'),
}).strict();

export interface ServerConfig {
    keystorePath: string;
    keystorePassword: string;
    clientTrustPath: string;
    clientTrustPassword: string | undefined;
    privilegeGrants: { principal: string; secret: string }[];
    subjectPattern: RegExp;
    port: number;
    host: string;
}

function compilePattern(source: string): RegExp {
    let pattern: RegExp;
    try {
        pattern = new RegExp(source);
    } catch (err) {
        throw new ConfigurationError('CONFIG_INVALID_VALUE', 'SUBJECT_PATTERN', `SUBJECT_PATTERN is not a valid expression: ${source}`, { cause: err });
    }
    // One capture group carries the subject.
    if (new RegExp(`${source}|`).exec('')?.length === 1) {
        throw new ConfigurationError('CONFIG_INVALID_VALUE', 'SUBJECT_PATTERN', 'SUBJECT_PATTERN needs a capture group');
    }
    return pattern;
}

export function loadServerConfig(lookup: ConfigLookup = envLookup): ServerConfig {
    const raw: Record<string, string> = {};
    for (const key of SERVER_KEYS) {
        const value = readValue(lookup, key);
        if (value !== undefined) raw[key] = value;
    }

    for (const key of ['TLS_KEYSTORE_PATH', 'TLS_KEYSTORE_PASSWORD', 'TLS_CLIENT_TRUST_PATH', 'PRIVILEGE_TOKEN'] as const) {
        if (raw[key] === undefined) {
            throw ConfigurationError.missing(key);
        }
    }

    let parsed: z.infer<typeof ServerConfigSchema>;
    try {
        parsed = validate(ServerConfigSchema, raw, 'ServerConfig');
    } catch (err) {
        throw new ConfigurationError('CONFIG_INVALID_VALUE', 'ServerConfig', err instanceof Error ? err.message : String(err), { cause: err });
    }

    return {
        keystorePath: parsed.TLS_KEYSTORE_PATH,
        keystorePassword: parsed.TLS_KEYSTORE_PASSWORD,
        clientTrustPath: parsed.TLS_CLIENT_TRUST_PATH,
        clientTrustPassword: parsed.TLS_CLIENT_TRUST_PASSWORD,
        privilegeGrants: [{ principal: parsed.PRIVILEGE_PRINCIPAL, secret: parsed.PRIVILEGE_TOKEN }],
        subjectPattern: compilePattern(parsed.SUBJECT_PATTERN),
        port: parsed.PORT,
        host: parsed.HOST,
    };
}
