import { logger } from '../logging/logger.js';
import { ConfigurationError } from '../errors/ConfigurationError.js';
import { type ConfigLookup, envLookup, readValue } from '../config/lookup.js';

export type GuardRule =
    | { type: 'required'; name: string }
    | { type: 'forbidIf'; name: string; when: (lookup: ConfigLookup) => boolean; message: string }
    | { type: 'assert'; name: string; check: (lookup: ConfigLookup) => boolean; message: string };

/**
 * Fail-closed configuration guard.
 * Collects every violation, logs them together, then refuses to continue.
 */
export class ConfigGuard {
    static enforce(rules: GuardRule[], lookup: ConfigLookup = envLookup): void {
        const violations: { name: string; message: string; missing: boolean }[] = [];

        for (const rule of rules) {
            try {
                switch (rule.type) {
                    case 'required': {
                        if (!readValue(lookup, rule.name)) {
                            violations.push({ name: rule.name, message: `Required value ${rule.name} is missing`, missing: true });
                        }
                        break;
                    }

                    case 'forbidIf': {
                        if (rule.when(lookup)) {
                            violations.push({ name: rule.name, message: `${rule.message} (Rule: ${rule.name})`, missing: false });
                        }
                        break;
                    }

                    case 'assert': {
                        if (!rule.check(lookup)) {
                            violations.push({ name: rule.name, message: rule.message, missing: false });
                        }
                        break;
                    }
                }
            } catch (err: unknown) {
                const message = err instanceof Error ? err.message : String(err);
                violations.push({ name: rule.name, message: `Check failed: ${message}`, missing: false });
            }
        }

        const first = violations[0];
        if (first) {
            logger.fatal({
                errors: violations.map(v => v.message),
                remediation: "Check configuration values. No defaults allowed."
            }, "Configuration Guard Violation");

            throw first.missing
                ? ConfigurationError.missing(first.name)
                : new ConfigurationError('CONFIG_INVALID_VALUE', first.name, first.message);
        }

        logger.debug("Configuration guard passed.");
    }
}
