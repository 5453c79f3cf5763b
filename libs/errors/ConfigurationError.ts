/**
 * ConfigurationError
 * Fatal at startup or strategy selection. Never retried, never degraded.
 */

export type ConfigurationErrorCode =
    | 'CONFIG_MISSING_PARAMETER'
    | 'CONFIG_INVALID_MATERIAL'
    | 'CONFIG_INVALID_POLICY'
    | 'CONFIG_INVALID_VALUE';

export class ConfigurationError extends Error {
    readonly code: ConfigurationErrorCode;
    readonly key: string;

    constructor(code: ConfigurationErrorCode, key: string, message?: string, options?: { cause?: unknown }) {
        super(message || `${code}: ${key}`, options);
        this.name = 'ConfigurationError';
        this.code = code;
        this.key = key;
        Object.setPrototypeOf(this, ConfigurationError.prototype);
    }

    static missing(key: string): ConfigurationError {
        return new ConfigurationError('CONFIG_MISSING_PARAMETER', key, `Missing configuration: ${key}`);
    }
}
