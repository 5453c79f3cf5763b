/**
 * Key → value configuration source. Decouples selectors and guards from
 * where values live (environment, config file, secret store).
 */
export type ConfigLookup = (key: string) => string | undefined;

export const envLookup: ConfigLookup = (key) => process.env[key];

export function mapLookup(values: Readonly<Record<string, string | undefined>>): ConfigLookup {
    return (key) => (Object.prototype.hasOwnProperty.call(values, key) ? values[key] : undefined);
}

/**
 * Trimmed value, or undefined when absent or blank.
 */
export function readValue(lookup: ConfigLookup, key: string): string | undefined {
    const value = lookup(key)?.trim();
    return value ? value : undefined;
}
