import type { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../logging/logger.js';

/**
 * Fail-closed validation: returns the parsed value or throws with every
 * issue listed. Values are never logged, only paths and messages.
 */
export function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown, context: string): T {
    const result = schema.safeParse(data);

    if (!result.success) {
        const errorDetails = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        logger.warn({ context, errors: errorDetails }, "Input Validation Failure");

        throw new Error(`Validation Violation in ${context}: ${JSON.stringify(errorDetails)}`);
    }

    return result.data;
}
