import { logger } from '../logging/logger.js';
import crypto from 'crypto';

/**
 * Wraps unexpected errors in a generic message plus an incident ID, so
 * internals stay in the log and the caller only sees the correlation handle.
 */

export class SanitizedError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly contextLabel?: string;
    public override cause?: unknown;

    constructor(
        public readonly publicMessage: string,
        public readonly internalDetails?: unknown,
        options?: { cause?: unknown; contextLabel?: string }
    ) {
        super(publicMessage);
        this.name = 'SanitizedError';
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.contextLabel = options?.contextLabel;
        this.cause = options?.cause;

        logger.error({
            incidentId: this.incidentId,
            contextLabel: this.contextLabel,
            internalDetails,
            stack: this.stack
        }, publicMessage);
    }
}

export const ErrorSanitizer = {
    sanitize: (err: unknown, contextLabel: string): SanitizedError => {
        if (err instanceof SanitizedError) return err;

        let originalErrorMessage: string | undefined;
        let originalErrorStack: string | undefined;

        if (err instanceof Error) {
            originalErrorMessage = err.message;
            originalErrorStack = err.stack;
        } else if (typeof err === 'string') {
            originalErrorMessage = err;
        } else if (err && typeof err === 'object' && 'message' in err && typeof err.message === 'string') {
            originalErrorMessage = err.message;
        } else {
            originalErrorMessage = String(err);
        }

        return new SanitizedError(
            'An internal error occurred. Quote the incident ID when reporting it.',
            { originalError: originalErrorMessage, stack: originalErrorStack, context: contextLabel },
            { cause: err, contextLabel }
        );
    }
};
