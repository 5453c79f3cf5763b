/**
 * TransportRejectedError
 * The connection failed before any HTTP response: handshake rejected, peer
 * reset, refused or timed out. Terminal for the attempt; never retried with
 * other credentials.
 */
export class TransportRejectedError extends Error {
    readonly code: string | undefined;
    readonly url: string;

    constructor(url: string, cause: unknown) {
        const code = cause instanceof Error && 'code' in cause && typeof cause.code === 'string' ? cause.code : undefined;
        const detail = cause instanceof Error ? cause.message : String(cause);
        super(`Connection to ${url} failed: ${detail}`, { cause });
        this.name = 'TransportRejectedError';
        this.code = code;
        this.url = url;
        Object.setPrototypeOf(this, TransportRejectedError.prototype);
    }
}
