import https from 'https';
import type { IncomingHttpHeaders } from 'http';
import { type ConfigLookup, envLookup, readValue } from '../config/lookup.js';
import type { MaterialReader } from '../pki/trustMaterial.js';
import { readMaterialFile } from '../pki/trustMaterial.js';
import { logger } from '../logging/logger.js';
import { selectStrategy } from './selector.js';
import { type ConnectionStrategy, type RequestBuilder, configure, decorate, describeStrategy } from './strategy.js';
import { TransportRejectedError } from './TransportRejectedError.js';

const DEFAULT_BASE_URL = 'https://localhost:8443';
const DEFAULT_TIMEOUT_MS = 10_000;

export interface TierClientOptions {
    baseUrl?: string;
    timeoutMs?: number;
}

export interface TierResponse {
    statusCode: number;
    headers: IncomingHttpHeaders;
    body: string;
}

/**
 * HTTPS client bound to one connection strategy.
 * The agent (TLS identity, server trust, keep-alive pool) is configured once;
 * credentials are attached to each request as it is built.
 */
export class TierClient {
    private readonly agent: https.Agent;
    private readonly baseUrl: URL;
    private readonly timeoutMs: number;
    private readonly log: ReturnType<typeof logger.child>;

    constructor(private readonly strategy: ConnectionStrategy, options: TierClientOptions = {}) {
        this.baseUrl = new URL(options.baseUrl ?? DEFAULT_BASE_URL);
        this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
        this.agent = new https.Agent(configure(strategy, { keepAlive: true }));
        this.log = logger.child({ component: 'TierClient', ...describeStrategy(strategy), baseUrl: this.baseUrl.origin });
    }

    /**
     * HTTP-level rejections (401/403/404) come back as responses; the
     * connection stays usable. Anything failing before a response is a
     * TransportRejectedError.
     */
    request(path: string, init: { method?: string; headers?: Record<string, string>; body?: string } = {}): Promise<TierResponse> {
        // Credentials only ever go to the configured origin.
        const target = new URL(path, this.baseUrl);
        if (target.origin !== this.baseUrl.origin) {
            return Promise.reject(new Error(`Request path ${path} resolves outside ${this.baseUrl.origin}`));
        }

        const base: RequestBuilder = {
            method: init.method ?? 'GET',
            path,
            headers: { accept: 'application/json', ...init.headers },
        };
        const request = decorate(this.strategy, base);
        const url = new URL(request.path, this.baseUrl);

        return new Promise<TierResponse>((resolve, reject) => {
            const req = https.request(url, {
                agent: this.agent,
                method: request.method,
                headers: request.headers,
                timeout: this.timeoutMs,
            }, res => {
                const chunks: Buffer[] = [];
                res.on('data', (chunk: Buffer) => chunks.push(chunk));
                res.on('error', err => reject(new TransportRejectedError(url.href, err)));
                res.on('end', () => {
                    const response = {
                        statusCode: res.statusCode ?? 0,
                        headers: res.headers,
                        body: Buffer.concat(chunks).toString('utf8'),
                    };
                    this.log.debug({ path: url.pathname, statusCode: response.statusCode }, 'Response received');
                    resolve(response);
                });
            });

            req.on('timeout', () => {
                req.destroy(Object.assign(new Error(`Request timed out after ${this.timeoutMs}ms`), { code: 'ETIMEDOUT' }));
            });
            req.on('error', err => {
                this.log.warn({ path: url.pathname, error: err.message }, 'Connection failed');
                reject(new TransportRejectedError(url.href, err));
            });

            if (init.body !== undefined) {
                req.write(init.body);
            }
            req.end();
        });
    }

    close(): void {
        this.agent.destroy();
    }
}

/**
 * Client from configuration: CLIENT_ROLE and friends select the strategy,
 * API_BASE_URL the target.
 */
export function createClient(lookup: ConfigLookup = envLookup, read: MaterialReader = readMaterialFile): TierClient {
    const strategy = selectStrategy(lookup, read);
    return new TierClient(strategy, { baseUrl: readValue(lookup, 'API_BASE_URL') });
}
