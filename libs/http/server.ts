import express from 'express';
import type { Express, Request, RequestHandler, Response } from 'express';
import https from 'https';
import type { AddressInfo } from 'net';
import type { ServerTransport } from '../bootstrap/mtls.js';
import type { PrivilegeVerifier } from '../auth/privilege.js';
import { RoutePolicyHolder, assertRoutesDeclared } from '../auth/routePolicy.js';
import type { AccessAuditSink } from '../audit/accessAudit.js';
import { loggerAuditSink } from '../audit/accessAudit.js';
import { createAccessMiddleware, accessErrorHandler } from './accessMiddleware.js';
import { logger } from '../logging/logger.js';

export interface TierRoute {
    method: 'get' | 'post' | 'put' | 'delete';
    path: string;
    handler: (req: Request, res: Response) => void | Promise<void>;
}

export interface GatewayAppOptions {
    policy: RoutePolicyHolder;
    verifier: PrivilegeVerifier;
    routes: readonly TierRoute[];
    subjectPattern?: RegExp;
    audit?: AccessAuditSink;
}

/**
 * Express application with the access pipeline in front of every route.
 * Refuses to build when a route has no policy entry.
 */
export function createGatewayApp(options: GatewayAppOptions): Express {
    assertRoutesDeclared(options.policy.current(), options.routes.map(r => r.path));

    const app = express();
    app.disable('x-powered-by');
    app.use(createAccessMiddleware(options));
    app.use(express.json());

    for (const route of options.routes) {
        const handler: RequestHandler = (req, res, next) => {
            Promise.resolve()
                .then(() => route.handler(req, res))
                .catch(next);
        };
        app.route(route.path)[route.method](handler);
    }

    app.use((_req, res) => {
        res.status(404).json({ error: 'NOT_FOUND' });
    });
    app.use(accessErrorHandler);

    return app;
}

function errorCode(err: Error): string | undefined {
    return 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

/**
 * HTTPS listener using the server transport. Failed handshakes are audited
 * as transport rejections; they never reach the application.
 */
export function createSecureServer(
    app: Express,
    transport: ServerTransport,
    audit: AccessAuditSink = loggerAuditSink
): https.Server {
    const server = https.createServer(transport.options, app);

    server.on('tlsClientError', (err, socket) => {
        audit.recordTransportRejection({
            remoteAddress: socket.remoteAddress,
            code: errorCode(err),
            reason: err.message,
        });
    });

    return server;
}

export function listen(server: https.Server, port: number, host: string): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(port, host, () => {
            server.off('error', reject);
            const address = server.address();
            if (address === null || typeof address === 'string') {
                reject(new Error(`Unexpected listen address: ${String(address)}`));
                return;
            }
            logger.info({ host: address.address, port: address.port }, 'mTLS listener ready');
            resolve(address);
        });
    });
}

export function close(server: https.Server): Promise<void> {
    return new Promise((resolve, reject) => {
        server.close(err => (err ? reject(err) : resolve()));
        server.closeAllConnections();
    });
}
