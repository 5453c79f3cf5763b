import { bootstrap } from "../../../libs/bootstrap/startup.js";
import { logger } from "../../../libs/logging/logger.js";
import { RoutePolicy, RoutePolicyHolder } from "../../../libs/auth/routePolicy.js";
import { createGatewayApp, createSecureServer, listen } from "../../../libs/http/server.js";
import { GATEWAY_POLICY, GATEWAY_ROUTES } from "./routes.js";

async function main() {
    const { config, transport, verifier } = bootstrap("gateway");

    const app = createGatewayApp({
        policy: new RoutePolicyHolder(RoutePolicy.fromRecord(GATEWAY_POLICY)),
        verifier,
        routes: GATEWAY_ROUTES,
        subjectPattern: config.subjectPattern,
    });

    const server = createSecureServer(app, transport);
    await listen(server, config.port, config.host);

    logger.info({ subject: transport.subject }, "Gateway initialized");
}

main().catch(err => {
    logger.fatal(err);
    process.exit(1);
});
