import { logger } from "../logging/logger.js";
import { enforceMtlsConfig } from "./mtls-guard.js";
import { SecureTransportFactory, type ServerTransport } from "./mtls.js";
import { loadServerConfig, type ServerConfig } from "./config/server-config.js";
import { loadKeyBundle, loadTrustList, type MaterialReader, readMaterialFile } from "../pki/trustMaterial.js";
import { SharedSecretVerifier } from "../auth/privilege.js";
import { type ConfigLookup, envLookup } from "../config/lookup.js";

export interface GatewayRuntime {
    config: ServerConfig;
    transport: ServerTransport;
    verifier: SharedSecretVerifier;
}

/**
 * Startup checks for the server role. Any failure is a ConfigurationError
 * and the caller must not start listening.
 */
export function bootstrap(
    serviceName: string,
    lookup: ConfigLookup = envLookup,
    read: MaterialReader = readMaterialFile
): GatewayRuntime {
    logger.info({ serviceName }, "Bootstrapping service");

    enforceMtlsConfig(lookup);
    const config = loadServerConfig(lookup);

    const bundle = loadKeyBundle(config.keystorePath, config.keystorePassword, read);
    const clientTrust = loadTrustList(config.clientTrustPath, config.clientTrustPassword, read);
    const transport = SecureTransportFactory.forServer(bundle, clientTrust);
    const verifier = new SharedSecretVerifier(config.privilegeGrants);

    logger.info({
        serviceName,
        identity: bundle.toJSON(),
        clientTrust: clientTrust.toJSON(),
        principals: config.privilegeGrants.map(g => g.principal)
    }, "Startup checks passed");

    return { config, transport, verifier };
}
