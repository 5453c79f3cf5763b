import { logger } from "../../../libs/logging/logger.js";
import { createClient } from "../../../libs/client/tierClient.js";
import { TransportRejectedError } from "../../../libs/client/TransportRejectedError.js";

/**
 * Calls the gateway's routes under the configured client role and reports
 * what each answered.
 */
async function main() {
    const client = createClient();

    try {
        for (const path of ["/peasant", "/king"]) {
            try {
                const response = await client.request(path);
                logger.info({ path, statusCode: response.statusCode, body: response.body }, "Gateway answered");
            } catch (err) {
                if (!(err instanceof TransportRejectedError)) throw err;
                logger.error({ path, code: err.code, error: err.message }, "Connection rejected");
                process.exitCode = 2;
                return;
            }
        }
    } finally {
        client.close();
    }
}

main().catch(err => {
    logger.fatal(err);
    process.exit(1);
});
