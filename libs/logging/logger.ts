import pino from "pino";
import type { AccessState } from "../context/identity.js";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: {
    system: "tiergate"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

/**
 * Returns a child logger with the request's access state attached.
 */
export function getAccessLogger(requestId: string, state: AccessState) {
  return logger.child({
    requestId,
    subject: state.tier === "UNAUTHENTICATED" ? null : state.subject,
    tier: state.tier
  });
}
