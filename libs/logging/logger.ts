import pino, { type Logger } from "pino";
import type { RequestScope } from "../context/requestContext.js";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: {
    system: "resource-api"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

export type { Logger };

/**
 * Returns a child logger with request scope attached.
 */
export function getContextLogger(scope: RequestScope): Logger {
  return logger.child({
    correlationId: scope.breadcrumb.correlation_id,
    userId: scope.token.userId
  });
}
