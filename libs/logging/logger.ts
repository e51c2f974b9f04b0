import pino from "pino";
import { RequestContext, type RequestScope } from "../context/requestContext.js";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: {
    system: "platform-api"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

/**
 * Returns a child logger with request context attached.
 */
export function getContextLogger(context: RequestScope) {
  return logger.child({
    requestId: context.requestId,
    method: context.method,
    path: context.path
  });
}

/**
 * Logger for the active request scope, falling back to the root logger.
 */
export function scopedLogger() {
  const scope = RequestContext.tryGet();
  return scope ? getContextLogger(scope) : logger;
}
