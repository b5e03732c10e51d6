/**
 * Structured request logging middleware.
 *
 * One pino line per request, carrying method, path, status, duration
 * and request id. Server errors log at error, client errors at warn.
 */

import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
}

export function loggerMiddleware(logger: Logger): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();

    await next();

    const entry: RequestLogEntry = {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Math.round(performance.now() - start),
      requestId: c.get("requestId"),
    };
    const message = `${entry.method} ${entry.path} ${entry.status}`;

    if (entry.status >= 500) {
      logger.error(entry, message);
    } else if (entry.status >= 400) {
      logger.warn(entry, message);
    } else {
      logger.info(entry, message);
    }
  };
}
