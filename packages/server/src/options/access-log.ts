import type { MiddlewareHandler } from "hono";
import type { Logger } from "@gatehouse/core/logger";
import { mediate, type ServeOption } from "../pipeline.js";

/** Debug record per request: method, path, status, duration. */
export function createAccessLogMiddleware(
  logger: Pick<Logger, "debug">,
): MiddlewareHandler {
  return async (c, next) => {
    const start = performance.now();
    await next();
    logger.debug(
      {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        durationMs: Math.round(performance.now() - start),
      },
      "Request served",
    );
  };
}

export function accessLogOption(logger: Pick<Logger, "debug">): ServeOption {
  return (_owner, mux) => mediate(mux, createAccessLogMiddleware(logger));
}
