/**
 * Rejects requests that arrived through a reverse proxy or tunnel for every
 * route registered after this option.
 *
 * Detection:
 * - X-Forwarded-For header (added by proxies)
 * - x-gatehouse-transport: "tunnel" header
 */

import type { MiddlewareHandler } from "hono";
import { mediate, type ServeOption } from "../pipeline.js";

export function createLocalOnlyMiddleware(): MiddlewareHandler {
  return async (c, next) => {
    if (
      c.req.header("x-forwarded-for") ||
      c.req.header("x-gatehouse-transport") === "tunnel"
    ) {
      return c.json(
        {
          error: {
            code: 403,
            errorCode: "LOCAL_ONLY",
            message: "This endpoint is only accessible locally",
          },
        },
        403,
      );
    }
    await next();
  };
}

export function localOnlyOption(): ServeOption {
  return (_owner, mux) => mediate(mux, createLocalOnlyMiddleware());
}
