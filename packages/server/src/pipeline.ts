import { Hono, type Context, type MiddlewareHandler } from "hono";
import { CompositionError, GatehouseError } from "@gatehouse/core/errors";
import type { ServerOwner } from "@gatehouse/core/host";
import type { Logger } from "@gatehouse/core/logger";

/**
 * Registers routes on the mux it is given and returns the mux later options
 * should register on: the same one, or a child it mediates. Throw to fail
 * the build.
 */
export type ServeOption = (owner: ServerOwner, mux: Hono) => Hono;

export interface MakeHandlerOptions {
  logger?: Pick<Logger, "warn" | "error">;
}

function notFound(c: Context): Response {
  return c.json(
    {
      error: {
        code: 404,
        errorCode: "NOT_FOUND",
        message: "Not found",
      },
    },
    404,
  );
}

/** A mux with the JSON 404 envelope. */
export function createMux(): Hono {
  const mux = new Hono();
  mux.notFound(notFound);
  return mux;
}

/**
 * Put `middleware` in front of a new child mux and mount the child on `mux`.
 *
 * The child is dispatched to at request time, so routes registered on it
 * after mounting are still reachable from `mux`. Routes already on `mux`
 * match before the child; routes added to `mux` later are shadowed by it.
 */
export function mediate(mux: Hono, ...middleware: MiddlewareHandler[]): Hono {
  const child = createMux();
  // Errors surface to the top-level mux's onError.
  child.onError((err) => {
    throw err;
  });
  if (middleware.length > 0) {
    child.use("*", ...middleware);
  }
  mux.mount("/", child.fetch);
  return child;
}

/**
 * Fold serve options into a single handler, in order.
 *
 * The first option that throws stops the build and its error propagates
 * unchanged. The returned handler is always the top-level mux, whatever mux
 * the last option handed on.
 */
export function makeHandler(
  owner: ServerOwner,
  options: readonly ServeOption[],
  handlerOptions: MakeHandlerOptions = {},
): Hono {
  const topMux = createMux();
  const logger = handlerOptions.logger;

  topMux.onError((err, c) => {
    if (err instanceof GatehouseError) {
      logger?.warn({ err }, err.message);
      return c.json(err.toJSON(), err.code >= 500 ? 500 : 400);
    }

    logger?.error({ err }, "Unhandled error");
    return c.json(
      {
        error: {
          code: 500,
          errorCode: "INTERNAL_ERROR",
          message: "Internal server error",
        },
      },
      500,
    );
  });

  let mux: Hono = topMux;
  options.forEach((option, index) => {
    const next: unknown = option(owner, mux);
    if (!(next instanceof Hono)) {
      throw new CompositionError({ index, name: option.name || "anonymous" });
    }
    mux = next;
  });

  return topMux;
}
