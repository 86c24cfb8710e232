import type { Hono } from "hono";
import {
  formatAddress,
  fromSocketAddress,
  normalizeAddress,
  parseAddress,
} from "@gatehouse/core/address";
import { PersistenceError } from "@gatehouse/core/errors";
import type { ServerOwner } from "@gatehouse/core/host";
import {
  ListenerStateMachine,
  type StateChangeListener,
} from "@gatehouse/core/lifecycle";
import type { LifecycleLogger, Logger } from "@gatehouse/core/logger";
import {
  bindTcpListener,
  type BindListener,
  type BoundListener,
  type FetchHandler,
} from "./listener.js";
import { makeHandler, type ServeOption } from "./pipeline.js";
import { waitWithProgress, whenAborted } from "./wait.js";

export const API_ADDRESS_KEY = "addresses.api";
export const DEFAULT_GRACE_LOG_INTERVAL_MS = 5_000;

export interface ServeOptions {
  logger: LifecycleLogger;
  /** Config key the bound address is recorded under. */
  configKey?: string;
  /**
   * Interval between "still waiting" records after closing. The wait itself
   * has no deadline.
   */
  graceLogIntervalMs?: number;
  bind?: BindListener;
  onStateChange?: StateChangeListener;
}

export interface ListenAndServeOptions extends ServeOptions {
  /** Also receives request errors from the composed handler. */
  logger: Pick<Logger, "info" | "debug" | "warn" | "error">;
}

export interface Handler {
  fetch: FetchHandler;
}

type FirstEvent =
  | { source: "server"; err: Error | undefined }
  | { source: "owner" };

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Serve `handler` on the endpoint described by `address` until the server
 * exits on its own or `owner` signals closing.
 *
 * The concrete bound address (ephemeral port resolved) is written to the
 * owner's config store before any connection reaches the handler. Resolves
 * when the server stopped because the owner is closing; rejects with the
 * error that stopped it otherwise.
 */
export async function serve(
  owner: ServerOwner,
  address: string,
  handler: Handler,
  options: ServeOptions,
): Promise<void> {
  const { logger } = options;
  const configKey = options.configKey ?? API_ADDRESS_KEY;
  const graceLogIntervalMs =
    options.graceLogIntervalMs ?? DEFAULT_GRACE_LOG_INTERVAL_MS;
  const bind = options.bind ?? bindTcpListener;

  const sm = new ListenerStateMachine();
  if (options.onStateChange) sm.onStateChange(options.onStateChange);

  sm.transition("resolving", address);
  let listener: BoundListener;
  try {
    listener = await bind(parseAddress(address));
  } catch (err) {
    sm.transition("failed", errorMessage(err));
    throw err;
  }

  let closed = false;
  const closeListener = () => {
    if (closed) return;
    closed = true;
    listener.close();
  };

  sm.transition("bound");
  let boundAddress: string;
  try {
    boundAddress = formatAddress(fromSocketAddress(listener.address()));
  } catch (err) {
    closeListener();
    sm.transition("failed", errorMessage(err));
    throw err;
  }

  try {
    await owner.setConfigKey(configKey, boundAddress);
  } catch (err) {
    closeListener();
    sm.transition("failed", errorMessage(err));
    throw err instanceof PersistenceError
      ? err
      : new PersistenceError(configKey, boundAddress, err);
  }
  logger.info({ address: boundAddress }, "API server listening");

  owner.children.add();
  const closing = whenAborted(owner.closing);
  try {
    sm.transition("serving");
    const exited = listener.serve(handler.fetch);

    const first = await Promise.race<FirstEvent>([
      exited.then((err) => ({ source: "server" as const, err })),
      closing.promise.then(() => ({ source: "owner" as const })),
    ]);

    let terminalError: Error | undefined;
    if (first.source === "server") {
      sm.transition("exited", first.err && errorMessage(first.err));
      terminalError = first.err;
      closeListener();
    } else {
      logger.info({ address: boundAddress }, "Server terminating");
      sm.transition("closing");
      closeListener();

      sm.transition("grace-wait");
      const err = await waitWithProgress(exited, graceLogIntervalMs, () => {
        logger.info(
          { address: boundAddress },
          "Waiting for server to terminate",
        );
      });
      // Stopped on purpose during owner shutdown, not a failure.
      if (err) {
        logger.debug(
          { address: boundAddress, err },
          "Ignoring error from server stopped during shutdown",
        );
      }
    }

    logger.info({ address: boundAddress }, "Server terminated");
    sm.transition("terminated");
    if (terminalError) throw terminalError;
  } finally {
    closing.dispose();
    closeListener();
    owner.children.done();
  }
}

/**
 * Build a handler from `serveOptions` and serve it on `address`, which may
 * also be `host:port` shorthand (":8080" listens on every IPv4 interface).
 * A malformed address fails before any option runs.
 */
export async function listenAndServe(
  owner: ServerOwner,
  address: string,
  serveOptions: readonly ServeOption[],
  options: ListenAndServeOptions,
): Promise<void> {
  const descriptor = normalizeAddress(address);
  const handler: Hono = makeHandler(owner, serveOptions, {
    logger: options.logger,
  });
  return serve(owner, descriptor, handler, options);
}

export { makeHandler, mediate, createMux, type ServeOption } from "./pipeline.js";
export {
  bindTcpListener,
  type BindListener,
  type BoundListener,
  type FetchHandler,
} from "./listener.js";
