import type { Logger } from "pino";
import type { Host } from "./host.js";

type SignalListener = (signal: NodeJS.Signals) => void;

export interface SignalSource {
  on(event: NodeJS.Signals, listener: SignalListener): unknown;
  off(event: NodeJS.Signals, listener: SignalListener): unknown;
}

export interface SignalHandlerOptions {
  signals?: NodeJS.Signals[];
  source?: SignalSource;
  /** Called on a second signal while the host is still closing. */
  exit?: (code: number) => void;
}

/**
 * Close the host on the first SIGINT/SIGTERM; exit hard on the second.
 * Returns a function that removes the handlers.
 */
export function installSignalHandlers(
  host: Host,
  logger: Logger,
  options: SignalHandlerOptions = {},
): () => void {
  const signals = options.signals ?? ["SIGINT", "SIGTERM"];
  const source = options.source ?? process;
  const exit = options.exit ?? ((code: number) => process.exit(code));

  const onSignal: SignalListener = (signal) => {
    if (host.isClosing()) {
      logger.warn(
        { signal },
        "Received another signal before graceful shutdown finished, terminating",
      );
      exit(1);
      return;
    }
    logger.info({ signal }, "Shutdown signal received, closing host");
    void host.close(signal);
  };

  for (const signal of signals) source.on(signal, onSignal);
  return () => {
    for (const signal of signals) source.off(signal, onSignal);
  };
}
