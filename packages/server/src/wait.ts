const TICK = Symbol("tick");

export interface AbortWait {
  promise: Promise<void>;
  /** Detach from the signal once the wait is no longer needed. */
  dispose: () => void;
}

/** A promise that resolves when `signal` aborts (immediately if it already has). */
export function whenAborted(signal: AbortSignal): AbortWait {
  const detach = new AbortController();
  const promise = new Promise<void>((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener("abort", () => resolve(), {
      once: true,
      signal: detach.signal,
    });
  });
  return { promise, dispose: () => detach.abort() };
}

/**
 * Wait for `task` with no deadline, calling `onTick` every `intervalMs`
 * while it is still pending.
 */
export async function waitWithProgress<T>(
  task: Promise<T>,
  intervalMs: number,
  onTick: () => void,
): Promise<T> {
  for (;;) {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const tick = new Promise<typeof TICK>((resolve) => {
      timer = setTimeout(() => resolve(TICK), intervalMs);
    });

    const result = await Promise.race([
      task.then((value) => ({ value })),
      tick,
    ]);
    clearTimeout(timer);

    if (result !== TICK) return result.value;
    onTick();
  }
}
