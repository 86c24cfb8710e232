import type { AddressInfo } from "node:net";
import { vi } from "vitest";
import { MemoryConfigStore } from "@gatehouse/core/config";
import { Host } from "@gatehouse/core/host";
import type { BoundListener, FetchHandler } from "../listener.js";

export function createTestHost(initialConfig: unknown = {}) {
  const store = new MemoryConfigStore(initialConfig);
  const host = new Host({ configStore: store });
  return { host, store };
}

export function createLoggerStub() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/** Messages passed to a stubbed log method, in call order. */
export function messages(fn: ReturnType<typeof vi.fn>): unknown[] {
  return fn.mock.calls.map((call) => call[1]);
}

/**
 * In-memory BoundListener. The serving activity ends when exit() is called,
 * or on close() when exitOnClose is set.
 */
export class FakeListener implements BoundListener {
  closeCalls = 0;
  served: FetchHandler | null = null;
  private resolveExit: (err: Error | undefined) => void = () => {};
  private readonly exited = new Promise<Error | undefined>((resolve) => {
    this.resolveExit = resolve;
  });

  constructor(
    private readonly info: AddressInfo = {
      address: "127.0.0.1",
      family: "IPv4",
      port: 4321,
    },
    private readonly exitOnClose: Error | null = new Error(
      "use of closed network connection",
    ),
  ) {}

  address(): AddressInfo {
    return this.info;
  }

  serve(fetch: FetchHandler): Promise<Error | undefined> {
    this.served = fetch;
    return this.exited;
  }

  close(): void {
    this.closeCalls++;
    if (this.exitOnClose) this.exit(this.exitOnClose);
  }

  exit(err?: Error): void {
    this.resolveExit(err);
  }
}
