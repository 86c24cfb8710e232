import type { Logger } from "pino";
import type { ConfigStore } from "../config/store.js";
import { TaskGroup, type InflightTasks } from "./task-group.js";

/**
 * What a listener needs from the process that owns it: a closing signal,
 * in-flight bookkeeping, and somewhere to record the address it bound.
 */
export interface ServerOwner {
  readonly closing: AbortSignal;
  readonly children: InflightTasks;
  getConfigKey(key: string): Promise<unknown>;
  setConfigKey(key: string, value: unknown): Promise<void>;
}

export interface HostOptions {
  configStore: ConfigStore;
  logger?: Logger;
}

export class Host implements ServerOwner {
  readonly children = new TaskGroup();
  private readonly controller = new AbortController();
  private readonly configStore: ConfigStore;
  private readonly logger?: Logger;

  constructor(options: HostOptions) {
    this.configStore = options.configStore;
    this.logger = options.logger;
  }

  get closing(): AbortSignal {
    return this.controller.signal;
  }

  isClosing(): boolean {
    return this.controller.signal.aborted;
  }

  getConfigKey(key: string): Promise<unknown> {
    return this.configStore.getConfigKey(key);
  }

  setConfigKey(key: string, value: unknown): Promise<void> {
    return this.configStore.setConfigKey(key, value);
  }

  /**
   * Signal closing (once) and wait for every registered child to finish.
   * Safe to call repeatedly; later calls only wait.
   */
  async close(reason = "host closing"): Promise<void> {
    if (!this.controller.signal.aborted) {
      this.logger?.info(
        { reason, children: this.children.size },
        "Host closing",
      );
      this.controller.abort(reason);
    }
    await this.children.wait();
  }
}
