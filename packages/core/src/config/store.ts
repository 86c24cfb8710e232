/**
 * Key-value access to the server config by dotted key ("addresses.api").
 *
 * A write validates the whole config against ServerConfigSchema before it
 * lands, so a store never holds a config that loadConfig would reject.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { ConfigKeyError } from "../errors/catalog.js";
import {
  ServerConfigSchema,
  type ServerConfig,
} from "../schemas/server-config.js";
import { readRawConfig, serializeConfig } from "./loader.js";

export interface ConfigStore {
  getConfigKey(key: string): Promise<unknown>;
  setConfigKey(key: string, value: unknown): Promise<void>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function splitKey(key: string): string[] {
  const segments = key.split(".");
  if (segments.some((s) => s === "")) {
    throw new ConfigKeyError(key, "empty key segment");
  }
  return segments;
}

export function readConfigKey(config: ServerConfig, key: string): unknown {
  let node: unknown = config;
  for (const segment of splitKey(key)) {
    if (!isRecord(node) || !(segment in node)) {
      throw new ConfigKeyError(key, "unknown key");
    }
    node = node[segment];
  }
  return node;
}

export function applyConfigKey(
  config: ServerConfig,
  key: string,
  value: unknown,
): ServerConfig {
  const segments = splitKey(key);
  const last = segments[segments.length - 1];
  const draft: unknown = structuredClone(config);

  let node = draft;
  for (const segment of segments.slice(0, -1)) {
    if (!isRecord(node) || !isRecord(node[segment])) {
      throw new ConfigKeyError(key, "unknown key");
    }
    node = node[segment];
  }
  if (!isRecord(node) || !(last in node)) {
    throw new ConfigKeyError(key, "unknown key");
  }
  node[last] = value;

  const result = ServerConfigSchema.safeParse(draft);
  if (!result.success) {
    throw new ConfigKeyError(key, result.error.issues[0].message);
  }
  return result.data;
}

/** Config store backed by a JSON file; writes are serialized. */
export class FileConfigStore implements ConfigStore {
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly configPath: string) {}

  async getConfigKey(key: string): Promise<unknown> {
    return readConfigKey(await this.read(), key);
  }

  setConfigKey(key: string, value: unknown): Promise<void> {
    const run = this.queue.then(() => this.write(key, value));
    // Keep the chain alive after a failed write; the caller still sees the error.
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async read(): Promise<ServerConfig> {
    const raw = await readRawConfig(this.configPath);
    const parsed: unknown = raw !== undefined ? JSON.parse(raw) : {};
    return ServerConfigSchema.parse(parsed);
  }

  private async write(key: string, value: unknown): Promise<void> {
    const next = applyConfigKey(await this.read(), key, value);
    await mkdir(dirname(this.configPath), { recursive: true });
    await writeFile(this.configPath, serializeConfig(next), "utf-8");
  }
}

export class MemoryConfigStore implements ConfigStore {
  private config: ServerConfig;

  constructor(initial: unknown = {}) {
    this.config = ServerConfigSchema.parse(initial);
  }

  async getConfigKey(key: string): Promise<unknown> {
    return readConfigKey(this.config, key);
  }

  async setConfigKey(key: string, value: unknown): Promise<void> {
    this.config = applyConfigKey(this.config, key, value);
  }

  snapshot(): ServerConfig {
    return structuredClone(this.config);
  }
}
