import { describe, it, expect } from "vitest";
import { join } from "node:path";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { ConfigKeyError } from "../errors/catalog.js";
import { ServerConfigSchema } from "../schemas/server-config.js";
import {
  FileConfigStore,
  MemoryConfigStore,
  applyConfigKey,
  readConfigKey,
} from "./store.js";

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), "config-store-test-"));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true });
  }
}

describe("readConfigKey / applyConfigKey", () => {
  const config = ServerConfigSchema.parse({});

  it("reads nested values by dotted key", () => {
    expect(readConfigKey(config, "addresses.api")).toBe("/ip4/127.0.0.1/tcp/5001");
    expect(readConfigKey(config, "logging")).toEqual({ level: "info", pretty: false });
  });

  it("rejects unknown keys", () => {
    expect(() => readConfigKey(config, "addresses.gateway")).toThrow(
      "Config key addresses.gateway: unknown key",
    );
    expect(() => applyConfigKey(config, "nope.api", "x")).toThrow(ConfigKeyError);
    expect(() => applyConfigKey(config, "addresses.gateway", "x")).toThrow(
      "Config key addresses.gateway: unknown key",
    );
  });

  it("rejects empty segments", () => {
    expect(() => readConfigKey(config, "addresses..api")).toThrow(
      "Config key addresses..api: empty key segment",
    );
  });

  it("returns a new config and leaves the input untouched", () => {
    const next = applyConfigKey(config, "addresses.api", "/ip4/127.0.0.1/tcp/4100");
    expect(next.addresses.api).toBe("/ip4/127.0.0.1/tcp/4100");
    expect(config.addresses.api).toBe("/ip4/127.0.0.1/tcp/5001");
  });

  it("validates the value against the schema", () => {
    expect(() => applyConfigKey(config, "addresses.api", "/ip4/x/tcp/1")).toThrow(
      'Config key addresses.api: Invalid address "/ip4/x/tcp/1": "x" is not a valid ip4 host',
    );
  });
});

describe("FileConfigStore", () => {
  it("persists a key to config.json and reads it back", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "config.json");
      const store = new FileConfigStore(configPath);

      await store.setConfigKey("addresses.api", "/ip4/127.0.0.1/tcp/4100");

      expect(await store.getConfigKey("addresses.api")).toBe("/ip4/127.0.0.1/tcp/4100");
      const onDisk = JSON.parse(await readFile(configPath, "utf-8"));
      expect(onDisk.addresses.api).toBe("/ip4/127.0.0.1/tcp/4100");
      expect(onDisk.logging.level).toBe("info");
    });
  });

  it("keeps other values already in the file", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "config.json");
      await writeFile(configPath, JSON.stringify({ logging: { level: "debug" } }));
      const store = new FileConfigStore(configPath);

      await store.setConfigKey("addresses.api", "/ip6/::1/tcp/4200");

      const onDisk = JSON.parse(await readFile(configPath, "utf-8"));
      expect(onDisk.logging.level).toBe("debug");
      expect(onDisk.addresses.api).toBe("/ip6/::1/tcp/4200");
    });
  });

  it("serializes concurrent writes", async () => {
    await withTempDir(async (dir) => {
      const store = new FileConfigStore(join(dir, "config.json"));

      await Promise.all([
        store.setConfigKey("addresses.api", "/ip4/127.0.0.1/tcp/4300"),
        store.setConfigKey("shutdown.graceLogIntervalMs", 100),
      ]);

      expect(await store.getConfigKey("addresses.api")).toBe("/ip4/127.0.0.1/tcp/4300");
      expect(await store.getConfigKey("shutdown.graceLogIntervalMs")).toBe(100);
    });
  });

  it("a failed write does not block later ones", async () => {
    await withTempDir(async (dir) => {
      const store = new FileConfigStore(join(dir, "config.json"));

      await expect(store.setConfigKey("addresses.bogus", "x")).rejects.toThrow(ConfigKeyError);
      await store.setConfigKey("logging.level", "warn");

      expect(await store.getConfigKey("logging.level")).toBe("warn");
    });
  });
});

describe("MemoryConfigStore", () => {
  it("starts from the given config", async () => {
    const store = new MemoryConfigStore({ logging: { level: "error" } });
    expect(await store.getConfigKey("logging.level")).toBe("error");
  });

  it("snapshot reflects writes", async () => {
    const store = new MemoryConfigStore();
    await store.setConfigKey("addresses.api", "/ip4/10.0.0.2/tcp/80");
    expect(store.snapshot().addresses.api).toBe("/ip4/10.0.0.2/tcp/80");
  });

  it("stores a shorthand address in canonical notation", async () => {
    const store = new MemoryConfigStore();
    await store.setConfigKey("addresses.api", "localhost:7000");
    expect(await store.getConfigKey("addresses.api")).toBe(
      "/ip4/127.0.0.1/tcp/7000",
    );
  });
});
