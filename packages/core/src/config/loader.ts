import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import {
  ServerConfigSchema,
  type ServerConfig,
} from "../schemas/server-config.js";
import { resolveConfigPath } from "./paths.js";

export interface LoadConfigOptions {
  configPath?: string;
  rootPath?: string;
}

/** Read the raw JSON object, or undefined when the file does not exist. */
export async function readRawConfig(
  configPath: string,
): Promise<string | undefined> {
  try {
    return await readFile(configPath, "utf-8");
  } catch (err: unknown) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return undefined;
    }
    throw err;
  }
}

export function serializeConfig(config: unknown): string {
  return JSON.stringify(config, null, 2) + "\n";
}

export async function loadConfig(
  options?: LoadConfigOptions,
): Promise<ServerConfig> {
  const configPath = resolveConfigPath(options);
  const raw = await readRawConfig(configPath);

  const parsed: unknown = raw !== undefined ? JSON.parse(raw) : {};
  const config = ServerConfigSchema.parse(parsed);

  // Write back so that defaults are visible and editable in config.json
  const serialized = serializeConfig(config);
  if (serialized !== raw) {
    await mkdir(dirname(configPath), { recursive: true });
    await writeFile(configPath, serialized);
  }

  return config;
}

export async function saveConfig(
  config: ServerConfig,
  options?: LoadConfigOptions,
): Promise<void> {
  const configPath = resolveConfigPath(options);
  await mkdir(dirname(configPath), { recursive: true });
  await writeFile(configPath, serializeConfig(config), "utf-8");
}
