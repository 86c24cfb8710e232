import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { CONFIG_FILENAME, DEFAULT_ROOT_PATH } from "./defaults.js";

/**
 * Expands a leading "~" to the current user's home directory.
 */
export function expandHomePath(input: string): string {
  if (input === "~") {
    return homedir();
  }
  if (input.startsWith("~/")) {
    return resolve(homedir(), input.slice(2));
  }
  return input;
}

/**
 * Resolves the configured root path (or default) to an absolute path.
 */
export function resolveRootPath(input?: string): string {
  return resolve(expandHomePath(input ?? DEFAULT_ROOT_PATH));
}

export function resolveConfigPath(options?: {
  configPath?: string;
  rootPath?: string;
}): string {
  return options?.configPath ?? join(resolveRootPath(options?.rootPath), CONFIG_FILENAME);
}
