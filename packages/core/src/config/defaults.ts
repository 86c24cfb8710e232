import { join } from "node:path";
import { homedir } from "node:os";

export const DEFAULT_ROOT_PATH = join(homedir(), "gatehouse");
export const CONFIG_FILENAME = "config.json";
