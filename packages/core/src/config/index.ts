export {
  DEFAULT_ROOT_PATH,
  CONFIG_FILENAME,
} from "./defaults.js";
export { loadConfig, saveConfig, type LoadConfigOptions } from "./loader.js";
export { expandHomePath, resolveRootPath, resolveConfigPath } from "./paths.js";
export {
  FileConfigStore,
  MemoryConfigStore,
  type ConfigStore,
} from "./store.js";
