import { createRequire } from "node:module";
import {
  FileConfigStore,
  loadConfig,
  resolveConfigPath,
} from "@gatehouse/core/config";
import { Host, installSignalHandlers } from "@gatehouse/core/host";
import { createLogger } from "@gatehouse/core/logger";
import { listenAndServe } from "./listen.js";
import {
  accessLogOption,
  healthOption,
  redirectOption,
} from "./options/index.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

async function main(): Promise<number> {
  const rootPath = process.env.GATEHOUSE_ROOT_PATH;
  const config = await loadConfig({ rootPath });
  const logger = createLogger(config.logging);

  const host = new Host({
    configStore: new FileConfigStore(resolveConfigPath({ rootPath })),
    logger,
  });
  const removeSignalHandlers = installSignalHandlers(host, logger);

  try {
    await listenAndServe(
      host,
      config.addresses.api,
      [
        accessLogOption(logger),
        healthOption({ version: pkg.version, startedAt: new Date() }),
        redirectOption("/", "/health"),
      ],
      {
        logger,
        graceLogIntervalMs: config.shutdown.graceLogIntervalMs,
      },
    );
    logger.info("Server stopped");
    return 0;
  } catch (err) {
    logger.error({ err }, "Server failed");
    return 1;
  } finally {
    removeSignalHandlers();
    await host.close("server stopped");
  }
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error("Failed to start server:", err);
    process.exit(1);
  },
);
