import type { ServeOption } from "../pipeline.js";

export interface HealthOptions {
  version: string;
  startedAt: Date;
  /** Config key holding the bound API address. */
  addressKey?: string;
}

/** GET /health: status, version, uptime and the recorded API address. */
export function healthOption(options: HealthOptions): ServeOption {
  const addressKey = options.addressKey ?? "addresses.api";

  return (owner, mux) => {
    mux.get("/health", async (c) => {
      const uptimeMs = Date.now() - options.startedAt.getTime();
      const api = await owner.getConfigKey(addressKey);

      return c.json({
        status: owner.closing.aborted ? "closing" : "healthy",
        version: options.version,
        uptime: Math.floor(uptimeMs / 1000),
        api: typeof api === "string" ? api : null,
      });
    });
    return mux;
  };
}
