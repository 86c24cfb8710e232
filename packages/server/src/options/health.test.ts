import { describe, it, expect } from "vitest";
import { makeHandler } from "../pipeline.js";
import { createTestHost } from "../test-utils/owner.js";
import { healthOption } from "./health.js";

describe("healthOption", () => {
  const startedAt = () => new Date(Date.now() - 90_500);

  it("reports healthy with version, uptime and the recorded API address", async () => {
    const { host } = createTestHost({
      addresses: { api: "/ip4/127.0.0.1/tcp/7070" },
    });
    const handler = makeHandler(host, [
      healthOption({ version: "1.2.3", startedAt: startedAt() }),
    ]);

    const res = await handler.request("/health");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: "healthy",
      version: "1.2.3",
      uptime: 90,
      api: "/ip4/127.0.0.1/tcp/7070",
    });
  });

  it("reads the address at request time", async () => {
    const { host, store } = createTestHost();
    const handler = makeHandler(host, [
      healthOption({ version: "1.2.3", startedAt: new Date() }),
    ]);

    await store.setConfigKey("addresses.api", "/ip6/::1/tcp/9000");

    const res = await handler.request("/health");
    expect(await res.json()).toMatchObject({ api: "/ip6/::1/tcp/9000" });
  });

  it("reports closing once the owner is closing", async () => {
    const { host } = createTestHost();
    const handler = makeHandler(host, [
      healthOption({ version: "1.2.3", startedAt: new Date() }),
    ]);

    await host.close();

    const res = await handler.request("/health");
    expect(await res.json()).toMatchObject({ status: "closing" });
  });
});
