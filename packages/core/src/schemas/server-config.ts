import { z } from "zod";
import { normalizeAddress } from "../address/descriptor.js";

export const DEFAULTS = {
  addresses: {
    api: "/ip4/127.0.0.1/tcp/5001",
  },
  logging: {
    level: "info" as const,
    pretty: false,
  },
  shutdown: {
    graceLogIntervalMs: 5_000,
  },
};

/** A descriptor or host:port shorthand, stored in canonical notation. */
export const AddressDescriptorSchema = z.string().transform((value, ctx) => {
  try {
    return normalizeAddress(value);
  } catch (err) {
    ctx.addIssue({
      code: "custom",
      message: err instanceof Error ? err.message : String(err),
    });
    return z.NEVER;
  }
});

export const ServerConfigSchema = z.object({
  addresses: z
    .object({
      api: AddressDescriptorSchema.default(DEFAULTS.addresses.api).describe(
        "API listener; rewritten with the concrete bound address on start",
      ),
    })
    .default(DEFAULTS.addresses),
  logging: z
    .object({
      level: z
        .enum(["fatal", "error", "warn", "info", "debug"])
        .default(DEFAULTS.logging.level),
      pretty: z.boolean().default(DEFAULTS.logging.pretty),
    })
    .default(DEFAULTS.logging),
  shutdown: z
    .object({
      graceLogIntervalMs: z
        .number()
        .int()
        .positive()
        .default(DEFAULTS.shutdown.graceLogIntervalMs)
        .describe("Interval between 'still waiting' records while a server drains"),
    })
    .default(DEFAULTS.shutdown),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type LoggingConfig = ServerConfig["logging"];
