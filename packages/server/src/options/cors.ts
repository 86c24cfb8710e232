import { cors } from "hono/cors";
import { mediate, type ServeOption } from "../pipeline.js";

export interface CorsOptions {
  origin?: string | string[];
  maxAge?: number;
}

/** CORS headers on every route registered after this option. */
export function corsOption(options: CorsOptions = {}): ServeOption {
  return (_owner, mux) =>
    mediate(
      mux,
      cors({
        origin: options.origin ?? "*",
        allowHeaders: ["Content-Type", "Authorization"],
        allowMethods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
        maxAge: options.maxAge ?? 86400,
      }),
    );
}
