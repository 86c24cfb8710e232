export { healthOption, type HealthOptions } from "./health.js";
export { redirectOption } from "./redirect.js";
export { corsOption, type CorsOptions } from "./cors.js";
export { localOnlyOption, createLocalOnlyMiddleware } from "./local-only.js";
export { accessLogOption, createAccessLogMiddleware } from "./access-log.js";
