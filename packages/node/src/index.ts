/**
 * @ubistream/node: HTTP service for the ubistream engine.
 *
 * Public API of the package; `main.ts` is the runnable entry point.
 */

export {
  loadConfig,
  parseApiKeys,
  parseVerifiedAddresses,
  toEngineConfig,
  ConfigSchema,
} from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
