/**
 * Core package centralizes shared contracts, configuration and logging.
 * Everything else in the monorepo depends on these primitives.
 */
export * from "./types";
export * from "./errors";
export * from "./time";
export * from "./config";
export { loadEnvFiles } from "./env";
export * from "./utils/logger";
