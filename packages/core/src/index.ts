/**
 * Shared contracts of the monorepo: bar types, indicator configuration,
 * error classes, configuration loading and the structured logger.
 */
export * from "./types";
export * from "./errors";
export * from "./indicatorConfig";
export * from "./config";
export * from "./exchange";
export { createLogger, log } from "./utils/logger";
export type { BaseLogPayload, LogLevel, ModuleLogger } from "./utils/logger";
