/**
 * @iterum/core - configuration and logging shared by the iterum packages
 */

export { config, defineConfig } from "./config.js";
export type { IterumConfig } from "./config.js";
export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";
