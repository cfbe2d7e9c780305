export type { Config } from "./config.js";
export { LOG_LEVELS, loadConfig } from "./config.js";
export { ConfigError, HawkError, HawkParseError, HTTPError } from "./errors.js";
export { createLogger, SERVICE_NAME } from "./logger.js";
export { equalsIgnoreAsciiCase, isValidAttributeValue, isValidBase64, isValidTimestamp } from "./validation.js";
