export { logger } from "./logger";
export type { Logger } from "./logger";
export { resolveLoggerConfig } from "./logger.utils";
export type { LoggerResolvedConfig, LoggerTransportTarget } from "./logger.types";
