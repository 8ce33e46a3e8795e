export { createLogger, logger, type LogWriter, type Logger, type LoggerConfig } from "./logger";

export { logLevelSchema, type LogLevel } from "./schema";
