export { createLogger, logger, loggers } from "./logger";
