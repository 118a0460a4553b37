/**
 * @exprfuse/core — configuration, logging and the base error type shared by
 * the exprfuse packages.
 */

export {
  config,
  defineConfig,
  type ExprfuseConfig,
  type LengthPolicy,
  type LogConfig,
  type LogLevel,
  type MaterializeConfig,
} from "./config.js";

export {
  createLogger,
  formatLogLine,
  setLogWriter,
  type LogSeverity,
  type LogWriter,
  type Logger,
} from "./logger.js";

export { ExprfuseError } from "./errors.js";
