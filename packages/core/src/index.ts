// Error handling
export {
  EXIT_CODES,
  CLI_ERROR_CODES,
  CliError,
  isCliError,
  isAbortError,
  mapCliErrorToExitCode,
} from "./errors";
export type { CliErrorCode } from "./errors";

// Flags and configuration
export { parseArgs } from "./flags";
export type { GlobalFlags, ParseArgsOptions, ParsedArgs } from "./flags";
export { envBool, envNumber, envString } from "./env";

// Logging
export {
  LOG_LEVELS,
  isLogLevel,
  getLogLevel,
  initLogging,
  stderrDestination,
  getLogger,
  createNoOpLogger,
} from "./logger";
export type { Logger, LogLevel, LogContext, InitLoggingOptions } from "./logger";

// Presenters
export type { Presenter } from "./presenter/types";
export { createTextPresenter } from "./presenter/text";
export { createJsonPresenter } from "./presenter/json";

// Log streams
export * from "./logs/index";
