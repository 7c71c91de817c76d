export const CLI_ERROR_CODES = {
  E_INVALID_ARGS: "E_INVALID_ARGS",
  E_UNKNOWN_COMMAND: "E_UNKNOWN_COMMAND",
  E_BACKEND_UNAVAILABLE: "E_BACKEND_UNAVAILABLE",
  E_CANCELED: "E_CANCELED",
} as const;

export type CliErrorCode = typeof CLI_ERROR_CODES[keyof typeof CLI_ERROR_CODES];

export const EXIT_CODES = {
  GENERIC: 1,      // generic runtime/software error
  USAGE: 64,       // EX_USAGE per sysexits.h
  UNAVAILABLE: 69, // EX_UNAVAILABLE per sysexits.h
  CANCELED: 130,   // 128 + SIGINT
} as const;

const ERROR_CODE_SET: ReadonlySet<string> = new Set<string>(Object.values(CLI_ERROR_CODES));

export const mapCliErrorToExitCode = (code: CliErrorCode): number => {
  switch (code) {
    case CLI_ERROR_CODES.E_INVALID_ARGS:
    case CLI_ERROR_CODES.E_UNKNOWN_COMMAND:
      return EXIT_CODES.USAGE;

    case CLI_ERROR_CODES.E_BACKEND_UNAVAILABLE:
      return EXIT_CODES.UNAVAILABLE;

    case CLI_ERROR_CODES.E_CANCELED:
      return EXIT_CODES.CANCELED;

    default:
      return EXIT_CODES.GENERIC;
  }
};

export class CliError extends Error {
  code: CliErrorCode;
  details?: unknown;

  constructor(code: CliErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = "CliError";
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CliError);
    }
  }
}

export function isCliError(err: unknown): err is CliError {
  if (!err || typeof err !== "object" || !("code" in err)) {
    return false;
  }
  return typeof err.code === "string" && ERROR_CODE_SET.has(err.code);
}

/** AbortController rejections, from fetch, axios, timers and our own signals. */
export function isAbortError(err: unknown): boolean {
  if (isCliError(err)) {
    return err.code === CLI_ERROR_CODES.E_CANCELED;
  }
  return err instanceof Error && (err.name === "AbortError" || err.name === "CanceledError");
}
