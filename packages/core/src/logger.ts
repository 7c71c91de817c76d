import pino from "pino";

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = typeof LOG_LEVELS[number];
export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(msg: string, meta?: LogContext): void;
  info(msg: string, meta?: LogContext): void;
  warn(msg: string, meta?: LogContext): void;
  error(msg: string, meta?: LogContext | Error): void;
  child(bindings: { category?: string; meta?: LogContext }): Logger;
}

export interface InitLoggingOptions {
  level?: LogLevel;
  /** Defaults to stderr so log lines never mix with command output. */
  destination?: pino.DestinationStream;
}

let root: pino.Logger | undefined;
let stderr: pino.DestinationStream | undefined;

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function getLogLevel(env: NodeJS.ProcessEnv = process.env, fallback: LogLevel = "silent"): LogLevel {
  const raw = (env.STEVEDORE_LOG_LEVEL ?? env.LOG_LEVEL ?? fallback).toLowerCase();
  return isLogLevel(raw) ? raw : fallback;
}

/** One stderr stream per process, shared by every initLogging() call. */
export function stderrDestination(): pino.DestinationStream {
  stderr ??= pino.destination({ fd: 2, sync: true });
  return stderr;
}

export function initLogging(options: InitLoggingOptions = {}): void {
  const level = options.level ?? getLogLevel();
  const destination = options.destination ?? stderrDestination();
  root = pino({ level, base: undefined }, destination);
}

function ensureRoot(): pino.Logger {
  if (!root) {
    initLogging();
  }
  return root ?? pino({ level: "silent" });
}

/** Children follow the current root, so loggers taken at import time see a later initLogging(). */
function bind(parent: () => pino.Logger, bindings: LogContext): () => pino.Logger {
  let cached: { parent: pino.Logger; child: pino.Logger } | undefined;
  return () => {
    const current = parent();
    if (!cached || cached.parent !== current) {
      cached = { parent: current, child: current.child(bindings) };
    }
    return cached.child;
  };
}

function toLogger(base: () => pino.Logger): Logger {
  return {
    debug: (msg, meta) => base().debug(meta ?? {}, msg),
    info: (msg, meta) => base().info(meta ?? {}, msg),
    warn: (msg, meta) => base().warn(meta ?? {}, msg),
    error: (msg, metaOrError) => {
      if (metaOrError instanceof Error) {
        base().error({ err: metaOrError }, msg);
        return;
      }
      base().error(metaOrError ?? {}, msg);
    },
    child: (bindings) => {
      const merged: LogContext = {};
      if (bindings.category) {
        merged.category = bindings.category;
      }
      if (bindings.meta) {
        Object.assign(merged, bindings.meta);
      }
      return toLogger(bind(base, merged));
    },
  };
}

export function getLogger(category = "cli"): Logger {
  return toLogger(bind(ensureRoot, { layer: "cli", category }));
}

export function createNoOpLogger(): Logger {
  return {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
    child: () => createNoOpLogger(),
  };
}
