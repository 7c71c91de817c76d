import { envString, isAbortError } from "@stevedore/cli-core";

export const SOURCES = {
  CLI: "cli",
  API: "api",
} as const;

export type CommandSource = typeof SOURCES[keyof typeof SOURCES];

export const STATUS = {
  SUCCESS: "success",
  FAILURE: "failure",
  CANCELED: "canceled",
} as const;

export type CommandStatus = typeof STATUS[keyof typeof STATUS];

/** One classified invocation, as posted to the usage endpoint. */
export interface CommandRecord {
  command: string;
  context: string;
  source: CommandSource;
  status: CommandStatus;
}

function isCommandSource(value: string): value is CommandSource {
  return value === SOURCES.CLI || value === SOURCES.API;
}

/** Wrappers that drive the CLI may report under another source via STEVEDORE_METRICS_SOURCE. */
export function resolveCliSource(env: NodeJS.ProcessEnv = process.env): CommandSource {
  const raw = envString(env, "STEVEDORE_METRICS_SOURCE");
  return raw !== undefined && isCommandSource(raw) ? raw : SOURCES.CLI;
}

export function statusFromError(err: unknown): CommandStatus {
  if (err === undefined || err === null) {
    return STATUS.SUCCESS;
  }
  return isAbortError(err) ? STATUS.CANCELED : STATUS.FAILURE;
}
