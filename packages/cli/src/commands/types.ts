import type { LogConsumer, Logger, Presenter } from "@stevedore/cli-core";
import type { LogOptions } from "@stevedore/backend-ecs";

/** What a backend must offer for `logs`; EcsLogsService is one. */
export interface LogsBackend {
  logs(signal: AbortSignal, projectName: string, consumer: LogConsumer, options?: LogOptions): Promise<void>;
}

export interface CommandContext {
  presenter: Presenter;
  logger: Logger;
  env: NodeJS.ProcessEnv;
  cwd: string;
  cliVersion: string;
  contextType: string;
  /** Aborted on SIGINT. */
  signal: AbortSignal;
  logsBackend?: LogsBackend;
}

export type CommandFlags = Record<string, string | boolean>;

export interface FlagDefinition {
  name: string;                    // "follow", "project-name"
  type: "boolean" | "string";
  alias?: string;                  // short alias: "f"
  description?: string;
}

export interface Command {
  name: string;
  describe: string;
  flags?: FlagDefinition[];
  examples?: string[];
  run(ctx: CommandContext, argv: string[], flags: CommandFlags): Promise<number | void> | number | void;
}
