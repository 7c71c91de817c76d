import type { LogEmitter } from "@stevedore/cli-core";

/**
 * Streams the multiplexed logs of every service of a project.
 *
 * Resolves when the stream ends: at once without `follow`, when `signal`
 * aborts with it. Rejects on backend failures such as an unknown project.
 */
export interface LogsFetcher {
  getLogs(signal: AbortSignal, projectName: string, emit: LogEmitter, follow: boolean): Promise<void>;
}

export interface LogOptions {
  /** Services to keep; empty or absent means all of them. */
  services?: readonly string[];
  follow?: boolean;
}
