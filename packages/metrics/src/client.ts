import os from "node:os";
import path from "node:path";
import axios, { type AxiosRequestConfig } from "axios";
import { envNumber, envString, getLogger, type Logger } from "@stevedore/cli-core";
import type { CommandRecord } from "./record";

export const USAGE_URL = "http://localhost/usage";
export const DEFAULT_SEND_TIMEOUT_MS = 50;

/** The part of an axios instance the client needs. */
export interface UsagePoster {
  post(url: string, data: CommandRecord, config: AxiosRequestConfig): Promise<unknown>;
}

export interface TelemetryClientOptions {
  socketPath?: string;
  timeoutMs?: number;
  poster?: UsagePoster;
  logger?: Logger;
}

export function defaultSocketPath(
  platform: NodeJS.Platform = process.platform,
  home: string = os.homedir(),
): string {
  switch (platform) {
    case "win32":
      return "\\\\.\\pipe\\stevedore_cli";
    case "darwin":
      return path.join(home, "Library", "Application Support", "stevedore", "cli.sock");
    default:
      return "/var/run/stevedore-cli.sock";
  }
}

export function telemetryClientOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): TelemetryClientOptions {
  return {
    socketPath: envString(env, "STEVEDORE_METRICS_SOCKET"),
    timeoutMs: envNumber(env, "STEVEDORE_METRICS_TIMEOUT_MS"),
  };
}

/**
 * Posts usage records to the desktop integration socket.
 *
 * `send` is fire-and-forget: it returns at once, failures only reach the debug
 * log, and the request timeout bounds how long a pending post can hold the
 * process open.
 */
export class TelemetryClient {
  private readonly socketPath: string;
  private readonly timeoutMs: number;
  private readonly poster: UsagePoster;
  private readonly logger: Logger;
  private readonly inflight = new Set<Promise<void>>();

  constructor(options: TelemetryClientOptions = {}) {
    this.socketPath = options.socketPath ?? defaultSocketPath();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SEND_TIMEOUT_MS;
    this.poster = options.poster ?? axios.create({ proxy: false });
    this.logger = options.logger ?? getLogger("metrics");
  }

  send(record: CommandRecord): void {
    const pending: Promise<void> = this.post(record).finally(() => {
      this.inflight.delete(pending);
    });
    this.inflight.add(pending);
  }

  /** Settles once every send started so far has settled. */
  async flush(): Promise<void> {
    await Promise.all([...this.inflight]);
  }

  private async post(record: CommandRecord): Promise<void> {
    try {
      await this.poster.post(USAGE_URL, record, {
        socketPath: this.socketPath,
        timeout: this.timeoutMs,
        headers: { "Content-Type": "application/json" },
      });
      this.logger.debug("usage reported", { command: record.command, status: record.status });
    } catch (error) {
      this.logger.debug("usage report not delivered", {
        command: record.command,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
