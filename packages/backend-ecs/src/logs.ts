import {
  CliError,
  CLI_ERROR_CODES,
  filterLogConsumer,
  getLogger,
  isAbortError,
  type LogConsumer,
} from "@stevedore/cli-core";
import type { LogOptions, LogsFetcher } from "./types";

const logger = getLogger("ecs");

export class EcsLogsService {
  constructor(private readonly fetcher: LogsFetcher) {}

  async logs(
    signal: AbortSignal,
    projectName: string,
    consumer: LogConsumer,
    options: LogOptions = {},
  ): Promise<void> {
    if (projectName.trim() === "") {
      throw new CliError(CLI_ERROR_CODES.E_INVALID_ARGS, "Project name required");
    }
    const services = options.services ?? [];
    const target = services.length > 0 ? filterLogConsumer(consumer, services) : consumer;
    const follow = options.follow ?? false;

    logger.debug("fetching logs", { project: projectName, services: [...services], follow });
    try {
      await this.fetcher.getLogs(
        signal,
        projectName,
        (service, line) => {
          // a backend may still be draining a buffer after cancellation
          if (signal.aborted) {
            return;
          }
          target.log(service, line);
        },
        follow,
      );
    } catch (error) {
      if (signal.aborted && isAbortError(error)) {
        logger.debug("log stream canceled", { project: projectName });
        return;
      }
      throw error;
    }
  }
}
