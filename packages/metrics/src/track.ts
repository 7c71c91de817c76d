import { envBool, getLogger } from "@stevedore/cli-core";
import { isInvokedAsCliBackend } from "./backend";
import { CommandClassifier } from "./classifier";
import { TelemetryClient, telemetryClientOptionsFromEnv } from "./client";
import { resolveCliSource, type CommandStatus } from "./record";

const logger = getLogger("metrics");

export interface TrackOptions {
  classifier?: CommandClassifier;
  client?: Pick<TelemetryClient, "send">;
  /** Invocation path checked against the backend suffix. */
  argv0?: string;
  env?: NodeJS.ProcessEnv;
}

let sharedClient: TelemetryClient | undefined;
let sharedClassifier: CommandClassifier | undefined;

/**
 * Reports one finished invocation. Returns without waiting for delivery and
 * never throws because of it.
 */
export function track(
  context: string,
  args: readonly string[],
  status: CommandStatus,
  options: TrackOptions = {},
): void {
  const env = options.env ?? process.env;
  if (isInvokedAsCliBackend(options.argv0) || envBool(env, "STEVEDORE_METRICS_DISABLE")) {
    return;
  }
  const classifier = options.classifier ?? (sharedClassifier ??= new CommandClassifier());
  const command = classifier.classify(args);
  if (command === "") {
    logger.debug("no command to report");
    return;
  }
  const client = options.client ?? (sharedClient ??= new TelemetryClient(telemetryClientOptionsFromEnv(env)));
  client.send({
    command,
    context,
    source: resolveCliSource(env),
    status,
  });
}
