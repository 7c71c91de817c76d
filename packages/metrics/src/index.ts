export { CommandClassifier, classifyCommand, hasQuietFlag } from "./classifier";
export { createReferenceSets, defaultReferenceSets } from "./reference-sets";
export type { ReferenceSets, ReferenceSetsInput } from "./reference-sets";
export { isInvokedAsCliBackend } from "./backend";
export { SOURCES, STATUS, resolveCliSource, statusFromError } from "./record";
export type { CommandRecord, CommandSource, CommandStatus } from "./record";
export {
  TelemetryClient,
  USAGE_URL,
  DEFAULT_SEND_TIMEOUT_MS,
  defaultSocketPath,
  telemetryClientOptionsFromEnv,
} from "./client";
export type { TelemetryClientOptions, UsagePoster } from "./client";
export { track } from "./track";
export type { TrackOptions } from "./track";
