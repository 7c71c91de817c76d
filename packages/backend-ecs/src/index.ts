export { EcsLogsService } from "./logs";
export type { LogsFetcher, LogOptions } from "./types";
