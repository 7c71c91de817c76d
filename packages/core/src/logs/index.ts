export type { LogConsumer, LogEmitter } from "./types";
export { FilteredLogConsumer, filterLogConsumer } from "./filtered-consumer";
export { createLogPrinter } from "./printer";
