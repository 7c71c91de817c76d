export { executeCli } from "./runtime/bootstrap";
export type { CliRuntimeOptions } from "./runtime/bootstrap";
export * from "./commands/index";
