import { executeCli } from "./runtime/bootstrap";

executeCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`stevedore: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 1;
  },
);
