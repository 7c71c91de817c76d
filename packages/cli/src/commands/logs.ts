import path from "node:path";
import { CliError, CLI_ERROR_CODES, createLogPrinter, envString } from "@stevedore/cli-core";
import type { Command, CommandFlags } from "./types";

function flagValue(flags: CommandFlags, ...names: string[]): string | boolean | undefined {
  for (const name of names) {
    if (flags[name] !== undefined) {
      return flags[name];
    }
  }
  return undefined;
}

export const logs: Command = {
  name: "logs",
  describe: "View output from the services of a project",
  flags: [
    { name: "follow", alias: "f", type: "boolean", description: "Follow log output" },
    { name: "project-name", alias: "p", type: "string", description: "Project name (defaults to the directory name)" },
  ],
  examples: [
    "stevedore logs",
    "stevedore logs web worker",
    "stevedore logs -f -p shop web",
  ],

  async run(ctx, argv, flags) {
    const backend = ctx.logsBackend;
    if (!backend) {
      throw new CliError(
        CLI_ERROR_CODES.E_BACKEND_UNAVAILABLE,
        `No logs backend for context type "${ctx.contextType}"`,
      );
    }

    const projectFlag = flagValue(flags, "project-name", "p");
    if (projectFlag === true) {
      throw new CliError(CLI_ERROR_CODES.E_INVALID_ARGS, "Flag --project-name requires a value");
    }
    const projectName =
      projectFlag || envString(ctx.env, "STEVEDORE_PROJECT_NAME") || path.basename(ctx.cwd);
    const follow = flagValue(flags, "follow", "f") === true;

    ctx.logger.debug("logs", { project: projectName, services: argv, follow });
    ctx.presenter.info(
      argv.length > 0 ? `Attaching to ${projectName}: ${argv.join(", ")}` : `Attaching to ${projectName}`,
    );
    await backend.logs(ctx.signal, projectName, createLogPrinter(ctx.presenter), {
      services: argv,
      follow,
    });
    return 0;
  },
};
