import {
  CliError,
  CLI_ERROR_CODES,
  EXIT_CODES,
  createJsonPresenter,
  createTextPresenter,
  envString,
  getLogLevel,
  getLogger,
  initLogging,
  isCliError,
  mapCliErrorToExitCode,
  parseArgs,
  type Presenter,
} from "@stevedore/cli-core";
import { STATUS, hasQuietFlag, statusFromError, track } from "@stevedore/cli-metrics";
import {
  booleanFlagNames,
  builtinCommands,
  findCommand,
  renderCommandHelp,
  renderHelp,
  type Command,
  type LogsBackend,
} from "../commands/index";

const DEFAULT_VERSION = "0.1.0";

export interface CliRuntimeOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  version?: string;
  /** Reported as the telemetry context, e.g. "ecs". */
  contextType?: string;
  logsBackend?: LogsBackend;
  commands?: readonly Command[];
  /** Replaces the SIGINT-driven signal. */
  signal?: AbortSignal;
  track?: typeof track;
}

function interruptSignal(external?: AbortSignal): { signal: AbortSignal; dispose(): void } {
  if (external) {
    return { signal: external, dispose: () => {} };
  }
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once("SIGINT", onInterrupt);
  return {
    signal: controller.signal,
    dispose: () => {
      process.off("SIGINT", onInterrupt);
    },
  };
}

function report(presenter: Presenter, error: unknown): number {
  if (isCliError(error)) {
    presenter.error(error.message);
    return mapCliErrorToExitCode(error.code);
  }
  presenter.error(error instanceof Error ? error.message : String(error));
  return EXIT_CODES.GENERIC;
}

export async function executeCli(argv: string[], options: CliRuntimeOptions = {}): Promise<number> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const commands = options.commands ?? builtinCommands;
  const cliVersion = options.version ?? envString(env, "STEVEDORE_VERSION", DEFAULT_VERSION) ?? DEFAULT_VERSION;
  const contextType = options.contextType ?? envString(env, "STEVEDORE_CONTEXT_TYPE", "local") ?? "local";
  const trackFn = options.track ?? track;

  // chosen before parsing so that parse errors are printed in the requested mode;
  // tokens after "--" belong to the command
  const terminator = argv.indexOf("--");
  const cliTokens = terminator === -1 ? argv : argv.slice(0, terminator);
  const presenter: Presenter = cliTokens.includes("--json")
    ? createJsonPresenter()
    : createTextPresenter(hasQuietFlag(cliTokens));
  let failure: unknown;
  let exitCode = 0;
  const interrupt = interruptSignal(options.signal);

  try {
    const { cmdPath, rest, global, flagsObj } = parseArgs(argv, { booleans: booleanFlagNames(commands) });
    initLogging({ level: global.debug ? "debug" : global.logLevel ?? getLogLevel(env) });

    const logger = getLogger("cli").child({ meta: { cwd, version: cliVersion } });
    const name = cmdPath[0] ?? (global.version ? "version" : undefined);
    const cmd = findCommand(name, commands);

    if (global.help && cmd) {
      renderCommandHelp(cmd).forEach((line) => presenter.write(line));
    } else if (global.help || name === undefined) {
      renderHelp(commands).forEach((line) => presenter.write(line));
    } else if (!cmd) {
      throw new CliError(CLI_ERROR_CODES.E_UNKNOWN_COMMAND, `Unknown command: ${name}`);
    } else {
      const code = await cmd.run(
        {
          presenter,
          logger,
          env,
          cwd,
          cliVersion,
          contextType,
          signal: interrupt.signal,
          logsBackend: options.logsBackend,
        },
        rest,
        flagsObj,
      );
      exitCode = typeof code === "number" ? code : 0;
    }
  } catch (error) {
    failure = error;
    exitCode = report(presenter, error);
  } finally {
    interrupt.dispose();
  }

  // an interrupted follow ends without error but still counts as canceled
  const status = failure === undefined && interrupt.signal.aborted ? STATUS.CANCELED : statusFromError(failure);
  trackFn(contextType, argv, status, { env });
  return exitCode;
}
