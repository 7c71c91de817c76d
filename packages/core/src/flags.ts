import { CliError, CLI_ERROR_CODES } from "./errors";
import { isLogLevel, type LogLevel } from "./logger";

export type GlobalFlags = {
  json?: boolean;
  logLevel?: LogLevel;
  debug?: boolean;
  help?: boolean;
  version?: boolean;
  quiet?: boolean;
};

export interface ParseArgsOptions {
  /** Command flags that never take a value, long or short form without dashes. */
  booleans?: readonly string[];
  /** How many leading positionals form the command path. */
  maxCommandDepth?: number;
}

export interface ParsedArgs {
  cmdPath: string[];
  rest: string[];
  global: GlobalFlags;
  flagsObj: Record<string, string | boolean>;
}

function takeValue(args: string[], flag: string): string {
  const value = args.shift();
  if (value === undefined || value.startsWith("-")) {
    throw new CliError(CLI_ERROR_CODES.E_INVALID_ARGS, `Flag ${flag} requires a value`);
  }
  return value;
}

function parseBooleanValue(flag: string, value: string): boolean {
  switch (value.toLowerCase()) {
    case "true":
      return true;
    case "false":
      return false;
    default:
      throw new CliError(
        CLI_ERROR_CODES.E_INVALID_ARGS,
        `Flag ${flag} takes true or false, got "${value}"`,
      );
  }
}

export function parseArgs(argv: readonly string[], options: ParseArgsOptions = {}): ParsedArgs {
  const booleans = new Set(options.booleans ?? []);
  const maxDepth = options.maxCommandDepth ?? 1;
  const args = [...argv];
  const global: GlobalFlags = {};
  const flagsObj: Record<string, string | boolean> = {};
  const cmdPath: string[] = [];
  const rest: string[] = [];

  while (args.length) {
    const a = args.shift() ?? "";
    if (a === "--") {
      rest.push(...args);
      break;
    }
    if (a.startsWith("-") && a !== "-") {
      switch (a) {
        case "--json":
          global.json = true;
          break;
        case "--help":
          global.help = true;
          break;
        case "--version":
          global.version = true;
          break;
        case "--quiet":
        case "-q":
          global.quiet = true;
          break;
        case "--debug":
          global.debug = true;
          global.logLevel = "debug";
          break;
        case "--log-level": {
          const level = takeValue(args, a).toLowerCase();
          if (!isLogLevel(level)) {
            throw new CliError(CLI_ERROR_CODES.E_INVALID_ARGS, `Invalid log level: ${level}`);
          }
          global.logLevel = level;
          break;
        }
        default: {
          // --flag=value, --flag value, -f, -f value
          const stripped = a.replace(/^--?/, "");
          const eq = stripped.indexOf("=");
          if (eq > 0) {
            const name = stripped.slice(0, eq);
            const value = stripped.slice(eq + 1);
            flagsObj[name] = booleans.has(name) ? parseBooleanValue(a.slice(0, a.indexOf("=")), value) : value;
            break;
          }
          const maybe = args[0];
          if (booleans.has(stripped) || maybe === undefined || maybe.startsWith("-")) {
            flagsObj[stripped] = true;
          } else {
            flagsObj[stripped] = args.shift() ?? true;
          }
        }
      }
    } else if (cmdPath.length < maxDepth && rest.length === 0) {
      cmdPath.push(a);
    } else {
      rest.push(a);
    }
  }
  return { cmdPath, rest, global, flagsObj };
}
