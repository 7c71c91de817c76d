import { defaultReferenceSets, type ReferenceSets } from "./reference-sets";

const HELP_FLAG = "--help";
const END_OF_OPTIONS = "--";

/**
 * Reduces an argument vector to the command signature reported in usage metrics.
 *
 * Only tokens found in the reference sets survive, so positional values and
 * flag arguments never leave the machine. `--help` always leads the result,
 * and nothing after `--` is looked at. Once a terminal command is seen, later
 * bare words are no longer taken as commands: `compose up web` reports
 * `compose up`, while `context create` keeps both words because `context` is
 * a management command.
 *
 * Flag arity is not known here, so a flag's value is dropped like any other
 * unrecognized token.
 */
export class CommandClassifier {
  constructor(private readonly refs: ReferenceSets = defaultReferenceSets) {}

  classify(args: readonly string[]): string {
    let result = "";
    let onlyFlags = false;
    for (const arg of args) {
      if (arg === HELP_FLAG) {
        result = `${arg} ${result}`.trim();
        continue;
      }
      if (arg === END_OF_OPTIONS) {
        break;
      }
      if (this.isCommandFlag(arg) || (!onlyFlags && this.isCommand(arg))) {
        result = `${result} ${arg}`.trim();
        if (this.isCommand(arg) && !this.isManagementCommand(arg)) {
          onlyFlags = true;
        }
      }
    }
    return result;
  }

  isCommand(word: string): boolean {
    return this.refs.commands.has(word) || this.isManagementCommand(word);
  }

  isManagementCommand(word: string): boolean {
    return this.refs.managementCommands.has(word);
  }

  isCommandFlag(word: string): boolean {
    return this.refs.commandFlags.has(word);
  }
}

const defaultClassifier = new CommandClassifier();

export function classifyCommand(args: readonly string[]): string {
  return defaultClassifier.classify(args);
}

/** True when `--quiet` or `-q` appears as a whole token. */
export function hasQuietFlag(args: readonly string[]): boolean {
  return args.some((a) => a === "--quiet" || a === "-q");
}
