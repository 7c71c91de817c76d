import commandsData from "./commands.json";

/**
 * Token sets the classifier matches against. Built once at start and never mutated.
 */
export interface ReferenceSets {
  /** Terminal commands: once one is seen, only flags are still recorded. */
  readonly commands: ReadonlySet<string>;
  /** Command groups (`context`, `compose`, ...) that prefix a subcommand. */
  readonly managementCommands: ReadonlySet<string>;
  /** Flags worth recording wherever they appear. */
  readonly commandFlags: ReadonlySet<string>;
}

export interface ReferenceSetsInput {
  commands: readonly string[];
  managementCommands: readonly string[];
  commandFlags: readonly string[];
}

export function createReferenceSets(input: ReferenceSetsInput): ReferenceSets {
  return Object.freeze({
    commands: new Set(input.commands),
    managementCommands: new Set(input.managementCommands),
    commandFlags: new Set(input.commandFlags),
  });
}

export const defaultReferenceSets: ReferenceSets = createReferenceSets(commandsData);
