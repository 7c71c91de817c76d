import { logs } from "./logs";
import { version } from "./version";
import type { Command } from "./types";

export const builtinCommands: readonly Command[] = [logs, version];

export function findCommand(name: string | undefined, commands: readonly Command[] = builtinCommands): Command | undefined {
  return name === undefined ? undefined : commands.find((c) => c.name === name);
}

/** Boolean flags of every command, long and short, so the parser never feeds them a value. */
export function booleanFlagNames(commands: readonly Command[] = builtinCommands): string[] {
  return commands.flatMap((c) =>
    (c.flags ?? [])
      .filter((f) => f.type === "boolean")
      .flatMap((f) => (f.alias ? [f.name, f.alias] : [f.name])),
  );
}

export function renderHelp(commands: readonly Command[] = builtinCommands): string[] {
  const width = Math.max(...commands.map((c) => c.name.length));
  return [
    "Usage: stevedore [OPTIONS] COMMAND",
    "",
    "Commands:",
    ...commands.map((c) => `  ${c.name.padEnd(width)}  ${c.describe}`),
    "",
    "Options:",
    "  --json              Print machine-readable output",
    "  -q, --quiet         Only print command output",
    "  --debug             Enable debug logging",
    "  --log-level LEVEL   trace, debug, info, warn, error or silent",
    "  --version           Show the CLI version",
  ];
}

/** Usage, flags and examples of one command, for `stevedore COMMAND --help`. */
export function renderCommandHelp(cmd: Command): string[] {
  const flags = (cmd.flags ?? []).map((f) => ({
    label: `${f.alias ? `-${f.alias}, ` : "    "}--${f.name}${f.type === "string" ? " string" : ""}`,
    description: f.description ?? "",
  }));
  const width = Math.max(0, ...flags.map((f) => f.label.length));
  const lines = [`Usage: stevedore ${cmd.name} [OPTIONS]`, "", cmd.describe];
  if (flags.length > 0) {
    lines.push("", "Options:", ...flags.map((f) => `  ${f.label.padEnd(width)}  ${f.description}`.trimEnd()));
  }
  if (cmd.examples?.length) {
    lines.push("", "Examples:", ...cmd.examples.map((e) => `  ${e}`));
  }
  return lines;
}

export { logs, version };
export type { Command, CommandContext, CommandFlags, FlagDefinition, LogsBackend } from "./types";
