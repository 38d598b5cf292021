/**
 * Command Executor
 *
 * Performs the side effect of a classified command. Query branches are
 * placeholders until a storage engine exists.
 */

import type { CommandKind, MetaCommand, Query } from "./command.js";
import { UnrecognizedCommandError, type ExecutionError } from "./errors.js";
import { META_COMMANDS, QUERY_KEYWORDS } from "./parser.js";
import type { Terminal } from "../ui/output.js";

/**
 * What the read loop should do after a command ran.
 */
export type ExecutionOutcome = "continue" | "exit";

export type ExecuteResult =
  | { success: true; outcome: ExecutionOutcome }
  | { success: false; error: ExecutionError };

const QUERY_ACKNOWLEDGEMENTS: Record<Query, string> = {
  insert: "This is where we would do an insert.",
  select: "This is where we would do a select.",
};

/**
 * Usage text listing every recognized directive.
 */
export function formatHelp(): string {
  const width = Math.max(
    ...Object.keys(META_COMMANDS).map((name) => name.length),
    ...QUERY_KEYWORDS.map((entry) => entry.keyword.length)
  ) + 3;

  const lines = ["Meta commands:"];
  for (const [name, entry] of Object.entries(META_COMMANDS)) {
    lines.push(`  ${name.padEnd(width)}${entry.description}`);
  }
  lines.push("Queries:");
  for (const entry of QUERY_KEYWORDS) {
    lines.push(`  ${entry.keyword.padEnd(width)}${entry.description}`);
  }
  return lines.join("\n");
}

function executeMetaCommand(command: MetaCommand, terminal: Terminal): ExecutionOutcome {
  switch (command) {
    case "exit":
      return "exit";
    case "help":
      terminal.print(formatHelp());
      return "continue";
  }
}

function executeQuery(query: Query, terminal: Terminal): ExecutionOutcome {
  terminal.print(QUERY_ACKNOWLEDGEMENTS[query]);
  return "continue";
}

/**
 * Execute a classified command.
 *
 * `.exit` is reported as the "exit" outcome; the caller decides when to stop.
 *
 * @param command - Contents of the command slot
 */
export function executeCommand(command: CommandKind | null, terminal: Terminal): ExecuteResult {
  if (command === null) {
    return { success: false, error: new UnrecognizedCommandError() };
  }

  const outcome = command.type === "meta"
    ? executeMetaCommand(command.command, terminal)
    : executeQuery(command.query, terminal);

  return { success: true, outcome };
}
