/**
 * Command Runner
 *
 * Classifies a line, stores it in the command slot and executes it.
 * Classification and execution errors are printed here and never
 * propagate; only the "exit" outcome is handed back to the caller.
 */

import type { Command } from "./command.js";
import { classifyCommand } from "./parser.js";
import { executeCommand, type ExecutionOutcome } from "./executor.js";
import type { Terminal } from "../ui/output.js";

/**
 * Run one line of input.
 *
 * On a classification failure the slot is reset to null and nothing runs.
 *
 * @param line - Last line read, or null if nothing has been read yet
 * @param command - Slot reused across calls
 */
export function runCommand(
  line: string | null,
  command: Command,
  terminal: Terminal
): ExecutionOutcome {
  const classified = classifyCommand(line);
  if (!classified.success) {
    command.reset();
    terminal.printError(classified.error.toDisplayMessage());
    return "continue";
  }

  command.set(classified.command);

  const executed = executeCommand(command.variant, terminal);
  if (!executed.success) {
    terminal.printError(executed.error.toDisplayMessage());
    return "continue";
  }

  return executed.outcome;
}
