/**
 * Command Classifier
 *
 * Maps one line of input to a command kind or a classification error.
 * Lines starting with `.` are meta commands and must match a known
 * directive exactly; anything else must start with a known query keyword.
 *
 * Adding a directive means adding a table entry here and a member to the
 * matching union in command.ts.
 */

import type { CommandKind, MetaCommand, Query } from "./command.js";
import {
  EmptyBufferError,
  InvalidBufferError,
  UnrecognizedMetaCommandError,
  UnrecognizedQueryError,
  type ClassificationError,
} from "./errors.js";

/** Leading character of every meta command */
export const META_COMMAND_PREFIX = ".";

/**
 * Recognized meta commands, keyed by their literal form.
 */
export const META_COMMANDS: Readonly<Record<string, { command: MetaCommand; description: string }>> = {
  ".exit": { command: "exit", description: "Exit the shell" },
  ".help": { command: "help", description: "Show this message" },
};

/**
 * Recognized query keywords. Keywords are matched as lowercase prefixes
 * and no keyword is a prefix of another.
 */
export const QUERY_KEYWORDS: ReadonlyArray<{ keyword: string; query: Query; description: string }> = [
  { keyword: "insert", query: "insert", description: "Insert a row (not yet implemented)" },
  { keyword: "select", query: "select", description: "Query rows (not yet implemented)" },
];

/**
 * Result of classifying a line.
 */
export type ClassifyResult =
  | { success: true; command: CommandKind }
  | { success: false; error: ClassificationError };

/**
 * Check if input is a meta command (after surrounding whitespace is dropped).
 */
export function isMetaCommand(input: string): boolean {
  return input.trim().startsWith(META_COMMAND_PREFIX);
}

/**
 * Look up a meta command by its literal form.
 */
export function parseMetaCommand(input: string): MetaCommand | null {
  return Object.hasOwn(META_COMMANDS, input) ? META_COMMANDS[input].command : null;
}

/**
 * Find the query keyword the input starts with.
 */
export function parseQuery(input: string): Query | null {
  const match = QUERY_KEYWORDS.find((entry) => input.startsWith(entry.keyword));
  return match ? match.query : null;
}

/**
 * Classify a line of input.
 *
 * @param line - Last line read, or null if nothing has been read yet
 */
export function classifyCommand(line: string | null): ClassifyResult {
  if (line === null) {
    return { success: false, error: new EmptyBufferError() };
  }

  const input = line.trim();
  if (input.length === 0) {
    return { success: false, error: new InvalidBufferError() };
  }

  if (isMetaCommand(input)) {
    const command = parseMetaCommand(input);
    if (command === null) {
      return { success: false, error: new UnrecognizedMetaCommandError(input) };
    }
    return { success: true, command: { type: "meta", command } };
  }

  const query = parseQuery(input);
  if (query === null) {
    return { success: false, error: new UnrecognizedQueryError(input) };
  }
  return { success: true, command: { type: "query", query } };
}
