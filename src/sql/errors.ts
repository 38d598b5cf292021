/**
 * Command Errors
 *
 * Classification and execution failures. Both kinds are recoverable:
 * the runner prints them and the read loop carries on.
 */

/**
 * Base class for all command errors.
 */
export class CommandError extends Error {
  constructor(
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = "CommandError";
  }

  /**
   * Line shown to the user on the error stream.
   */
  toDisplayMessage(): string {
    return this.message;
  }
}

/**
 * No line was ever read into the buffer.
 */
export class EmptyBufferError extends CommandError {
  constructor() {
    super("EMPTY_BUFFER", "Input buffer is empty.");
    this.name = "EmptyBufferError";
  }
}

/**
 * A line was read but holds nothing to classify.
 */
export class InvalidBufferError extends CommandError {
  constructor() {
    super("INVALID_BUFFER", "Invalid input buffer.");
    this.name = "InvalidBufferError";
  }
}

/**
 * A `.`-prefixed line that names no known meta command.
 */
export class UnrecognizedMetaCommandError extends CommandError {
  constructor(public readonly input: string) {
    super("UNRECOGNIZED_META_COMMAND", `Unrecognized command: '${input}'.`);
    this.name = "UnrecognizedMetaCommandError";
  }
}

/**
 * A line that starts with no known query keyword.
 */
export class UnrecognizedQueryError extends CommandError {
  constructor(public readonly input: string) {
    super("UNRECOGNIZED_QUERY", `Unrecognized query: '${input}'.`);
    this.name = "UnrecognizedQueryError";
  }
}

export type ClassificationError =
  | EmptyBufferError
  | InvalidBufferError
  | UnrecognizedMetaCommandError
  | UnrecognizedQueryError;

/**
 * Dispatch was asked to run an empty command slot.
 */
export class UnrecognizedCommandError extends CommandError {
  constructor() {
    super("UNRECOGNIZED_COMMAND", "Unrecognized command.");
    this.name = "UnrecognizedCommandError";
  }

  toDisplayMessage(): string {
    return `Error executing command: ${this.message}`;
  }
}

export type ExecutionError = UnrecognizedCommandError;

/**
 * Type guard for CommandError.
 */
export function isCommandError(error: unknown): error is CommandError {
  return error instanceof CommandError;
}
