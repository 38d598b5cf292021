/**
 * sqldb - interactive shell for a small SQL database
 */

// Commands
export { Command, type CommandKind, type MetaCommand, type Query } from "./sql/command.js";
export {
  CommandError,
  EmptyBufferError,
  InvalidBufferError,
  UnrecognizedMetaCommandError,
  UnrecognizedQueryError,
  UnrecognizedCommandError,
  isCommandError,
  type ClassificationError,
  type ExecutionError,
} from "./sql/errors.js";
export {
  classifyCommand,
  isMetaCommand,
  parseMetaCommand,
  parseQuery,
  META_COMMAND_PREFIX,
  META_COMMANDS,
  QUERY_KEYWORDS,
  type ClassifyResult,
} from "./sql/parser.js";
export {
  executeCommand,
  formatHelp,
  type ExecuteResult,
  type ExecutionOutcome,
} from "./sql/executor.js";
export { runCommand } from "./sql/runner.js";

// Input
export {
  InputBuffer,
  InputError,
  InputClosedError,
  InputReadError,
  isInputError,
  type InputBufferOptions,
} from "./input/input-buffer.js";

// Shell
export {
  SqlShell,
  EXIT_SUCCESS,
  EXIT_INPUT_FAILURE,
  type SqlShellOptions,
} from "./shell/repl.js";

// Configuration
export {
  loadProgramMetadata,
  ProgramMetadataSchema,
  type ProgramMetadata,
} from "./config/metadata.js";
export {
  ShellConfigSchema,
  loadShellConfigFile,
  findShellConfig,
  getDefaultShellConfig,
  resolveShellSettings,
  type ShellConfig,
  type ShellSettings,
} from "./config/shell.js";

// UI
export { createTerminal, type Terminal, type TerminalOptions } from "./ui/output.js";
export { formatBanner, formatPrompt, formatTimestamp } from "./ui/banner.js";
