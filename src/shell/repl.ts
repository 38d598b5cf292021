/**
 * SQL Shell
 *
 * The read loop: print the prompt, read a line, run it, repeat until
 * `.exit` or until the input fails.
 */

import { Command } from "../sql/command.js";
import { runCommand } from "../sql/runner.js";
import { InputBuffer, isInputError } from "../input/input-buffer.js";
import { formatBanner, formatPrompt } from "../ui/banner.js";
import type { Terminal } from "../ui/output.js";
import type { ProgramMetadata } from "../config/metadata.js";

/** Exit status after `.exit` */
export const EXIT_SUCCESS = 0;
/** Exit status when input ends or fails */
export const EXIT_INPUT_FAILURE = 1;

/**
 * Options for SqlShell.
 */
export interface SqlShellOptions {
  metadata: ProgramMetadata;
  terminal: Terminal;
  /** Input stream (defaults to process.stdin) */
  input?: NodeJS.ReadableStream;
  /** Name shown in the prompt (defaults to the program name) */
  promptName?: string;
  /** Print the start-up banner (defaults to true) */
  banner?: boolean;
  /** Clock for the banner timestamp */
  now?: () => Date;
}

export class SqlShell {
  private options: Required<Omit<SqlShellOptions, "input">> & { input?: NodeJS.ReadableStream };

  constructor(options: SqlShellOptions) {
    this.options = {
      metadata: options.metadata,
      terminal: options.terminal,
      input: options.input,
      promptName: options.promptName ?? options.metadata.name,
      banner: options.banner ?? true,
      now: options.now ?? (() => new Date()),
    };
  }

  /**
   * Run the read loop to completion.
   *
   * @returns Process exit status
   */
  async run(): Promise<number> {
    const { terminal, metadata, promptName } = this.options;
    const inputBuffer = new InputBuffer({ input: this.options.input });
    const command = new Command();

    if (this.options.banner) {
      terminal.print(formatBanner(metadata, this.options.now(), terminal.colors));
    }

    try {
      for (;;) {
        terminal.write(formatPrompt(promptName));
        await inputBuffer.read();

        if (runCommand(inputBuffer.buffer, command, terminal) === "exit") {
          return EXIT_SUCCESS;
        }
      }
    } catch (err) {
      if (isInputError(err)) {
        terminal.printError(err.toDisplayMessage());
        return EXIT_INPUT_FAILURE;
      }
      throw err;
    } finally {
      inputBuffer.close();
    }
  }
}
