/**
 * Terminal Output
 *
 * Output and error streams plus the colour palette used to write to them.
 */

import pc from "picocolors";

type Colors = ReturnType<typeof pc.createColors>;

/**
 * Options for createTerminal.
 */
export interface TerminalOptions {
  /** Output stream (defaults to process.stdout) */
  output?: NodeJS.WritableStream;
  /** Error stream (defaults to process.stderr) */
  errorOutput?: NodeJS.WritableStream;
  /** Colourise output (defaults to picocolors' own detection) */
  color?: boolean;
}

/**
 * Where the shell writes.
 */
export interface Terminal {
  output: NodeJS.WritableStream;
  errorOutput: NodeJS.WritableStream;
  colors: Colors;
  /** Write a full line to the output stream */
  print(text: string): void;
  /** Write a full line to the error stream */
  printError(text: string): void;
  /** Write text with no newline to the output stream */
  write(text: string): void;
}

export function createTerminal(options: TerminalOptions = {}): Terminal {
  const output = options.output ?? process.stdout;
  const errorOutput = options.errorOutput ?? process.stderr;
  const colors = pc.createColors(options.color ?? pc.isColorSupported);

  return {
    output,
    errorOutput,
    colors,
    print(text) {
      output.write(text + "\n");
    },
    printError(text) {
      errorOutput.write(colors.red(text) + "\n");
    },
    write(text) {
      output.write(text);
    },
  };
}
