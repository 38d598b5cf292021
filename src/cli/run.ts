#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Starts the interactive SQL shell.
 */

import { Command } from "commander";
import * as path from "path";
import { realpathSync } from "fs";
import { fileURLToPath } from "url";
import { loadProgramMetadata, type ProgramMetadata } from "../config/metadata.js";
import {
  findShellConfig,
  getDefaultShellConfig,
  loadShellConfigFile,
  resolveShellSettings,
} from "../config/shell.js";
import { SqlShell } from "../shell/repl.js";
import { createTerminal } from "../ui/output.js";

/**
 * CLI options from command line.
 */
interface CLIOptions {
  config?: string;
  quiet?: boolean;
  color?: boolean;
  verbose?: boolean;
}

/**
 * Streams and environment the CLI runs against.
 */
export interface CLIContext {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  errorOutput?: NodeJS.WritableStream;
  /** Directory the config search starts from (defaults to cwd) */
  cwd?: string;
  /** package.json to read name and version from */
  packageJsonPath?: string;
  now?: () => Date;
}

/**
 * Load config, then run the shell.
 */
async function startShell(
  metadata: ProgramMetadata,
  options: CLIOptions,
  context: CLIContext
): Promise<number> {
  const cwd = context.cwd ?? process.cwd();
  const configPath = options.config
    ? path.resolve(cwd, options.config)
    : await findShellConfig(cwd);
  const config = configPath ? await loadShellConfigFile(configPath) : getDefaultShellConfig();

  const settings = resolveShellSettings(metadata.name, config, {
    quiet: options.quiet,
    color: options.color,
  });

  const terminal = createTerminal({
    output: context.output,
    errorOutput: context.errorOutput,
    color: settings.color,
  });

  if (options.verbose) {
    terminal.print(terminal.colors.dim(`Config: ${configPath ?? "(defaults)"}`));
    terminal.print(terminal.colors.dim(`Program: ${metadata.name} ${metadata.version}`));
  }

  const shell = new SqlShell({
    metadata,
    terminal,
    input: context.input,
    promptName: settings.promptName,
    banner: settings.banner,
    now: context.now,
  });

  return shell.run();
}

/**
 * Main CLI execution.
 *
 * @returns Process exit status
 */
export async function runCLI(argv: string[] = process.argv, context: CLIContext = {}): Promise<number> {
  const metadata = await loadProgramMetadata(context.packageJsonPath);
  const program = new Command();
  let exitCode = 0;

  program
    .name(metadata.name)
    .description(metadata.description ?? "Interactive SQL shell")
    .version(metadata.version)
    .option("-c, --config <path>", "Shell configuration file (auto-detected if not specified)")
    .option("-q, --quiet", "Do not print the start-up banner")
    .option("--no-color", "Disable coloured output")
    .option("-v, --verbose", "Verbose output")
    .action(async (options: CLIOptions) => {
      try {
        exitCode = await startShell(metadata, options, context);
      } catch (err) {
        const errorOutput = context.errorOutput ?? process.stderr;
        errorOutput.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
        exitCode = 1;
      }
    });

  await program.parseAsync(argv);
  return exitCode;
}

// Run CLI if this is the main module
// Handle symlinks by resolving the real path
function isMainModule(): boolean {
  try {
    const currentFile = fileURLToPath(import.meta.url);
    const entryFile = realpathSync(process.argv[1]);
    return currentFile === entryFile;
  } catch {
    return false;
  }
}

const isTestEnvironment = typeof process !== "undefined" && !!process.env.VITEST;

if (!isTestEnvironment && isMainModule()) {
  runCLI().then(
    (code) => process.exit(code),
    (err) => {
      console.error(err);
      process.exit(1);
    }
  );
}
