/**
 * Banner and Prompt
 */

import type { ProgramMetadata } from "../config/metadata.js";
import type { Terminal } from "./output.js";

const pad = (n: number): string => String(n).padStart(2, "0");

/**
 * Format a date as `YYYY-MM-DD HH:MM:SS` in local time.
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function formatPrompt(name: string): string {
  return `${name} > `;
}

/**
 * Start-up banner: name, version, time, then usage hints.
 */
export function formatBanner(
  metadata: ProgramMetadata,
  now: Date,
  colors: Terminal["colors"]
): string {
  return [
    `${colors.bold(metadata.name)} version ${metadata.version} ${formatTimestamp(now)}`,
    colors.dim('Enter ".help" for usage hints.'),
    colors.dim("Connected to a transient in-memory database."),
    colors.dim('Use ".open FILENAME" to reopen on a persistent database.'),
    colors.dim('Enter ".exit" to exit the database.'),
  ].join("\n");
}
