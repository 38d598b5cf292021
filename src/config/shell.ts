/**
 * Shell Configuration
 *
 * Schema and loader for sqldb.config.yaml.
 */

import { z } from "zod";
import * as fs from "fs/promises";
import * as path from "path";
import * as yaml from "js-yaml";

export const ShellConfigSchema = z.object({
  /** Name shown in the prompt instead of the program name */
  prompt: z.string().min(1).optional(),
  /** Print the start-up banner */
  banner: z.boolean().default(true),
  /** Force coloured output on or off */
  color: z.boolean().optional(),
});

export type ShellConfig = z.infer<typeof ShellConfigSchema>;

/**
 * Config file names to look for, in order.
 */
export const CONFIG_FILE_NAMES = [
  "sqldb.config.yaml",
  "sqldb.config.yml",
];

/**
 * Load shell configuration from a YAML file.
 *
 * An empty file yields the defaults.
 *
 * @throws Error if file can't be read or parsed, or fails validation
 */
export async function loadShellConfigFile(configPath: string): Promise<ShellConfig> {
  const content = await fs.readFile(configPath, "utf-8");
  const parsed = yaml.load(content) ?? {};

  const result = ShellConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `  - ${issue.path.join(".")}: ${issue.message}`
    ).join("\n");
    throw new Error(`Invalid shell config in ${configPath}:\n${issues}`);
  }

  return result.data;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Find the nearest config file, walking up from startDir.
 *
 * @returns Path of the config file, or null if there is none
 */
export async function findShellConfig(startDir: string): Promise<string | null> {
  let currentDir = path.resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const configPath = path.join(currentDir, fileName);
      if (await exists(configPath)) {
        return configPath;
      }
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
}

/**
 * Get default shell configuration.
 */
export function getDefaultShellConfig(): ShellConfig {
  return { banner: true };
}

/**
 * Settings the shell runs with once config and CLI flags are combined.
 */
export interface ShellSettings {
  promptName: string;
  banner: boolean;
  /** undefined leaves colour detection to the terminal */
  color?: boolean;
}

/**
 * Overrides coming from the command line.
 */
export interface ShellCLIOverrides {
  quiet?: boolean;
  color?: boolean;
}

/**
 * Combine config with CLI flags. CLI flags win.
 *
 * @param programName - Used for the prompt when the config sets none
 */
export function resolveShellSettings(
  programName: string,
  config: ShellConfig,
  overrides: ShellCLIOverrides = {}
): ShellSettings {
  return {
    promptName: config.prompt ?? programName,
    banner: overrides.quiet ? false : config.banner,
    color: overrides.color === false ? false : config.color,
  };
}
