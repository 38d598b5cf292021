/**
 * Program Metadata
 *
 * Name and version of the shell, read once from its package.json and
 * passed to whatever needs them.
 */

import { z } from "zod";
import * as fs from "fs/promises";
import { fileURLToPath } from "url";

export const ProgramMetadataSchema = z.object({
  /** Program name, shown in the prompt and banner */
  name: z.string().min(1),
  /** Semantic version */
  version: z.string().min(1),
  description: z.string().optional(),
});

export type ProgramMetadata = z.infer<typeof ProgramMetadataSchema>;

/**
 * package.json of this package. Same relative location from src/ and dist/.
 */
export const DEFAULT_PACKAGE_JSON_PATH = fileURLToPath(new URL("../../package.json", import.meta.url));

/**
 * Load program metadata from a package.json file.
 *
 * @throws Error if the file can't be read, isn't JSON, or lacks name/version
 */
export async function loadProgramMetadata(
  packageJsonPath: string = DEFAULT_PACKAGE_JSON_PATH
): Promise<ProgramMetadata> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await fs.readFile(packageJsonPath, "utf-8"));
  } catch (err) {
    throw new Error(
      `Failed to read package metadata from ${packageJsonPath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const result = ProgramMetadataSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `  - ${issue.path.join(".")}: ${issue.message}`
    ).join("\n");
    throw new Error(`Invalid package metadata in ${packageJsonPath}:\n${issues}`);
  }

  return result.data;
}
