import fs from "node:fs/promises";
import { FilesystemError } from "../core/errors.js";

export type AddProfileResult = "added" | "exists";

export function profileSnippet(profile: string): string {
  return `\n[profile.${profile}]\ninherits = "release"\ndebug = true\n`;
}

function hasProfileTable(manifest: string, profile: string): boolean {
  const header = `[profile.${profile}]`;
  return manifest.split("\n").some((line) => line.trim() === header);
}

/**
 * Appends a `[profile.<name>]` table inheriting from release with debug
 * info to the manifest, unless the table is already declared.
 */
export async function addProfilingProfile(
  manifestPath: string,
  profile: string,
): Promise<AddProfileResult> {
  let manifest: string;
  try {
    manifest = await fs.readFile(manifestPath, "utf-8");
  } catch (err) {
    throw new FilesystemError(
      `Could not read ${manifestPath}: ${err instanceof Error ? err.message : String(err)}`,
      manifestPath,
    );
  }

  if (hasProfileTable(manifest, profile)) {
    return "exists";
  }

  try {
    await fs.appendFile(manifestPath, profileSnippet(profile), "utf-8");
  } catch (err) {
    throw new FilesystemError(
      `Could not write ${manifestPath}: ${err instanceof Error ? err.message : String(err)}`,
      manifestPath,
    );
  }
  return "added";
}
