import * as fs from "fs";
import * as path from "path";
import { compareIds } from "./types.js";

export const CLEANED_DIRS = ["build", "install"] as const;

/** Files colcon or editors rely on; they survive a clean */
export const PRESERVED_FILES = new Set(["COLCON_IGNORE", "compile_commands.json", ".built_by"]);

/** Entries left alone entirely */
export const SKIPPED_ENTRIES = new Set([".cache", ".idea"]);

export interface CleanOptions {
  dryRun: boolean;
}

export interface CleanFailure {
  path: string;
  message: string;
}

export interface CleanResult {
  removed: string[];
  kept: string[];
  failed: CleanFailure[];
}

/**
 * Empty the workspace's build/ and install/ directories.
 * Throws when neither exists; a failure on a single entry is collected and the clean continues.
 */
export function cleanWorkspace(root: string, options: CleanOptions = { dryRun: false }): CleanResult {
  const dirs = CLEANED_DIRS.map((d) => path.join(root, d)).filter((d) => fs.existsSync(d));
  if (dirs.length === 0) {
    throw new Error(`Neither build nor install directory found in ${root}`);
  }

  const result: CleanResult = { removed: [], kept: [], failed: [] };

  for (const dir of dirs) {
    const entries = fs.readdirSync(dir, { withFileTypes: true });
    entries.sort((a, b) => compareIds(a.name, b.name));

    for (const entry of entries) {
      const entryPath = path.join(dir, entry.name);
      const preserved = entry.isFile() && PRESERVED_FILES.has(entry.name);
      if (SKIPPED_ENTRIES.has(entry.name) || preserved) {
        result.kept.push(entryPath);
        continue;
      }

      if (options.dryRun) {
        result.removed.push(entryPath);
        continue;
      }

      try {
        fs.rmSync(entryPath, { recursive: entry.isDirectory(), force: false });
        result.removed.push(entryPath);
      } catch (err) {
        result.failed.push({
          path: entryPath,
          message: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }

  return result;
}
