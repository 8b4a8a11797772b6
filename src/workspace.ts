import * as fs from "fs";
import * as path from "path";
import type { PackageId, PackageManifest } from "./types.js";
import { compareIds } from "./types.js";
import { MANIFEST_FILE, ParseError, readManifest } from "./manifest.js";

/** colcon skips any directory holding this marker */
export const IGNORE_MARKER = "COLCON_IGNORE";

export interface ScanOptions {
  verbose: boolean;
}

export interface DuplicatePackage {
  name: PackageId;
  manifestPath: string;
  /** Manifest that was kept for this name */
  keptPath: string;
}

export interface WorkspaceScan {
  root: string;
  srcDir: string;
  packages: Map<PackageId, PackageManifest>;
  failures: ParseError[];
  duplicates: DuplicatePackage[];
}

function isPermissionError(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "EACCES" || err.code === "EPERM");
}

/** A package.xml file, or a symlink to one. A dangling link counts so that reading it reports the failure. */
function isManifestEntry(dir: string, entry: fs.Dirent): boolean {
  if (entry.name !== MANIFEST_FILE) return false;
  if (entry.isFile()) return true;
  if (!entry.isSymbolicLink()) return false;
  const target = fs.statSync(path.join(dir, entry.name), { throwIfNoEntry: false });
  return target === undefined || target.isFile();
}

/**
 * Every package.xml under srcDir, in sorted walk order.
 * Symlinked manifests are included; symlinked directories are not followed.
 */
export function findManifests(srcDir: string): string[] {
  const found: string[] = [];

  function walk(dir: string): void {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch (err) {
      if (isPermissionError(err)) return;
      throw err;
    }
    if (entries.some((e) => e.name === IGNORE_MARKER)) return;

    entries.sort((a, b) => compareIds(a.name, b.name));
    if (entries.some((e) => isManifestEntry(dir, e))) {
      found.push(path.join(dir, MANIFEST_FILE));
    }
    for (const entry of entries) {
      if (entry.isDirectory()) walk(path.join(dir, entry.name));
    }
  }

  walk(srcDir);
  return found;
}

/**
 * Parse every manifest under <root>/src.
 * A manifest that fails to parse is reported and left out; the scan carries on.
 */
export function scanWorkspace(root: string, options: ScanOptions = { verbose: false }): WorkspaceScan {
  const srcDir = path.join(root, "src");
  if (!fs.existsSync(srcDir) || !fs.statSync(srcDir).isDirectory()) {
    throw new Error(`src directory not found: ${srcDir}`);
  }

  const packages = new Map<PackageId, PackageManifest>();
  const failures: ParseError[] = [];
  const duplicates: DuplicatePackage[] = [];

  const manifestPaths = findManifests(srcDir);
  if (options.verbose) {
    process.stderr.write(`Found ${manifestPaths.length} manifests under ${srcDir}\n`);
  }

  for (const manifestPath of manifestPaths) {
    let manifest: PackageManifest;
    try {
      manifest = readManifest(manifestPath);
    } catch (err) {
      if (!(err instanceof ParseError)) throw err;
      failures.push(err);
      continue;
    }

    const existing = packages.get(manifest.name);
    if (existing) {
      duplicates.push({
        name: manifest.name,
        manifestPath,
        keptPath: existing.manifestPath,
      });
      continue;
    }
    packages.set(manifest.name, manifest);

    if (options.verbose) {
      process.stderr.write(
        `  ${manifest.name}: ${manifest.dependencies.size} declared dependencies\n`,
      );
    }
  }

  return { root, srcDir, packages, failures, duplicates };
}

/** Case-insensitive substring match; an empty query keeps everything. */
export function filterPackages(ids: Iterable<PackageId>, query: string): PackageId[] {
  const q = query.trim().toLowerCase();
  const all = [...ids];
  if (!q) return all;
  return all.filter((id) => id.toLowerCase().includes(q));
}
