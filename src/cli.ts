#!/usr/bin/env node
import { Command } from "commander";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { execSync } from "child_process";
import type { PackageId } from "./types.js";
import { dependenciesOf, dependentsOf, hasPackage, packageIds } from "./types.js";
import { graphView } from "./graph.js";
import { DEPENDENCY_KINDS } from "./manifest.js";
import { filterPackages } from "./workspace.js";
import type { Session } from "./session.js";
import { openSession, saveSession } from "./session.js";
import type { BuildType, Settings, Theme } from "./settings.js";
import {
  BUILD_TYPES,
  THEMES,
  defaultSettings,
  loadSettings,
  saveSettings,
  settingsPathFor,
  SettingsError,
} from "./settings.js";
import { buildColconCommand, formatCommand, openCommand } from "./colconCommand.js";
import { cleanWorkspace } from "./clean.js";
import { renderDot, renderJson } from "./dotRenderer.js";
import { renderHtml } from "./htmlRenderer.js";

type GlobalOptions = {
  root?: string;
  config?: string;
  verbose: boolean;
};

interface BuildFlags {
  symlinkInstall?: boolean;
  parallelWorkers?: string;
  buildType?: string;
}

function fail(message: string): never {
  process.stderr.write(`Error: ${message}\n`);
  process.exit(1);
}

/** Run an action, turning thrown errors into "Error: ..." and exit code 1. */
function guarded(action: () => void): void {
  try {
    action();
  } catch (err) {
    fail(err instanceof Error ? err.message : String(err));
  }
}

function resolveRoot(opts: GlobalOptions): string {
  return path.resolve(opts.root ?? process.cwd());
}

function resolveSettingsPath(opts: GlobalOptions): string {
  return opts.config ? path.resolve(opts.config) : settingsPathFor(resolveRoot(opts));
}

function open(opts: GlobalOptions): Session {
  const root = resolveRoot(opts);
  if (opts.verbose) {
    process.stderr.write(`Workspace root: ${root}\n`);
  }

  const session = openSession({
    root,
    settingsPath: resolveSettingsPath(opts),
    verbose: opts.verbose,
  });

  if (session.settingsError) {
    process.stderr.write(`Warning: ${session.settingsError.message}; using defaults\n`);
  }
  for (const failure of session.scan.failures) {
    process.stderr.write(`Warning: skipped ${failure.message}\n`);
  }
  for (const dup of session.scan.duplicates) {
    process.stderr.write(
      `Warning: duplicate package "${dup.name}" at ${dup.manifestPath} (keeping ${dup.keptPath})\n`,
    );
  }
  return session;
}

function requirePackages(session: Session, names: string[]): PackageId[] {
  for (const name of names) {
    if (!hasPackage(session.graph, name)) {
      throw new Error(`Unknown package "${name}"`);
    }
  }
  return names;
}

function parseWorkers(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`--parallel-workers must be a positive integer (got "${value}")`);
  }
  return n;
}

function parseBuildType(value: string): BuildType {
  const match = BUILD_TYPES.find((t) => t === value);
  if (!match) {
    throw new Error(`--build-type must be one of ${BUILD_TYPES.join(", ")} (got "${value}")`);
  }
  return match;
}

function parseTheme(value: string): Theme {
  const match = THEMES.find((t) => t === value);
  if (!match) {
    throw new Error(`--theme must be one of ${THEMES.join(", ")} (got "${value}")`);
  }
  return match;
}

function applyBuildFlags(settings: Settings, flags: BuildFlags): Settings {
  return {
    ...settings,
    ...(flags.symlinkInstall !== undefined ? { symlinkInstall: flags.symlinkInstall } : {}),
    ...(flags.parallelWorkers !== undefined
      ? { parallelWorkers: parseWorkers(flags.parallelWorkers) }
      : {}),
    ...(flags.buildType !== undefined ? { buildType: parseBuildType(flags.buildType) } : {}),
  };
}

function addBuildFlags(cmd: Command): Command {
  return cmd
    .option("--symlink-install", "Pass --symlink-install to colcon")
    .option("--no-symlink-install", "Do not pass --symlink-install")
    .option("--parallel-workers <n>", "Number of parallel colcon workers")
    .option("--build-type <type>", `CMAKE_BUILD_TYPE: ${BUILD_TYPES.join(", ")}`);
}

function openInBrowser(file: string): void {
  execSync(openCommand(file, process.platform));
}

function printChanges(changes: ReadonlyMap<PackageId, boolean>): void {
  const ids = [...changes.keys()].sort();
  for (const id of ids) {
    process.stdout.write(`${changes.get(id) ? "+" : "-"} ${id}\n`);
  }
  if (ids.length === 0) {
    process.stdout.write("No changes\n");
  }
}

const program = new Command();

program
  .name("colcon-workbench")
  .description("Select colcon workspace packages and explore their dependency graph")
  .option("--root <dir>", "Workspace root (the directory containing src/)")
  .option("--config <file>", "Settings file (default: <root>/.colcon-workbench.json)")
  .option("--verbose", "Show progress on stderr", false);

program
  .command("list")
  .description("List workspace packages and their selection state")
  .option("--filter <text>", "Only packages whose name contains <text> (case-insensitive)", "")
  .option("--json", "Output JSON", false)
  .action((opts: { filter: string; json: boolean }, cmd: Command) => {
    guarded(() => {
      const globals = cmd.optsWithGlobals<GlobalOptions>();
      const session = open(globals);
      const ids = filterPackages(packageIds(session.graph), opts.filter);

      if (opts.json) {
        const rows = ids.map((id) => ({
          name: id,
          version: session.scan.packages.get(id)?.version ?? null,
          selected: session.selection.isSelected(id),
          dependencies: [...dependenciesOf(session.graph, id)].sort(),
          dependents: [...dependentsOf(session.graph, id)].sort(),
        }));
        process.stdout.write(JSON.stringify(rows, null, 2) + "\n");
        return;
      }

      for (const id of ids) {
        const mark = session.selection.isSelected(id) ? "[x]" : "[ ]";
        const deps = dependenciesOf(session.graph, id).size;
        process.stdout.write(`${mark} ${id} (${deps} workspace deps)\n`);
      }
      if (globals.verbose) {
        process.stderr.write(`${ids.length} of ${session.scan.packages.size} packages shown\n`);
      }
    });
  });

program
  .command("select")
  .description("Select packages together with everything they depend on")
  .argument("[packages...]", "Package names")
  .option("--all", "Select every package", false)
  .action((packages: string[], opts: { all: boolean }, cmd: Command) => {
    guarded(() => {
      const session = open(cmd.optsWithGlobals<GlobalOptions>());
      if (opts.all) {
        printChanges(session.selection.selectAll());
      } else {
        if (packages.length === 0) throw new Error("Name at least one package, or pass --all");
        for (const id of requirePackages(session, packages)) {
          printChanges(session.selection.toggle(id, true));
        }
      }
      saveSession(session);
    });
  });

program
  .command("deselect")
  .description("Deselect packages together with everything that depends on them")
  .argument("[packages...]", "Package names")
  .option("--all", "Deselect every package", false)
  .action((packages: string[], opts: { all: boolean }, cmd: Command) => {
    guarded(() => {
      const session = open(cmd.optsWithGlobals<GlobalOptions>());
      if (opts.all) {
        printChanges(session.selection.deselectAll());
      } else {
        if (packages.length === 0) throw new Error("Name at least one package, or pass --all");
        for (const id of requirePackages(session, packages)) {
          printChanges(session.selection.toggle(id, false));
        }
      }
      saveSession(session);
    });
  });

program
  .command("info")
  .description("Show a package's manifest details and its neighbours")
  .argument("<package>", "Package name")
  .action((name: string, _opts: object, cmd: Command) => {
    guarded(() => {
      const session = open(cmd.optsWithGlobals<GlobalOptions>());
      const manifest = session.scan.packages.get(name);
      if (!manifest) throw new Error(`Unknown package "${name}"`);

      const out: string[] = [];
      out.push(`Name:        ${manifest.name}`);
      if (manifest.version) out.push(`Version:     ${manifest.version}`);
      if (manifest.description) out.push(`Description: ${manifest.description}`);
      out.push(`Path:        ${manifest.packageDir}`);
      if (manifest.maintainers.length > 0) {
        out.push(`Maintainers: ${manifest.maintainers.join(", ")}`);
      }
      if (manifest.licenses.length > 0) out.push(`Licenses:    ${manifest.licenses.join(", ")}`);
      out.push(`Selected:    ${session.selection.isSelected(name) ? "yes" : "no"}`);

      out.push("", "Declared dependencies:");
      for (const kind of DEPENDENCY_KINDS) {
        const ids = manifest.dependenciesByKind[kind];
        if (ids.length > 0) out.push(`  ${kind}: ${ids.join(", ")}`);
      }

      const inWorkspace = [...dependenciesOf(session.graph, name)].sort();
      const external = [...manifest.dependencies].filter((d) => !hasPackage(session.graph, d)).sort();
      const dependents = [...dependentsOf(session.graph, name)].sort();
      out.push("", `Workspace dependencies: ${inWorkspace.join(", ") || "(none)"}`);
      out.push(`External dependencies:  ${external.join(", ") || "(none)"}`);
      out.push(`Dependents:             ${dependents.join(", ") || "(none)"}`);

      process.stdout.write(out.join("\n") + "\n");
    });
  });

program
  .command("graph")
  .description("Render the dependency graph of the selection (or the whole workspace)")
  .option("-o, --output <file>", "Write output to file (default: stdout)")
  .option("--json", "Output JSON instead of DOT", false)
  .option("--html", "Output self-contained HTML visualiser", false)
  .option("--open", "Write to a temp file and open it", false)
  .action(
    (
      opts: { output?: string; json: boolean; html: boolean; open: boolean },
      cmd: Command,
    ) => {
      guarded(() => {
        const globals = cmd.optsWithGlobals<GlobalOptions>();
        const session = open(globals);
        const selected = session.selection.selected();
        const view = graphView(session.graph, selected);

        if (globals.verbose) {
          process.stderr.write(`Graph: ${view.nodes.length} nodes, ${view.edges.length} edges\n`);
        }

        const renderOptions = { selected: new Set(selected), theme: session.settings.theme };
        let output: string;
        if (opts.html) {
          output = renderHtml(renderJson(view, renderOptions));
        } else if (opts.json) {
          output = JSON.stringify(renderJson(view, renderOptions), null, 2);
        } else {
          output = renderDot(view, renderOptions);
        }

        if (opts.open) {
          const ext = opts.html ? ".html" : opts.json ? ".json" : ".dot";
          const tmpFile = path.join(os.tmpdir(), `colcon-workbench-${Date.now()}${ext}`);
          fs.writeFileSync(tmpFile, output);
          if (globals.verbose) {
            process.stderr.write(`Opening ${tmpFile}\n`);
          }
          openInBrowser(tmpFile);
        } else if (opts.output) {
          fs.writeFileSync(opts.output, output);
          if (globals.verbose) {
            process.stderr.write(`Output written to ${opts.output}\n`);
          }
        } else {
          process.stdout.write(output + "\n");
        }
      });
    },
  );

addBuildFlags(
  program.command("command").description("Print the colcon build command for the selection"),
).action((flags: BuildFlags, cmd: Command) => {
  guarded(() => {
    const session = open(cmd.optsWithGlobals<GlobalOptions>());
    const settings = applyBuildFlags(session.settings, flags);
    process.stdout.write(formatCommand(buildColconCommand(settings, session.selection.selected())) + "\n");
  });
});

addBuildFlags(program.command("settings").description("Show or change the persisted build settings"))
  .option("--theme <theme>", `Visualiser theme: ${THEMES.join(", ")}`)
  .action((flags: BuildFlags & { theme?: string }, cmd: Command) => {
    guarded(() => {
      const settingsPath = resolveSettingsPath(cmd.optsWithGlobals<GlobalOptions>());
      let settings: Settings;
      try {
        settings = loadSettings(settingsPath);
      } catch (err) {
        if (!(err instanceof SettingsError)) throw err;
        process.stderr.write(`Warning: ${err.message}; using defaults\n`);
        settings = defaultSettings();
      }

      const updated = {
        ...applyBuildFlags(settings, flags),
        ...(flags.theme !== undefined ? { theme: parseTheme(flags.theme) } : {}),
      };
      if (JSON.stringify(updated) !== JSON.stringify(settings)) {
        saveSettings(settingsPath, updated);
      }
      process.stdout.write(JSON.stringify(updated, null, 2) + "\n");
    });
  });

program
  .command("clean")
  .description("Empty the workspace's build/ and install/ directories")
  .option("--dry-run", "Only list what would be removed", false)
  .option("--yes", "Confirm the removal", false)
  .action((opts: { dryRun: boolean; yes: boolean }, cmd: Command) => {
    guarded(() => {
      if (!opts.dryRun && !opts.yes) {
        throw new Error("clean removes build/ and install/ contents; pass --yes to confirm");
      }
      const root = resolveRoot(cmd.optsWithGlobals<GlobalOptions>());
      const result = cleanWorkspace(root, { dryRun: opts.dryRun });

      const verb = opts.dryRun ? "would remove" : "removed";
      for (const p of result.removed) process.stdout.write(`${verb} ${p}\n`);
      for (const p of result.kept) process.stdout.write(`kept ${p}\n`);
      for (const f of result.failed) {
        process.stderr.write(`Warning: failed to remove ${f.path}: ${f.message}\n`);
      }
    });
  });

program.parse();
