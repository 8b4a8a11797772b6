import type { DependencyGraph } from "./types.js";
import { buildGraphFromManifests } from "./graph.js";
import { SelectionController } from "./selection.js";
import type { Settings } from "./settings.js";
import { defaultSettings, loadSettings, saveSettings, settingsPathFor, SettingsError } from "./settings.js";
import type { WorkspaceScan } from "./workspace.js";
import { scanWorkspace } from "./workspace.js";

export interface SessionOptions {
  root: string;
  /** Defaults to <root>/.colcon-workbench.json */
  settingsPath?: string;
  verbose: boolean;
}

export interface Session {
  root: string;
  settingsPath: string;
  scan: WorkspaceScan;
  graph: DependencyGraph;
  settings: Settings;
  selection: SelectionController;
  /** Set when the settings file was unusable and defaults were loaded instead */
  settingsError?: SettingsError;
}

/**
 * Scan the workspace, build its graph and restore the persisted selection.
 * Packages that disappeared since the last save are dropped from the selection.
 */
export function openSession(options: SessionOptions): Session {
  const settingsPath = options.settingsPath ?? settingsPathFor(options.root);

  let settings: Settings;
  let settingsError: SettingsError | undefined;
  try {
    settings = loadSettings(settingsPath);
  } catch (err) {
    if (!(err instanceof SettingsError)) throw err;
    settingsError = err;
    settings = defaultSettings();
  }

  const scan = scanWorkspace(options.root, { verbose: options.verbose });
  const graph = buildGraphFromManifests(scan.packages.values());
  const selection = new SelectionController(graph, settings.selectedPackages);

  return {
    root: options.root,
    settingsPath,
    scan,
    graph,
    settings,
    selection,
    ...(settingsError ? { settingsError } : {}),
  };
}

export function saveSession(session: Session): void {
  session.settings = { ...session.settings, selectedPackages: session.selection.selected() };
  saveSettings(session.settingsPath, session.settings);
}
