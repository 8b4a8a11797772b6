import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { openSession, saveSession } from "../session.js";
import { graphView } from "../graph.js";
import { renderJson } from "../dotRenderer.js";
import { buildColconCommand } from "../colconCommand.js";
import { loadSettings, settingsPathFor } from "../settings.js";

describe("integration: scan + graph + selection + settings", () => {
  let root: string;

  function writePackage(dir: string, name: string, deps: string[]): void {
    const pkgDir = path.join(root, "src", dir);
    fs.mkdirSync(pkgDir, { recursive: true });
    fs.writeFileSync(
      path.join(pkgDir, "package.xml"),
      `<?xml version="1.0"?>
<package format="3">
  <name>${name}</name>
  <version>0.1.0</version>
${deps.map((d) => `  <exec_depend>${d}</exec_depend>`).join("\n")}
</package>
`,
    );
  }

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "colcon-workbench-session-"));
    // planner → map_server → msgs, teleop → msgs, planner also needs rclcpp (not in the workspace)
    writePackage("planner", "planner", ["map_server", "rclcpp"]);
    writePackage("map_server", "map_server", ["msgs"]);
    writePackage("interfaces/msgs", "msgs", []);
    writePackage("teleop", "teleop", ["msgs"]);
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("opens with nothing selected and every package shown", () => {
    const session = openSession({ root, verbose: false });

    expect(session.selection.selected()).toEqual([]);
    expect(graphView(session.graph, []).nodes).toEqual(["map_server", "msgs", "planner", "teleop"]);
    expect(session.settingsPath).toBe(settingsPathFor(root));
    expect(session.settingsError).toBeUndefined();
  });

  it("persists a selection and restores it on the next open", () => {
    const first = openSession({ root, verbose: false });
    first.selection.toggle("planner", true);
    saveSession(first);

    expect(loadSettings(first.settingsPath).selectedPackages).toEqual([
      "map_server",
      "msgs",
      "planner",
    ]);

    const second = openSession({ root, verbose: false });
    expect(second.selection.selected()).toEqual(["map_server", "msgs", "planner"]);
  });

  it("drops selected packages that disappeared between sessions", () => {
    const first = openSession({ root, verbose: false });
    first.selection.toggle("planner", true);
    saveSession(first);

    fs.rmSync(path.join(root, "src", "planner"), { recursive: true });
    const second = openSession({ root, verbose: false });

    expect(second.selection.selected()).toEqual(["map_server", "msgs"]);
  });

  it("falls back to defaults when the settings file is unusable", () => {
    fs.writeFileSync(settingsPathFor(root), "[");

    const session = openSession({ root, verbose: false });

    expect(session.settingsError?.settingsPath).toBe(settingsPathFor(root));
    expect(session.settings.selectedPackages).toEqual([]);
  });

  it("renders the selection closure and the build command", () => {
    const session = openSession({ root, verbose: false });
    session.selection.toggle("map_server", true);
    const selected = session.selection.selected();

    const payload = renderJson(graphView(session.graph, selected), {
      selected: new Set(selected),
      theme: session.settings.theme,
    });
    expect(payload.nodes.map((n) => n.id)).toEqual(["map_server", "msgs"]);
    expect(payload.edges).toEqual([{ from: "map_server", to: "msgs" }]);

    const argv = buildColconCommand(
      { symlinkInstall: true, parallelWorkers: 2, buildType: "auto" },
      selected,
    );
    expect(argv.slice(-3)).toEqual(["--packages-select", "map_server", "msgs"]);
  });

  it("deselecting a shared dependency deselects every dependent", () => {
    const session = openSession({ root, verbose: false });
    session.selection.selectAll();

    session.selection.toggle("msgs", false);

    expect(session.selection.selected()).toEqual([]);
  });
});
