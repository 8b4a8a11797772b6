import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { filterPackages, findManifests, scanWorkspace } from "../workspace.js";

function manifest(name: string, deps: string[] = []): string {
  const depLines = deps.map((d) => `  <depend>${d}</depend>`).join("\n");
  return `<?xml version="1.0"?>\n<package format="3">\n  <name>${name}</name>\n${depLines}\n</package>\n`;
}

describe("workspace scanning", () => {
  let root: string;
  let src: string;

  function writePackage(rel: string, content: string): string {
    const dir = path.join(src, rel);
    fs.mkdirSync(dir, { recursive: true });
    const file = path.join(dir, "package.xml");
    fs.writeFileSync(file, content);
    return file;
  }

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "colcon-workbench-ws-"));
    src = path.join(root, "src");
    fs.mkdirSync(src);
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("finds manifests in nested directories in sorted order", () => {
    const b = writePackage("stack/b_pkg", manifest("b_pkg"));
    const a = writePackage("a_pkg", manifest("a_pkg"));
    const c = writePackage("stack/c_pkg", manifest("c_pkg"));

    expect(findManifests(src)).toEqual([a, b, c]);
  });

  it("skips directories containing COLCON_IGNORE", () => {
    const kept = writePackage("kept", manifest("kept"));
    writePackage("vendor/ignored", manifest("ignored"));
    fs.writeFileSync(path.join(src, "vendor", "COLCON_IGNORE"), "");

    expect(findManifests(src)).toEqual([kept]);
  });

  it("finds a package.xml that is a symlink to a manifest", () => {
    const real = path.join(root, "shared", "a.xml");
    fs.mkdirSync(path.dirname(real), { recursive: true });
    fs.writeFileSync(real, manifest("linked"));
    fs.mkdirSync(path.join(src, "linked"));
    const link = path.join(src, "linked", "package.xml");
    fs.symlinkSync(real, link);

    expect(findManifests(src)).toEqual([link]);
    expect([...scanWorkspace(root).packages.keys()]).toEqual(["linked"]);
  });

  it("reports a dangling package.xml symlink as a failure", () => {
    fs.mkdirSync(path.join(src, "dangling"));
    const link = path.join(src, "dangling", "package.xml");
    fs.symlinkSync(path.join(root, "nowhere.xml"), link);

    const scan = scanWorkspace(root);

    expect(scan.packages.size).toBe(0);
    expect(scan.failures).toHaveLength(1);
    expect(scan.failures[0].manifestPath).toBe(link);
  });

  it("builds the package map from every manifest", () => {
    writePackage("app", manifest("app", ["core", "rclcpp"]));
    writePackage("core", manifest("core"));

    const scan = scanWorkspace(root);

    expect([...scan.packages.keys()]).toEqual(["app", "core"]);
    expect([...(scan.packages.get("app")?.dependencies ?? [])]).toEqual(["core", "rclcpp"]);
    expect(scan.failures).toEqual([]);
    expect(scan.duplicates).toEqual([]);
    expect(scan.srcDir).toBe(src);
  });

  it("leaves out malformed manifests and keeps scanning", () => {
    const broken = writePackage("broken", "<package><name>broken</name>");
    writePackage("nameless", "<package><version>1.0</version></package>");
    writePackage("ok", manifest("ok"));

    const scan = scanWorkspace(root);

    expect([...scan.packages.keys()]).toEqual(["ok"]);
    expect(scan.failures).toHaveLength(2);
    expect(scan.failures[0].manifestPath).toBe(broken);
  });

  it("keeps the first manifest for a duplicated name and reports the rest", () => {
    const first = writePackage("a/dup", manifest("dup"));
    const second = writePackage("b/dup", manifest("dup", ["other"]));

    const scan = scanWorkspace(root);

    expect(scan.packages.get("dup")?.manifestPath).toBe(first);
    expect(scan.duplicates).toEqual([{ name: "dup", manifestPath: second, keptPath: first }]);
  });

  it("returns an empty scan for an empty src directory", () => {
    const scan = scanWorkspace(root);

    expect(scan.packages.size).toBe(0);
  });

  it("throws when src is missing", () => {
    fs.rmSync(src, { recursive: true });

    expect(() => scanWorkspace(root)).toThrow(`src directory not found: ${src}`);
  });
});

describe("filterPackages", () => {
  const ids = ["nav_core", "Nav2_bringup", "perception", "teleop"];

  it("matches substrings case-insensitively", () => {
    expect(filterPackages(ids, "NAV")).toEqual(["nav_core", "Nav2_bringup"]);
  });

  it("keeps everything for an empty or blank query", () => {
    expect(filterPackages(ids, "")).toEqual(ids);
    expect(filterPackages(ids, "   ")).toEqual(ids);
  });

  it("returns nothing when no name matches", () => {
    expect(filterPackages(ids, "lidar")).toEqual([]);
  });
});
