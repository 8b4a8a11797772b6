import { describe, it, expect } from "vitest";
import { buildColconCommand, formatCommand, openCommand } from "../colconCommand.js";

const base = { symlinkInstall: true, parallelWorkers: 4, buildType: "auto" as const };

describe("buildColconCommand", () => {
  it("builds the default command", () => {
    expect(buildColconCommand(base, ["core", "msgs"])).toEqual([
      "colcon",
      "build",
      "--symlink-install",
      "--parallel-workers",
      "4",
      "--packages-select",
      "core",
      "msgs",
    ]);
  });

  it("adds the CMake build type unless it is auto", () => {
    const argv = buildColconCommand({ ...base, symlinkInstall: false, buildType: "Release" }, ["a"]);

    expect(argv).toEqual([
      "colcon",
      "build",
      "--parallel-workers",
      "4",
      "--cmake-args",
      "-DCMAKE_BUILD_TYPE=Release",
      "--packages-select",
      "a",
    ]);
  });

  it("refuses an empty selection", () => {
    expect(() => buildColconCommand(base, [])).toThrow("Select at least one package to build");
  });
});

describe("formatCommand", () => {
  it("leaves plain arguments unquoted", () => {
    expect(formatCommand(["colcon", "build", "--cmake-args", "-DCMAKE_BUILD_TYPE=Debug"])).toBe(
      "colcon build --cmake-args -DCMAKE_BUILD_TYPE=Debug",
    );
  });

  it("single-quotes arguments with shell metacharacters", () => {
    expect(formatCommand(["echo", "a b", "it's"])).toBe(`echo 'a b' 'it'\\''s'`);
  });
});

describe("openCommand", () => {
  it("passes an empty window title to start on Windows", () => {
    expect(openCommand("C:\\tmp\\graph.html", "win32")).toBe('start "" "C:\\\\tmp\\\\graph.html"');
  });

  it("uses open on macOS and xdg-open elsewhere", () => {
    expect(openCommand("/tmp/graph.html", "darwin")).toBe('open "/tmp/graph.html"');
    expect(openCommand("/tmp/graph.html", "linux")).toBe('xdg-open "/tmp/graph.html"');
  });
});
