import { describe, it, expect } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { ParseError, parseManifest, readManifest } from "../manifest.js";

const MANIFEST = `<?xml version="1.0"?>
<package format="3">
  <name>foo</name>
  <version>1.0</version>
  <description>Foo driver</description>
  <maintainer email="dev@example.com">Dev One</maintainer>
  <maintainer email="ops@example.com">Dev Two</maintainer>
  <license>Apache-2.0</license>

  <buildtool_depend>ament_cmake</buildtool_depend>
  <depend>bar</depend>
  <build_depend>baz</build_depend>
  <exec_depend>qux</exec_depend>
  <test_depend>bar</test_depend>
  <test_depend>ament_lint_auto</test_depend>

  <export>
    <build_type>ament_cmake</build_type>
  </export>
</package>
`;

describe("parseManifest", () => {
  it("reads name and metadata", () => {
    const m = parseManifest(MANIFEST, "/ws/src/foo/package.xml");

    expect(m.name).toBe("foo");
    expect(m.version).toBe("1.0");
    expect(m.description).toBe("Foo driver");
    expect(m.maintainers).toEqual(["Dev One", "Dev Two"]);
    expect(m.licenses).toEqual(["Apache-2.0"]);
    expect(m.packageDir).toBe("/ws/src/foo");
    expect(m.manifestPath).toBe("/ws/src/foo/package.xml");
  });

  it("collapses a dependency listed under several kinds into one entry", () => {
    const m = parseManifest(MANIFEST, "package.xml");

    expect([...m.dependencies].sort()).toEqual(["ament_lint_auto", "bar", "baz", "qux"]);
  });

  it("keeps the per-kind lists in document order", () => {
    const m = parseManifest(MANIFEST, "package.xml");

    expect(m.dependenciesByKind).toEqual({
      depend: ["bar"],
      build_depend: ["baz"],
      build_export_depend: [],
      exec_depend: ["qux"],
      test_depend: ["bar", "ament_lint_auto"],
    });
  });

  it("ignores tags that are not dependency kinds", () => {
    const m = parseManifest(MANIFEST, "package.xml");

    expect(m.dependencies.has("ament_cmake")).toBe(false);
  });

  it("reads dependencies that carry attributes", () => {
    const xml = `<package format="3">
  <name>cond</name>
  <depend condition="$ROS_VERSION == 2">rclcpp</depend>
  <exec_depend version_gte="1.2">launch</exec_depend>
</package>`;
    const m = parseManifest(xml, "package.xml");

    expect([...m.dependencies].sort()).toEqual(["launch", "rclcpp"]);
  });

  it("accepts a manifest without dependencies", () => {
    const m = parseManifest("<package><name>lonely</name></package>", "package.xml");

    expect(m.dependencies.size).toBe(0);
    expect(m.version).toBeUndefined();
    expect(m.maintainers).toEqual([]);
  });

  it("keeps numeric-looking names as strings", () => {
    const m = parseManifest("<package><name>123</name><depend>456</depend></package>", "p.xml");

    expect(m.name).toBe("123");
    expect([...m.dependencies]).toEqual(["456"]);
  });

  it("throws ParseError for malformed XML", () => {
    expect(() => parseManifest("<package><name>foo</name>", "bad/package.xml")).toThrow(ParseError);
  });

  it("throws ParseError when the root is not <package>", () => {
    expect(() => parseManifest("<manifest><name>foo</name></manifest>", "x.xml")).toThrow(
      "x.xml: root element <package> not found",
    );
  });

  it("throws ParseError when <name> is missing or empty", () => {
    expect(() => parseManifest("<package><version>1</version></package>", "x.xml")).toThrow(
      "x.xml: missing <name>",
    );
    expect(() => parseManifest("<package><name>  </name></package>", "x.xml")).toThrow(
      "x.xml: missing <name>",
    );
  });
});

describe("readManifest", () => {
  it("wraps read errors in ParseError", () => {
    const missing = path.join(os.tmpdir(), "colcon-workbench-missing", "package.xml");

    expect(() => readManifest(missing)).toThrow(ParseError);
  });

  it("parses a manifest from disk", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "colcon-workbench-manifest-"));
    const file = path.join(dir, "package.xml");
    fs.writeFileSync(file, MANIFEST);
    try {
      expect(readManifest(file).name).toBe("foo");
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
