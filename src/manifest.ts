import * as fs from "fs";
import * as path from "path";
import { XMLParser, XMLValidator } from "fast-xml-parser";
import type { DependencyKind, PackageId, PackageManifest } from "./types.js";

export const MANIFEST_FILE = "package.xml";

export const DEPENDENCY_KINDS: readonly DependencyKind[] = [
  "depend",
  "build_depend",
  "build_export_depend",
  "exec_depend",
  "test_depend",
];

const REPEATED_TAGS = new Set<string>([...DEPENDENCY_KINDS, "maintainer", "license"]);

export class ParseError extends Error {
  constructor(
    readonly manifestPath: string,
    message: string,
  ) {
    super(`${manifestPath}: ${message}`);
    this.name = "ParseError";
  }
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  ignoreDeclaration: true,
  ignorePiTags: true,
  // "1.0" must stay a string, and so must a package called "123"
  parseTagValue: false,
  trimValues: true,
  isArray: (tagName, jPath) => jPath === `package.${tagName}` && REPEATED_TAGS.has(tagName),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Text content of an element, whether or not it carries attributes. */
function textOf(value: unknown): string | undefined {
  if (Array.isArray(value)) return textOf(value[0]);
  if (typeof value === "string") return value.trim() || undefined;
  if (isRecord(value)) return textOf(value["#text"]);
  return undefined;
}

function textsOf(value: unknown): string[] {
  const items = Array.isArray(value) ? value : value === undefined ? [] : [value];
  const out: string[] = [];
  for (const item of items) {
    const text = textOf(item);
    if (text) out.push(text);
  }
  return out;
}

/**
 * Parse a package.xml document.
 * Throws ParseError when the document is malformed or declares no name.
 */
export function parseManifest(xml: string, manifestPath: string): PackageManifest {
  const valid = XMLValidator.validate(xml);
  if (valid !== true) {
    throw new ParseError(
      manifestPath,
      `${valid.err.msg} (line ${valid.err.line}, column ${valid.err.col})`,
    );
  }

  const doc: unknown = parser.parse(xml);
  const root = isRecord(doc) ? doc["package"] : undefined;
  if (root === undefined) {
    throw new ParseError(manifestPath, "root element <package> not found");
  }
  const pkg = isRecord(root) ? root : {};

  const name = textOf(pkg["name"]);
  if (!name) {
    throw new ParseError(manifestPath, "missing <name>");
  }

  const dependenciesByKind: Record<DependencyKind, PackageId[]> = {
    depend: textsOf(pkg["depend"]),
    build_depend: textsOf(pkg["build_depend"]),
    build_export_depend: textsOf(pkg["build_export_depend"]),
    exec_depend: textsOf(pkg["exec_depend"]),
    test_depend: textsOf(pkg["test_depend"]),
  };
  const dependencies = new Set<PackageId>();
  for (const kind of DEPENDENCY_KINDS) {
    for (const id of dependenciesByKind[kind]) dependencies.add(id);
  }

  return {
    name,
    manifestPath,
    packageDir: path.dirname(manifestPath),
    version: textOf(pkg["version"]),
    description: textOf(pkg["description"]),
    maintainers: textsOf(pkg["maintainer"]),
    licenses: textsOf(pkg["license"]),
    dependenciesByKind,
    dependencies,
  };
}

export function readManifest(manifestPath: string): PackageManifest {
  let xml: string;
  try {
    xml = fs.readFileSync(manifestPath, "utf-8");
  } catch (err) {
    throw new ParseError(manifestPath, err instanceof Error ? err.message : String(err));
  }
  return parseManifest(xml, manifestPath);
}
