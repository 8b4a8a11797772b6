/**
 * PackageId is the package name declared in its package.xml.
 * Unique within a workspace.
 */
export type PackageId = string;

export type DependencyKind =
  | "depend"
  | "build_depend"
  | "build_export_depend"
  | "exec_depend"
  | "test_depend";

export interface PackageManifest {
  name: PackageId;
  manifestPath: string;
  /** Directory containing package.xml */
  packageDir: string;
  version?: string;
  description?: string;
  maintainers: string[];
  licenses: string[];
  /** Raw identifiers per kind, in document order (may name packages outside the workspace) */
  dependenciesByKind: Record<DependencyKind, PackageId[]>;
  /** Union of every kind, duplicates collapsed */
  dependencies: Set<PackageId>;
}

export interface DependencyEdge {
  /** The dependent package */
  from: PackageId;
  /** The package it depends on */
  to: PackageId;
}

/**
 * forward[A] holds the workspace packages A depends on; reverse is its transpose.
 * Both maps always share the same key set.
 */
export interface DependencyGraph {
  forward: Map<PackageId, Set<PackageId>>;
  reverse: Map<PackageId, Set<PackageId>>;
}

/** Node and edge subset handed to the renderers */
export interface GraphView {
  nodes: PackageId[];
  edges: DependencyEdge[];
}

const EMPTY: ReadonlySet<PackageId> = new Set();

export function createEmptyGraph(): DependencyGraph {
  return {
    forward: new Map(),
    reverse: new Map(),
  };
}

export function addPackage(graph: DependencyGraph, id: PackageId): void {
  if (!graph.forward.has(id)) graph.forward.set(id, new Set());
  if (!graph.reverse.has(id)) graph.reverse.set(id, new Set());
}

export function addEdge(graph: DependencyGraph, edge: DependencyEdge): void {
  addPackage(graph, edge.from);
  addPackage(graph, edge.to);
  graph.forward.get(edge.from)?.add(edge.to);
  graph.reverse.get(edge.to)?.add(edge.from);
}

export function hasPackage(graph: DependencyGraph, id: PackageId): boolean {
  return graph.forward.has(id);
}

export function dependenciesOf(graph: DependencyGraph, id: PackageId): ReadonlySet<PackageId> {
  return graph.forward.get(id) ?? EMPTY;
}

export function dependentsOf(graph: DependencyGraph, id: PackageId): ReadonlySet<PackageId> {
  return graph.reverse.get(id) ?? EMPTY;
}

/** Lexicographic (code unit) order, used wherever output must be deterministic */
export function compareIds(a: PackageId, b: PackageId): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function compareEdges(a: DependencyEdge, b: DependencyEdge): number {
  return compareIds(a.from, b.from) || compareIds(a.to, b.to);
}

export function packageIds(graph: DependencyGraph): PackageId[] {
  return [...graph.forward.keys()].sort(compareIds);
}

/** Every forward edge, sorted by (from, to) */
export function edgeList(graph: DependencyGraph): DependencyEdge[] {
  const edges: DependencyEdge[] = [];
  for (const [from, deps] of graph.forward) {
    for (const to of deps) edges.push({ from, to });
  }
  return edges.sort(compareEdges);
}
