import type { PackageId, PackageManifest, DependencyEdge, DependencyGraph, GraphView } from "./types.js";
import {
  createEmptyGraph,
  addPackage,
  addEdge,
  compareIds,
  compareEdges,
  dependenciesOf,
  dependentsOf,
  packageIds,
} from "./types.js";

/**
 * Build forward/reverse adjacency from raw dependency sets.
 * Dependencies naming packages outside `packages` are dropped, as are self-dependencies.
 */
export function buildGraph(packages: ReadonlyMap<PackageId, Iterable<PackageId>>): DependencyGraph {
  const graph = createEmptyGraph();
  for (const id of packages.keys()) addPackage(graph, id);

  for (const [id, deps] of packages) {
    for (const dep of deps) {
      if (dep === id) continue;
      if (!packages.has(dep)) continue;
      addEdge(graph, { from: id, to: dep });
    }
  }
  return graph;
}

export function buildGraphFromManifests(manifests: Iterable<PackageManifest>): DependencyGraph {
  const deps = new Map<PackageId, Iterable<PackageId>>();
  for (const manifest of manifests) deps.set(manifest.name, manifest.dependencies);
  return buildGraph(deps);
}

function reachable(
  seeds: Iterable<PackageId>,
  next: (id: PackageId) => ReadonlySet<PackageId>,
): Set<PackageId> {
  const visited = new Set<PackageId>();
  const stack: PackageId[] = [...seeds];

  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined || visited.has(current)) continue;
    visited.add(current);
    for (const n of next(current)) {
      if (!visited.has(n)) stack.push(n);
    }
  }
  return visited;
}

/**
 * Packages reachable from the seeds over forward edges, seeds included.
 */
export function closure(graph: DependencyGraph, seeds: Iterable<PackageId>): Set<PackageId> {
  return reachable(seeds, (id) => dependenciesOf(graph, id));
}

/**
 * Packages that directly or transitively depend on the seeds, seeds included.
 */
export function dependentsClosure(graph: DependencyGraph, seeds: Iterable<PackageId>): Set<PackageId> {
  return reachable(seeds, (id) => dependentsOf(graph, id));
}

/** Forward edges with both endpoints in `nodes`, sorted by (from, to). */
export function inducedEdges(graph: DependencyGraph, nodes: Iterable<PackageId>): DependencyEdge[] {
  const keep = new Set(nodes);
  const edges: DependencyEdge[] = [];
  for (const from of keep) {
    for (const to of dependenciesOf(graph, from)) {
      if (keep.has(to)) edges.push({ from, to });
    }
  }
  return edges.sort(compareEdges);
}

/**
 * Kahn-style layering: peel the zero in-degree frontier repeatedly.
 * Nodes never peeled (cycle members and whatever hangs below them) form one final layer.
 * Each layer is sorted so the result only depends on the node/edge sets.
 */
export function layerNodes(
  nodeIds: Iterable<PackageId>,
  edges: Iterable<{ from: PackageId; to: PackageId }>,
): PackageId[][] {
  const nodes = new Set(nodeIds);
  const inDegree = new Map<PackageId, number>();
  const successors = new Map<PackageId, Set<PackageId>>();
  for (const id of nodes) {
    inDegree.set(id, 0);
    successors.set(id, new Set());
  }
  for (const e of edges) {
    if (!nodes.has(e.from) || !nodes.has(e.to)) continue;
    const succ = successors.get(e.from);
    if (!succ || succ.has(e.to)) continue;
    succ.add(e.to);
    inDegree.set(e.to, (inDegree.get(e.to) ?? 0) + 1);
  }

  const layers: PackageId[][] = [];
  const peeled = new Set<PackageId>();
  let frontier = [...nodes].filter((id) => inDegree.get(id) === 0);

  while (frontier.length > 0) {
    frontier.sort(compareIds);
    layers.push(frontier);
    const next: PackageId[] = [];
    for (const u of frontier) {
      peeled.add(u);
      for (const v of successors.get(u) ?? []) {
        const d = (inDegree.get(v) ?? 0) - 1;
        inDegree.set(v, d);
        if (d === 0) next.push(v);
      }
    }
    frontier = next;
  }

  const remaining = [...nodes].filter((id) => !peeled.has(id));
  if (remaining.length > 0) layers.push(remaining.sort(compareIds));

  return layers;
}

export function topologicalLayers(graph: DependencyGraph, nodes: Iterable<PackageId>): PackageId[][] {
  const nodeSet = new Set(nodes);
  return layerNodes(nodeSet, inducedEdges(graph, nodeSet));
}

/**
 * The subgraph shown in the dependency view: the closure of the selection,
 * or the whole workspace when nothing is selected.
 */
export function graphView(graph: DependencyGraph, selected: Iterable<PackageId>): GraphView {
  const seeds = [...selected];
  const nodes = seeds.length > 0 ? [...closure(graph, seeds)].sort(compareIds) : packageIds(graph);
  return { nodes, edges: inducedEdges(graph, nodes) };
}
