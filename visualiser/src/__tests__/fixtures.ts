import type { GraphNode, GraphEdge, GraphData, LayoutNode } from '../types.js';

export function makeGraphNode(
  overrides: Partial<GraphNode> & { id: string }
): GraphNode {
  return {
    label: overrides.id,
    isSelected: false,
    ...overrides,
  };
}

export function makeGraphEdge(from: string, to: string): GraphEdge {
  return { from, to };
}

export function makeLayoutNode(
  overrides: Partial<LayoutNode> & { id: string }
): LayoutNode {
  return {
    x: 0,
    y: 0,
    width: 140,
    height: 36,
    layer: 0,
    order: 0,
    original: makeGraphNode({ id: overrides.id }),
    ...overrides,
  };
}

/**
 * Build a GraphData from shorthand edges like 'app->core'.
 * An entry without an arrow adds an isolated node.
 */
export function buildGraphData(
  entries: string[],
  selected: string[] = []
): GraphData {
  const ids = new Set<string>();
  const edges: GraphEdge[] = [];

  for (const entry of entries) {
    const [from, to] = entry.split('->');
    ids.add(from);
    if (to !== undefined) {
      ids.add(to);
      edges.push(makeGraphEdge(from, to));
    }
  }

  const nodes = [...ids].map((id) =>
    makeGraphNode({ id, isSelected: selected.includes(id) })
  );
  return { nodes, edges };
}
