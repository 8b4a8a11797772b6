import type { GraphData, GraphEdge, LayoutEdge, LayoutNode, LayoutResult, Point } from "./types.js";
import { layerNodes } from "../../src/graph.js";
import {
  NODE_HEIGHT,
  NODE_WIDTH,
  arrowHead,
  positionLayers,
  sourceAnchor,
  targetAnchor,
} from "./layout-utils.js";

/**
 * Position every node: one column per topological layer, one row per node
 * within a layer in lexicographic order. Same input, same output.
 */
export function layoutPositions(
  nodes: Iterable<string>,
  edges: Iterable<GraphEdge>,
): Map<string, Point> {
  return positionLayers(layerNodes(nodes, edges));
}

export function layoutGraph(data: GraphData): LayoutResult {
  const byId = new Map(data.nodes.map((n) => [n.id, n]));
  const layers = layerNodes(byId.keys(), data.edges);

  const nodes: LayoutNode[] = [];
  const positions = positionLayers(layers);
  layers.forEach((layer, layerIndex) => {
    layer.forEach((id, order) => {
      const original = byId.get(id);
      const pos = positions.get(id);
      if (!original || !pos) return;
      nodes.push({
        id,
        x: pos.x,
        y: pos.y,
        width: NODE_WIDTH,
        height: NODE_HEIGHT,
        layer: layerIndex,
        order,
        original,
      });
    });
  });

  const edges: LayoutEdge[] = [];
  for (const e of data.edges) {
    const fromPos = positions.get(e.from);
    const toPos = positions.get(e.to);
    // Edges to nodes outside the payload are not drawn
    if (!fromPos || !toPos) continue;
    const start = sourceAnchor(fromPos);
    const end = targetAnchor(toPos);
    edges.push({ from: e.from, to: e.to, start, end, arrow: arrowHead(start, end) });
  }

  return { nodes, edges, layers };
}
