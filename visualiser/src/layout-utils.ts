import type { Point } from "./types.js";

// ── Constants ──────────────────────────────────────────────────────────────

export const LAYER_SPACING = 240;
export const ROW_SPACING = 80;
export const NODE_WIDTH = 140;
export const NODE_HEIGHT = 36;
export const ARROW_SIZE = 8;

/** Below this length an edge has no usable direction */
const MIN_EDGE_LENGTH = 1e-9;

// ── Positions ──────────────────────────────────────────────────────────────

/**
 * Layer i sits at x = i * LAYER_SPACING; the j-th node of a layer at y = j * ROW_SPACING.
 * Layers are expected to be sorted already (layerNodes does that).
 */
export function positionLayers(layers: string[][]): Map<string, Point> {
  const positions = new Map<string, Point>();
  layers.forEach((layer, i) => {
    layer.forEach((id, j) => {
      positions.set(id, { x: i * LAYER_SPACING, y: j * ROW_SPACING });
    });
  });
  return positions;
}

// ── Anchors ────────────────────────────────────────────────────────────────

export function sourceAnchor(pos: Point): Point {
  return { x: pos.x + NODE_WIDTH, y: pos.y + NODE_HEIGHT / 2 };
}

export function targetAnchor(pos: Point): Point {
  return { x: pos.x, y: pos.y + NODE_HEIGHT / 2 };
}

// ── Arrowheads ─────────────────────────────────────────────────────────────

/**
 * Triangle with its tip at `end`, pointing along start → end.
 * Returns null when the two points coincide.
 */
export function arrowHead(start: Point, end: Point, size = ARROW_SIZE): Point[] | null {
  const dx = end.x - start.x;
  const dy = end.y - start.y;
  const length = Math.hypot(dx, dy);
  if (length < MIN_EDGE_LENGTH) return null;

  const ux = dx / length;
  const uy = dy / length;
  return [
    { x: end.x, y: end.y },
    { x: end.x - ux * size - (uy * size) / 2, y: end.y - uy * size + (ux * size) / 2 },
    { x: end.x - ux * size + (uy * size) / 2, y: end.y - uy * size - (ux * size) / 2 },
  ];
}
