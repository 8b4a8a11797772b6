import type { LayoutNode, LayoutResult, Point } from "./types.js";
import type { HighlightTag } from "./highlight.js";

// ── Colors ─────────────────────────────────────────────────────────────────

export const COLORS = {
  nodeFill: "var(--node-fill)",
  nodeBorder: "var(--node-border)",
  text: "var(--node-text)",
  selected: "var(--node-selected)",
  focused: "var(--node-focused)",
  incoming: "var(--node-incoming)",
  outgoing: "var(--node-outgoing)",
  highlightText: "var(--node-highlight-text)",
  edge: "var(--edge)",
  edgeIncoming: "var(--edge-incoming)",
  edgeOutgoing: "var(--edge-outgoing)",
} as const;

export const TRANSITION_MS = 150;

export interface NodeStyle {
  fill: string;
  stroke: string;
  textFill: string;
  strokeWidth: number;
}

/** Highlight wins over selection; focus wins over everything. */
export function nodeColor(tag: HighlightTag, isSelected: boolean): NodeStyle {
  switch (tag) {
    case "focused":
      return { fill: COLORS.focused, stroke: COLORS.focused, textFill: COLORS.highlightText, strokeWidth: 3 };
    case "incoming":
      return { fill: COLORS.incoming, stroke: COLORS.incoming, textFill: COLORS.highlightText, strokeWidth: 2 };
    case "outgoing":
      return { fill: COLORS.outgoing, stroke: COLORS.outgoing, textFill: COLORS.highlightText, strokeWidth: 2 };
    case "none":
      if (isSelected) {
        return { fill: COLORS.selected, stroke: COLORS.selected, textFill: "#ffffff", strokeWidth: 1 };
      }
      return { fill: COLORS.nodeFill, stroke: COLORS.nodeBorder, textFill: COLORS.text, strokeWidth: 1 };
  }
}

export function edgeStyle(tag: HighlightTag): { stroke: string; strokeWidth: number } {
  switch (tag) {
    case "incoming":
      return { stroke: COLORS.edgeIncoming, strokeWidth: 2 };
    case "outgoing":
      return { stroke: COLORS.edgeOutgoing, strokeWidth: 2 };
    default:
      return { stroke: COLORS.edge, strokeWidth: 1 };
  }
}

/** SVG `points` attribute value */
export function arrowPoints(points: Point[]): string {
  return points.map((p) => `${p.x},${p.y}`).join(" ");
}

// ── Bounds Computation ─────────────────────────────────────────────────────

export function computeBounds(layout: LayoutResult): {
  x: number;
  y: number;
  w: number;
  h: number;
} {
  let minX = Infinity,
    minY = Infinity,
    maxX = -Infinity,
    maxY = -Infinity;
  for (const n of layout.nodes) {
    minX = Math.min(minX, n.x);
    minY = Math.min(minY, n.y);
    maxX = Math.max(maxX, n.x + n.width);
    maxY = Math.max(maxY, n.y + n.height);
  }

  const padding = 40;
  return {
    x: (isFinite(minX) ? minX : 0) - padding,
    y: (isFinite(minY) ? minY : 0) - padding,
    w: (isFinite(maxX) ? maxX - minX : 800) + padding * 2,
    h: (isFinite(maxY) ? maxY - minY : 600) + padding * 2,
  };
}

// ── Node label ─────────────────────────────────────────────────────────────

const MAX_LABEL_CHARS = 20;

/** Package names longer than the box are cut with an ellipsis; the full name goes in the title. */
export function nodeLabel(node: LayoutNode): string {
  const label = node.original.label || node.id;
  if (label.length <= MAX_LABEL_CHARS) return label;
  return `${label.slice(0, MAX_LABEL_CHARS - 1)}…`;
}
