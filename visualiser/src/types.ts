// Input format (matches renderJson() output from dotRenderer.ts)
export interface GraphNode {
  id: string;
  label: string;
  /** Checked in the package list when the graph was rendered */
  isSelected: boolean;
}

export interface GraphEdge {
  /** The dependent package */
  from: string;
  /** The package it depends on */
  to: string;
}

export interface GraphData {
  nodes: GraphNode[];
  edges: GraphEdge[];
  theme?: "light" | "dark";
}

export interface Point {
  x: number;
  y: number;
}

// Layout output
export interface LayoutNode {
  id: string;
  x: number;
  y: number;
  width: number;
  height: number;
  layer: number;
  /** Index within the layer */
  order: number;
  original: GraphNode;
}

export interface LayoutEdge {
  from: string;
  to: string;
  /** Right-middle anchor of the source */
  start: Point;
  /** Left-middle anchor of the destination */
  end: Point;
  /** Triangle at `end`, or null for a zero-length segment */
  arrow: Point[] | null;
}

export interface LayoutResult {
  nodes: LayoutNode[];
  edges: LayoutEdge[];
  layers: string[][];
}
