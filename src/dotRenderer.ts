import type { GraphView, PackageId } from "./types.js";
import { layerNodes } from "./graph.js";
import type { Theme } from "./settings.js";

export interface RenderOptions {
  /** Packages checked in the package list */
  selected: ReadonlySet<PackageId>;
  theme?: Theme;
}

export interface PayloadNode {
  id: PackageId;
  label: string;
  isSelected: boolean;
}

export interface PayloadEdge {
  from: PackageId;
  to: PackageId;
}

/** What the visualiser reads from window.GRAPH_DATA */
export interface GraphPayload {
  nodes: PayloadNode[];
  edges: PayloadEdge[];
  theme: Theme;
}

function escapeLabel(s: string): string {
  return s.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");
}

function nodeIdToDot(id: PackageId): string {
  return `"${escapeLabel(id)}"`;
}

export function renderDot(view: GraphView, options: RenderOptions): string {
  const lines: string[] = [];
  lines.push("digraph dependencies {");
  lines.push("  rankdir=LR;");
  lines.push(
    '  node [shape=box fontname="Helvetica" fontsize=10 color="#3b4252" fontcolor="#e6e6e6"];',
  );
  lines.push('  edge [color="#88c0d0"];');
  lines.push("");

  for (const id of view.nodes) {
    let attrs = `label="${escapeLabel(id)}"`;
    if (options.selected.has(id)) {
      attrs += ' style="filled" fillcolor="#5e81ac" fontcolor="white"';
    }
    lines.push(`  ${nodeIdToDot(id)} [${attrs}];`);
  }
  lines.push("");

  // One rank per topological layer keeps dot's columns aligned with the visualiser's
  for (const layer of layerNodes(view.nodes, view.edges)) {
    lines.push(`  { rank=same; ${layer.map((id) => `${nodeIdToDot(id)};`).join(" ")} }`);
  }
  lines.push("");

  for (const edge of view.edges) {
    lines.push(`  ${nodeIdToDot(edge.from)} -> ${nodeIdToDot(edge.to)};`);
  }

  lines.push("}");
  return lines.join("\n");
}

/**
 * Render the view as the visualiser's JSON payload.
 */
export function renderJson(view: GraphView, options: RenderOptions): GraphPayload {
  return {
    nodes: view.nodes.map((id) => ({
      id,
      label: id,
      isSelected: options.selected.has(id),
    })),
    edges: view.edges.map((e) => ({ from: e.from, to: e.to })),
    theme: options.theme ?? "dark",
  };
}
