import type { LayoutEdge, LayoutNode, LayoutResult } from "./types.js";
import { FocusTracker, classify, classifyEdge } from "./highlight.js";
import {
  TRANSITION_MS,
  arrowPoints,
  computeBounds,
  edgeStyle,
  nodeColor,
  nodeLabel,
} from "./render-utils.js";

const SVG_NS = "http://www.w3.org/2000/svg";
const ZOOM_FACTOR = 1.15;

// ── SVG Helpers ────────────────────────────────────────────────────────────

export function svgEl<K extends keyof SVGElementTagNameMap>(
  tag: K,
  attrs: Record<string, string | number> = {},
): SVGElementTagNameMap[K] {
  const el = document.createElementNS(SVG_NS, tag);
  for (const [k, v] of Object.entries(attrs)) {
    el.setAttribute(k, String(v));
  }
  return el;
}

export function edgeKey(edge: { from: string; to: string }): string {
  return `${edge.from}->${edge.to}`;
}

// ── Elements ───────────────────────────────────────────────────────────────

export function createNodeEl(node: LayoutNode): SVGGElement {
  const style = nodeColor("none", node.original.isSelected);
  const g = svgEl("g", {
    class: "node-group",
    "data-id": node.id,
    transform: `translate(${node.x}, ${node.y})`,
  });
  g.style.cursor = "pointer";

  const title = svgEl("title");
  title.textContent = node.id;
  g.appendChild(title);

  g.appendChild(
    svgEl("rect", {
      width: node.width,
      height: node.height,
      rx: 4,
      fill: style.fill,
      stroke: style.stroke,
      "stroke-width": style.strokeWidth,
    }),
  );

  const text = svgEl("text", {
    x: node.width / 2,
    y: node.height / 2 + 4,
    "text-anchor": "middle",
    "font-size": 11,
    fill: style.textFill,
  });
  text.textContent = nodeLabel(node);
  g.appendChild(text);

  return g;
}

export function createEdgeEl(edge: LayoutEdge): SVGGElement {
  const style = edgeStyle("none");
  const g = svgEl("g", { class: "edge-group", "data-from": edge.from, "data-to": edge.to });

  g.appendChild(
    svgEl("line", {
      x1: edge.start.x,
      y1: edge.start.y,
      x2: edge.end.x,
      y2: edge.end.y,
      stroke: style.stroke,
      "stroke-width": style.strokeWidth,
    }),
  );

  if (edge.arrow) {
    g.appendChild(svgEl("polygon", { points: arrowPoints(edge.arrow), fill: style.stroke }));
  }
  return g;
}

// ── Highlighting ───────────────────────────────────────────────────────────

export function applyHighlight(
  layout: LayoutResult,
  focused: string | null,
  nodeEls: Map<string, SVGGElement>,
  edgeEls: Map<string, SVGGElement>,
): void {
  const tags = classify(
    focused,
    layout.nodes.map((n) => n.id),
    layout.edges,
  );

  for (const node of layout.nodes) {
    const el = nodeEls.get(node.id);
    if (!el) continue;
    const tag = tags.get(node.id) ?? "none";
    const style = nodeColor(tag, node.original.isSelected);
    el.setAttribute("data-highlight", tag);
    const rect = el.querySelector("rect");
    rect?.setAttribute("fill", style.fill);
    rect?.setAttribute("stroke", style.stroke);
    rect?.setAttribute("stroke-width", String(style.strokeWidth));
    el.querySelector("text")?.setAttribute("fill", style.textFill);
  }

  for (const edge of layout.edges) {
    const el = edgeEls.get(edgeKey(edge));
    if (!el) continue;
    const tag = classifyEdge(edge, focused);
    const style = edgeStyle(tag);
    el.setAttribute("data-highlight", tag);
    const line = el.querySelector("line");
    line?.setAttribute("stroke", style.stroke);
    line?.setAttribute("stroke-width", String(style.strokeWidth));
    el.querySelector("polygon")?.setAttribute("fill", style.stroke);
    // Highlighted edges are drawn over the rest
    if (tag !== "none") el.parentNode?.appendChild(el);
  }
}

// ── Pan & Zoom ─────────────────────────────────────────────────────────────

interface ViewBox {
  x: number;
  y: number;
  w: number;
  h: number;
}

function setupPanZoom(svg: SVGSVGElement, bounds: ViewBox): { fitAll: () => void } {
  let isPanning = false;
  let panStart = { x: 0, y: 0 };

  function getViewBox(): ViewBox {
    const vb = svg.getAttribute("viewBox")?.split(" ").map(Number) ?? [0, 0, 800, 600];
    return { x: vb[0], y: vb[1], w: vb[2], h: vb[3] };
  }

  function setViewBox(vb: ViewBox): void {
    svg.setAttribute("viewBox", `${vb.x} ${vb.y} ${vb.w} ${vb.h}`);
  }

  /** Screen pixel → SVG user units, assuming the default xMidYMid meet fit. */
  function screenToSvg(screenX: number, screenY: number): { x: number; y: number } {
    const vb = getViewBox();
    const rect = svg.getBoundingClientRect();
    if (rect.width === 0 || rect.height === 0) return { x: vb.x, y: vb.y };
    const scale = Math.min(rect.width / vb.w, rect.height / vb.h);
    const offsetX = (rect.width - vb.w * scale) / 2;
    const offsetY = (rect.height - vb.h * scale) / 2;
    return {
      x: (screenX - rect.left - offsetX) / scale + vb.x,
      y: (screenY - rect.top - offsetY) / scale + vb.y,
    };
  }

  svg.addEventListener("mousedown", (e: MouseEvent) => {
    // Only pan on background
    const target = e.target;
    if (target === svg || (target instanceof Element && target.classList.contains("bg"))) {
      isPanning = true;
      panStart = { x: e.clientX, y: e.clientY };
      svg.style.cursor = "grabbing";
    }
  });

  window.addEventListener("mousemove", (e: MouseEvent) => {
    if (!isPanning) return;
    const prev = screenToSvg(panStart.x, panStart.y);
    const curr = screenToSvg(e.clientX, e.clientY);
    const vb = getViewBox();
    setViewBox({ x: vb.x - (curr.x - prev.x), y: vb.y - (curr.y - prev.y), w: vb.w, h: vb.h });
    panStart = { x: e.clientX, y: e.clientY };
  });

  window.addEventListener("mouseup", () => {
    isPanning = false;
    svg.style.cursor = "default";
  });

  svg.addEventListener(
    "wheel",
    (e: WheelEvent) => {
      e.preventDefault();
      if (e.deltaY === 0) return;
      const factor = e.deltaY > 0 ? ZOOM_FACTOR : 1 / ZOOM_FACTOR;
      const vb = getViewBox();
      const mouse = screenToSvg(e.clientX, e.clientY);
      setViewBox({
        x: mouse.x - (mouse.x - vb.x) * factor,
        y: mouse.y - (mouse.y - vb.y) * factor,
        w: vb.w * factor,
        h: vb.h * factor,
      });
    },
    { passive: false },
  );

  function fitAll(): void {
    setViewBox(bounds);
  }

  fitAll();
  return { fitAll };
}

// ── Main Render ────────────────────────────────────────────────────────────

export interface GraphController {
  /** Toggle focus on a node, as a click does. */
  toggleFocus: (id: string) => void;
  clearFocus: () => void;
  getFocused: () => string | null;
  fitAll: () => void;
}

export function renderGraph(container: HTMLElement, layout: LayoutResult): GraphController {
  container.innerHTML = "";

  const svg = svgEl("svg", { width: "100%", height: "100%" });
  const bounds = computeBounds(layout);

  svg.appendChild(
    svgEl("rect", {
      class: "bg",
      x: bounds.x - 10000,
      y: bounds.y - 10000,
      width: bounds.w + 20000,
      height: bounds.h + 20000,
      fill: "transparent",
    }),
  );

  const edgeLayer = svgEl("g", { class: "edges" });
  const nodeLayer = svgEl("g", { class: "nodes" });
  svg.appendChild(edgeLayer);
  svg.appendChild(nodeLayer);

  const edgeEls = new Map<string, SVGGElement>();
  for (const edge of layout.edges) {
    const el = createEdgeEl(edge);
    el.style.transition = `stroke ${TRANSITION_MS}ms`;
    edgeEls.set(edgeKey(edge), el);
    edgeLayer.appendChild(el);
  }

  const nodeEls = new Map<string, SVGGElement>();
  for (const node of layout.nodes) {
    const el = createNodeEl(node);
    nodeEls.set(node.id, el);
    nodeLayer.appendChild(el);
  }

  container.appendChild(svg);
  const panZoom = setupPanZoom(svg, bounds);

  const tracker = new FocusTracker();
  const refresh = () => applyHighlight(layout, tracker.focused, nodeEls, edgeEls);

  svg.addEventListener("click", (e: MouseEvent) => {
    const target = e.target;
    if (!(target instanceof Element)) return;
    const id = target.closest(".node-group")?.getAttribute("data-id");
    if (id == null) return;
    tracker.toggle(id);
    refresh();
  });

  refresh();

  return {
    toggleFocus: (id: string) => {
      if (!nodeEls.has(id)) return;
      tracker.toggle(id);
      refresh();
    },
    clearFocus: () => {
      tracker.clear();
      refresh();
    },
    getFocused: () => tracker.focused,
    fitAll: panZoom.fitAll,
  };
}
