import type { GraphData } from "./types.js";
import { layoutGraph } from "./layout.js";
import type { GraphController } from "./render.js";
import { renderGraph } from "./render.js";

declare global {
  interface Window {
    GRAPH_DATA?: GraphData;
  }
}

// ── Theme ───────────────────────────────────────────────────────────────────

type ThemeSetting = "light" | "dark";

const THEME_KEY = "colcon-workbench-theme";

function applyTheme(setting: ThemeSetting): void {
  if (setting === "dark") {
    document.documentElement.removeAttribute("data-theme");
  } else {
    document.documentElement.setAttribute("data-theme", setting);
  }
  const btn = document.getElementById("theme-btn");
  if (btn) btn.textContent = setting === "light" ? "Theme: Light" : "Theme: Dark";
}

let currentTheme: ThemeSetting = "dark";

/** A theme toggled in this browser wins over the one saved in the workspace settings. */
function initTheme(fromData: ThemeSetting | undefined): void {
  const stored = localStorage.getItem(THEME_KEY);
  if (stored === "light" || stored === "dark") {
    currentTheme = stored;
  } else if (fromData) {
    currentTheme = fromData;
  }
  applyTheme(currentTheme);
}

function toggleTheme(): void {
  currentTheme = currentTheme === "dark" ? "light" : "dark";
  localStorage.setItem(THEME_KEY, currentTheme);
  applyTheme(currentTheme);
}

// ── Init ───────────────────────────────────────────────────────────────────

function run(data: GraphData): GraphController | null {
  const container = document.getElementById("graph-container");
  if (!container) {
    console.error("No #graph-container found");
    return null;
  }

  const status = document.getElementById("status");
  if (status) status.textContent = `${data.nodes.length} packages, ${data.edges.length} dependencies`;

  return renderGraph(container, layoutGraph(data));
}

document.addEventListener("DOMContentLoaded", () => {
  const data = window.GRAPH_DATA;
  initTheme(data?.theme);

  document.getElementById("theme-btn")?.addEventListener("click", toggleTheme);

  if (!data) {
    const status = document.getElementById("status");
    if (status) status.textContent = "No graph data; render this page with `colcon-workbench graph --html`";
    return;
  }

  const controller = run(data);
  if (!controller) return;

  document.getElementById("fit-btn")?.addEventListener("click", controller.fitAll);
  document.getElementById("clear-focus-btn")?.addEventListener("click", controller.clearFocus);

  document.addEventListener("keydown", (e: KeyboardEvent) => {
    if (e.key === "Escape") controller.clearFocus();
    else if (e.key === "f") controller.fitAll();
    else if (e.key === "t") toggleTheme();
  });
});
