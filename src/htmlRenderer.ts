import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";
import type { GraphPayload } from "./dotRenderer.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * The visualiser directory, both from src/ (tests, tsx) and from dist/src/ (built CLI).
 */
export function defaultVisualiserDir(): string {
  const candidates = [
    path.resolve(__dirname, "..", "visualiser"),
    path.resolve(__dirname, "..", "..", "visualiser"),
  ];
  return candidates.find((dir) => fs.existsSync(path.join(dir, "index.html"))) ?? candidates[0];
}

/**
 * Render a self-contained HTML file with the graph data inlined.
 * Reads the visualiser's index.html and dist/bundle.js, injects the data,
 * and inlines the bundle script.
 */
export function renderHtml(graphData: GraphPayload, visualiserDir = defaultVisualiserDir()): string {
  const indexPath = path.join(visualiserDir, "index.html");
  const bundlePath = path.join(visualiserDir, "dist", "bundle.js");

  if (!fs.existsSync(bundlePath)) {
    throw new Error(
      `Visualiser bundle not found at ${bundlePath}.\n` +
        `Run "npm run build:visualiser" first.`,
    );
  }

  let html = fs.readFileSync(indexPath, "utf-8");
  const bundleJs = fs.readFileSync(bundlePath, "utf-8");

  // The HTML parser closes <script> on any "</script" in the character stream,
  // so every </ in the JSON becomes <\/ (a valid JSON escape for /).
  // Function replacers keep $' and $& in the payload literal.
  const jsonStr = JSON.stringify(graphData).replace(/<\//g, "<\\/");
  const dataScript = `<script>window.GRAPH_DATA = ${jsonStr};</script>`;
  html = html.replace("<!-- INLINE_DATA -->", () => dataScript);

  html = html.replace(
    '<script src="dist/bundle.js"></script>',
    () => `<script>${bundleJs}</script>`,
  );

  return html;
}
