/**
 * SVG Maze Renderer
 *
 * Renders mazes as SVG for visualization and export.
 *
 * @example
 * ```typescript
 * const maze = new Maze(41, 23);
 * maze.generate();
 * const svg = renderSVG(maze, { route: maze.routeSearch() ?? undefined });
 * ```
 */

import type { Point } from "../core/geometry/types";
import { CellLabel, cellName, isDanger, isReward, type ReadonlyGrid } from "../core/grid";

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface SVGColorPalette {
  readonly wall: string;
  readonly path: string;
  readonly start: string;
  readonly exit: string;
  readonly reward: string;
  readonly danger: string;
  readonly route: string;
  readonly background: string;
}

/**
 * Light palette, the default
 */
export const LIGHT_PALETTE: SVGColorPalette = {
  wall: "#222",
  path: "#eee",
  start: "#22c55e",
  exit: "#ef4444",
  reward: "#2d1",
  danger: "#e43",
  route: "rgb(28, 163, 163)",
  background: "#eee",
};

export const DARK_PALETTE: SVGColorPalette = {
  wall: "#1a1a2e",
  path: "#16213e",
  start: "#4ade80",
  exit: "#f87171",
  reward: "#4ade80",
  danger: "#e94560",
  route: "#fbbf24",
  background: "#0f0f1a",
};

export interface SVGOptions {
  /** Pixels per cell (default: 10) */
  readonly cellSize?: number;
  /** Margin around the maze in pixels (default: 0) */
  readonly margin?: number;
  /** Cells to connect with a polyline, usually a route search result */
  readonly route?: readonly Point[];
  readonly palette?: SVGColorPalette;
  readonly title?: string;
}

// =============================================================================
// SVG HELPERS
// =============================================================================

function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function rect(x: number, y: number, size: number, fill: string): string {
  return `<rect x="${x}" y="${y}" width="${size}" height="${size}" fill="${fill}"/>`;
}

function circle(cx: number, cy: number, r: number, fill: string, title: string): string {
  return `<circle cx="${cx}" cy="${cy}" r="${r}" fill="${fill}"><title>${escapeXml(title)}</title></circle>`;
}

// =============================================================================
// MAIN RENDER FUNCTION
// =============================================================================

/**
 * Render a maze as SVG.
 *
 * Walls and the exit are drawn as squares, rewards and dangers as circles
 * titled with their name, and the optional route as a polyline through cell
 * centers.
 */
export function renderSVG(grid: ReadonlyGrid, options: SVGOptions = {}): string {
  const {
    cellSize = 10,
    margin = 0,
    route,
    palette = LIGHT_PALETTE,
    title = `Maze ${grid.width}x${grid.height}`,
  } = options;

  const svgWidth = grid.width * cellSize + margin * 2;
  const svgHeight = grid.height * cellSize + margin * 2;
  const center = (v: number): number => margin + v * cellSize + cellSize / 2;

  const terrain: string[] = [];
  const artifacts: string[] = [];

  grid.forEach((x, y, label) => {
    const px = margin + x * cellSize;
    const py = margin + y * cellSize;
    if (label === CellLabel.WALL) {
      terrain.push(rect(px, py, cellSize, palette.wall));
    } else if (label === CellLabel.EXIT) {
      terrain.push(rect(px, py, cellSize, palette.exit));
    } else if (label === CellLabel.START) {
      terrain.push(rect(px, py, cellSize, palette.start));
    } else if (isReward(label)) {
      artifacts.push(circle(center(x), center(y), cellSize * 0.4, palette.reward, cellName(label)));
    } else if (isDanger(label)) {
      artifacts.push(circle(center(x), center(y), cellSize * 0.4, palette.danger, cellName(label)));
    }
  });

  const elements = [
    `<rect width="100%" height="100%" fill="${palette.background}"/>`,
    `<g class="terrain">`,
    ...terrain,
    `</g>`,
  ];

  if (route && route.length > 0) {
    const points = route.map((p) => `${center(p.x)},${center(p.y)}`).join(" ");
    elements.push(
      `<polyline class="route" fill="none" stroke="${palette.route}" stroke-width="${cellSize * 0.35}" points="${points}"/>`,
    );
  }

  elements.push(`<g class="artifacts">`, ...artifacts, `</g>`);

  return `<?xml version="1.0" encoding="UTF-8"?>
<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 ${svgWidth} ${svgHeight}" width="${svgWidth}" height="${svgHeight}">
  <title>${escapeXml(title)}</title>
  <style>.terrain rect { shape-rendering: crispEdges; }</style>
  ${elements.join("\n  ")}
</svg>`;
}
