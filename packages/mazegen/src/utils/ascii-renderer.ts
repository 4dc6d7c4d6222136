/**
 * ASCII Maze Renderer
 *
 * Renders mazes as text for terminals, logs and tests.
 *
 * @example
 * ```typescript
 * const maze = new Maze(21, 11);
 * maze.generate();
 * printMaze(maze, { route: maze.routeSearch() ?? undefined });
 * ```
 */

import type { Point } from "../core/geometry/types";
import { CellLabel, isDanger, isReward, type ReadonlyGrid } from "../core/grid";

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface AsciiCharset {
  readonly wall: string;
  readonly path: string;
  readonly start: string;
  readonly exit: string;
  readonly reward: string;
  readonly danger: string;
  readonly route: string;
}

export const DEFAULT_CHARSET: AsciiCharset = {
  wall: "█",
  path: " ",
  start: "▲",
  exit: "▼",
  reward: "$",
  danger: "!",
  route: "·",
};

/**
 * Plain ASCII charset (for terminals without unicode support)
 */
export const SIMPLE_CHARSET: AsciiCharset = {
  wall: "#",
  path: ".",
  start: "@",
  exit: ">",
  reward: "$",
  danger: "!",
  route: "*",
};

export interface RenderOptions {
  readonly charset?: AsciiCharset;
  /** Cells to mark as route; artifacts and the exit keep their own glyph */
  readonly route?: readonly Point[];
  /** Color output (ANSI escape codes) */
  readonly useColors?: boolean;
}

// =============================================================================
// ANSI COLOR CODES
// =============================================================================

const ANSI = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
} as const;

function colorize(text: string, ...codes: string[]): string {
  return codes.join("") + text + ANSI.reset;
}

// =============================================================================
// RENDER FUNCTIONS
// =============================================================================

/**
 * Render a maze as one line of text per row.
 */
export function renderAscii(grid: ReadonlyGrid, options: RenderOptions = {}): string {
  const { charset = DEFAULT_CHARSET, route = [], useColors = false } = options;

  const onRoute = new Set(route.map((p) => p.y * grid.width + p.x));
  const paint = (text: string, ...codes: string[]): string =>
    useColors ? colorize(text, ...codes) : text;

  const rows: string[] = [];
  for (let y = 0; y < grid.height; y++) {
    let row = "";
    for (let x = 0; x < grid.width; x++) {
      const label = grid.getUnsafe(x, y);
      if (label === CellLabel.WALL) {
        row += paint(charset.wall, ANSI.blue);
      } else if (label === CellLabel.EXIT) {
        row += paint(charset.exit, ANSI.red);
      } else if (label === CellLabel.START) {
        row += paint(charset.start, ANSI.green);
      } else if (isReward(label)) {
        row += paint(charset.reward, ANSI.yellow);
      } else if (isDanger(label)) {
        row += paint(charset.danger, ANSI.red);
      } else if (onRoute.has(y * grid.width + x)) {
        row += paint(charset.route, ANSI.cyan);
      } else {
        row += paint(charset.path, ANSI.dim);
      }
    }
    rows.push(row);
  }

  return rows.join("\n");
}

export function printMaze(grid: ReadonlyGrid, options: RenderOptions = {}): void {
  console.log(renderAscii(grid, { useColors: true, ...options }));
}
