/**
 * Shared fixtures for building small grids by hand.
 */

import { CellLabel, Grid, type MazeLayout, type Point, roomBounds } from "../src";

const GLYPHS: Readonly<Record<string, CellLabel>> = {
  "#": CellLabel.WALL,
  ".": CellLabel.PATH,
  S: CellLabel.START,
  E: CellLabel.EXIT,
  m: CellLabel.MARSHMALLOWS,
  c: CellLabel.CHOCOLATE,
  z: CellLabel.ZOMBIE,
  w: CellLabel.WITCH,
  b: CellLabel.BAT,
};

/**
 * Parse rows of glyphs into a grid:
 * `#` wall, `.` path, `E` exit, `S` start, `m`/`c` rewards, `z`/`w`/`b` dangers.
 */
export function gridFromAscii(rows: readonly string[]): Grid {
  return Grid.fromRows(
    rows.map((row) =>
      [...row].map((glyph) => {
        const label = GLYPHS[glyph];
        if (label === undefined) throw new Error(`Unknown glyph "${glyph}"`);
        return label;
      }),
    ),
  );
}

export function layoutAt(center: Point, roomSize: number): MazeLayout {
  return { center, room: roomBounds(center, roomSize) };
}

/**
 * Pairs of orthogonally adjacent cells that both satisfy `predicate`.
 */
export function countAdjacentPairs(
  grid: { readonly width: number; readonly height: number; getUnsafe(x: number, y: number): CellLabel },
  predicate: (label: CellLabel) => boolean,
): number {
  let pairs = 0;
  for (let y = 0; y < grid.height; y++) {
    for (let x = 0; x < grid.width; x++) {
      if (!predicate(grid.getUnsafe(x, y))) continue;
      if (x + 1 < grid.width && predicate(grid.getUnsafe(x + 1, y))) pairs++;
      if (y + 1 < grid.height && predicate(grid.getUnsafe(x, y + 1))) pairs++;
    }
  }
  return pairs;
}
