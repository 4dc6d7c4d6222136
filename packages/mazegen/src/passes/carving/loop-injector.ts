/**
 * Loop Injector
 *
 * Turns a perfect maze into one with cycles by knocking out walls that sit
 * between two straight-aligned corridor cells.
 */

import type { Point } from "../../core/geometry/types";
import { CellLabel, type ReadonlyGrid } from "../../core/grid";
import type { MazePass } from "../../pipeline/types";

export function loopRemovalCount(width: number, height: number): number {
  return Math.floor((width + height) / 8);
}

function isPath(grid: ReadonlyGrid, x: number, y: number): boolean {
  return grid.getUnsafe(x, y) === CellLabel.PATH;
}

/**
 * Interior walls with exactly two `PATH` neighbours, lying either
 * left and right or above and below. Row-major order.
 */
export function findLoopCandidates(grid: ReadonlyGrid): Point[] {
  const candidates: Point[] = [];

  for (let y = 1; y < grid.height - 1; y++) {
    for (let x = 1; x < grid.width - 1; x++) {
      if (grid.getUnsafe(x, y) !== CellLabel.WALL) continue;

      const right = isPath(grid, x + 1, y);
      const left = isPath(grid, x - 1, y);
      const down = isPath(grid, x, y + 1);
      const up = isPath(grid, x, y - 1);
      const paths = Number(right) + Number(left) + Number(down) + Number(up);
      if (paths !== 2) continue;

      if ((right && left) || (down && up)) {
        candidates.push({ x, y });
      }
    }
  }

  return candidates;
}

/**
 * Remove `floor((width + height) / 8)` walls, re-scanning before each one.
 *
 * Returns how many walls were actually removed.
 */
export function injectLoops(): MazePass<number> {
  return {
    id: "carving.loops",
    run({ grid }, ctx) {
      const attempts = loopRemovalCount(grid.width, grid.height);
      let removed = 0;

      for (let i = 0; i < attempts; i++) {
        const wall = ctx.rng.choice(findLoopCandidates(grid));
        if (!wall) continue;
        grid.setUnsafe(wall.x, wall.y, CellLabel.PATH);
        removed++;
      }

      ctx.trace.decision(
        "carving.loops",
        "How many walls to remove?",
        [attempts],
        removed,
        `Removing ${attempts} walls`,
      );
      if (removed < attempts) {
        ctx.trace.warning(
          "carving.loops",
          `Only ${removed} of ${attempts} walls had a straight corridor on both sides`,
        );
      }

      return removed;
    },
  };
}
