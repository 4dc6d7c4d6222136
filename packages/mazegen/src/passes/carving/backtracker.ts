/**
 * Recursive Backtracker
 *
 * Randomized depth-first carving over the odd-coordinate lattice, driven by
 * an explicit stack so large mazes never hit the call-stack limit.
 */

import { CoordSet } from "../../core/data-structures";
import { DIRECTIONS_4, type Point } from "../../core/geometry/types";
import { CellLabel, type ReadonlyGrid } from "../../core/grid";
import type { MazePass } from "../../pipeline/types";

export interface CarveStep {
  readonly target: Point;
  readonly wall: Point;
}

/**
 * Lattice cells two steps away that are still strictly inside the border
 * and not yet visited, in right/left/down/up order.
 */
export function carveCandidates(
  grid: ReadonlyGrid,
  from: Point,
  visited: CoordSet,
): CarveStep[] {
  const steps: CarveStep[] = [];
  for (const dir of DIRECTIONS_4) {
    const tx = from.x + dir.x * 2;
    const ty = from.y + dir.y * 2;
    if (tx <= 0 || tx >= grid.width - 1 || ty <= 0 || ty >= grid.height - 1) {
      continue;
    }
    if (visited.has(tx, ty)) continue;
    steps.push({
      target: { x: tx, y: ty },
      wall: { x: from.x + dir.x, y: from.y + dir.y },
    });
  }
  return steps;
}

/**
 * Carve a perfect maze from the layout center.
 *
 * Returns the number of lattice cells reached, the root included.
 */
export function carvePassages(): MazePass<number> {
  return {
    id: "carving.backtracker",
    run({ grid, layout }, ctx) {
      const visited = new CoordSet(grid.width, grid.height);
      const stack: Point[] = [layout.center];
      visited.add(layout.center.x, layout.center.y);

      while (stack.length > 0) {
        const current = stack.pop();
        if (!current) break;

        const step = ctx.rng.choice(carveCandidates(grid, current, visited));
        if (!step) continue;

        stack.push(current);
        grid.setUnsafe(step.wall.x, step.wall.y, CellLabel.PATH);
        grid.setUnsafe(step.target.x, step.target.y, CellLabel.PATH);
        visited.add(step.target.x, step.target.y);
        stack.push(step.target);
      }

      return visited.size;
    },
  };
}
