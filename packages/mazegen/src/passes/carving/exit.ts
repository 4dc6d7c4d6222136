/**
 * Exit placement and connection passes.
 */

import { EXIT_SIDES, type ExitSide, type ExitSideOption } from "@labyrinth/contracts";
import type { Dimensions, Point } from "../../core/geometry/types";
import { CellLabel, isTraversable } from "../../core/grid";
import type { MazePass } from "../../pipeline/types";

export interface ExitPlacement {
  readonly side: ExitSide;
  readonly position: Point;
}

/**
 * Middle cell of a border side (integer division).
 */
export function exitPosition(side: ExitSide, size: Dimensions): Point {
  const midX = Math.floor(size.width / 2);
  const midY = Math.floor(size.height / 2);
  switch (side) {
    case "left":
      return { x: 0, y: midY };
    case "right":
      return { x: size.width - 1, y: midY };
    case "top":
      return { x: midX, y: 0 };
    case "bottom":
      return { x: midX, y: size.height - 1 };
  }
}

/**
 * Unit step from the exit towards the interior.
 */
export function inwardStep(side: ExitSide): Point {
  switch (side) {
    case "left":
      return { x: 1, y: 0 };
    case "right":
      return { x: -1, y: 0 };
    case "top":
      return { x: 0, y: 1 };
    case "bottom":
      return { x: 0, y: -1 };
  }
}

/**
 * Mark the exit cell on the configured side, drawing one when it is `random`.
 */
export function placeExit(option: ExitSideOption): MazePass<ExitPlacement> {
  return {
    id: "carving.exit",
    run({ grid }, ctx) {
      const side = option === "random" ? ctx.rng.choice(EXIT_SIDES) : option;
      const position = exitPosition(side, grid);
      grid.set(position.x, position.y, CellLabel.EXIT);

      ctx.trace.decision(
        "carving.exit",
        "Which border side holds the exit?",
        option === "random" ? EXIT_SIDES : [option],
        side,
        option === "random" ? "Drawn uniformly" : "Configured",
      );

      return { side, position };
    },
  };
}

/**
 * Carve inward from the exit until a traversable cell is reached.
 *
 * Returns the number of wall cells opened.
 */
export function connectExit(exit: ExitPlacement): MazePass<number> {
  return {
    id: "carving.exit-connect",
    run({ grid }, ctx) {
      const step = inwardStep(exit.side);
      let x = exit.position.x + step.x;
      let y = exit.position.y + step.y;
      let opened = 0;

      while (grid.isInBounds(x, y) && !isTraversable(grid.getUnsafe(x, y))) {
        grid.setUnsafe(x, y, CellLabel.PATH);
        opened++;
        x += step.x;
        y += step.y;
      }

      if (opened > 0) {
        ctx.trace.decision(
          "carving.exit-connect",
          "How many walls separate the exit from the maze?",
          [],
          opened,
          "Opened a corridor behind the exit",
        );
      }
      return opened;
    },
  };
}
