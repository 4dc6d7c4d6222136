import type { Bounds, Point } from "../geometry/types";
import type { CellLabel } from "./cell-label";

/**
 * Read-only view of a labelled grid.
 */
export interface ReadonlyGrid {
  readonly width: number;
  readonly height: number;
  isInBounds(x: number, y: number): boolean;
  get(x: number, y: number): CellLabel;
  getUnsafe(x: number, y: number): CellLabel;
  forEach(callback: (x: number, y: number, label: CellLabel) => void): void;
}

/**
 * Grid that can be written to.
 */
export interface MutableGrid extends ReadonlyGrid {
  set(x: number, y: number, label: CellLabel): void;
  setUnsafe(x: number, y: number, label: CellLabel): void;
  fill(label: CellLabel): void;
}

/**
 * Fixed geometry of a maze: where the central room sits.
 */
export interface MazeLayout {
  readonly center: Point;
  readonly room: Bounds;
}
