/**
 * Labelled maze grid.
 * Uses flat Uint8Array storage, one byte per cell.
 */

import { MazeError } from "@labyrinth/contracts";
import { type Bounds, DIRECTIONS_4 } from "../geometry/types";
import { CellLabel, isCellLabel } from "./cell-label";
import type { MutableGrid } from "./types";

/**
 * 2D grid of cell labels.
 *
 * `get`/`set` validate coordinates and throw `MazeError` (`OUT_OF_BOUNDS`);
 * the `Unsafe` variants skip the check for loops that already stay inside.
 */
export class Grid implements MutableGrid {
  readonly width: number;
  readonly height: number;
  private readonly data: Uint8Array;

  constructor(
    width: number,
    height: number,
    initialValue: CellLabel = CellLabel.WALL,
  ) {
    if (
      !Number.isInteger(width) ||
      !Number.isInteger(height) ||
      width <= 0 ||
      height <= 0
    ) {
      throw MazeError.configInvalid(
        `Invalid grid dimensions: ${width}x${height}`,
        { width, height },
      );
    }

    this.width = width;
    this.height = height;
    this.data = new Uint8Array(width * height);

    if (initialValue !== CellLabel.WALL) {
      this.data.fill(initialValue);
    }
  }

  /**
   * Build a grid from rows of labels. Short rows are padded with walls.
   */
  static fromRows(rows: readonly (readonly CellLabel[])[]): Grid {
    const width = Math.max(0, ...rows.map((row) => row.length));
    const grid = new Grid(width, rows.length);
    rows.forEach((row, y) => {
      row.forEach((label, x) => grid.setUnsafe(x, y, label));
    });
    return grid;
  }

  // ===========================================================================
  // BOUNDS CHECKING
  // ===========================================================================

  /**
   * Integer coordinates inside `[0, width) x [0, height)`
   */
  isInBounds(x: number, y: number): boolean {
    return (
      Number.isInteger(x) &&
      Number.isInteger(y) &&
      x >= 0 &&
      x < this.width &&
      y >= 0 &&
      y < this.height
    );
  }

  private assertInBounds(x: number, y: number): void {
    if (!this.isInBounds(x, y)) {
      throw MazeError.outOfBounds(x, y, this);
    }
  }

  // ===========================================================================
  // CELL ACCESS
  // ===========================================================================

  get(x: number, y: number): CellLabel {
    this.assertInBounds(x, y);
    return this.getUnsafe(x, y);
  }

  set(x: number, y: number, label: CellLabel): void {
    this.assertInBounds(x, y);
    this.data[y * this.width + x] = label;
  }

  getUnsafe(x: number, y: number): CellLabel {
    const value = this.data[y * this.width + x];
    return value !== undefined && isCellLabel(value) ? value : CellLabel.WALL;
  }

  setUnsafe(x: number, y: number, label: CellLabel): void {
    this.data[y * this.width + x] = label;
  }

  // ===========================================================================
  // NEIGHBOR OPERATIONS
  // ===========================================================================

  /**
   * Count in-bounds orthogonal neighbours whose label satisfies `predicate`.
   */
  countNeighbors4(
    x: number,
    y: number,
    predicate: (label: CellLabel) => boolean,
  ): number {
    let count = 0;
    for (const dir of DIRECTIONS_4) {
      const nx = x + dir.x;
      const ny = y + dir.y;
      if (this.isInBounds(nx, ny) && predicate(this.getUnsafe(nx, ny))) {
        count++;
      }
    }
    return count;
  }

  // ===========================================================================
  // BULK OPERATIONS
  // ===========================================================================

  fill(label: CellLabel): void {
    this.data.fill(label);
  }

  /**
   * Fill an inclusive rectangle, clipped to the grid.
   */
  fillRect(bounds: Bounds, label: CellLabel): void {
    const minX = Math.max(0, bounds.minX);
    const minY = Math.max(0, bounds.minY);
    const maxX = Math.min(this.width - 1, bounds.maxX);
    const maxY = Math.min(this.height - 1, bounds.maxY);
    for (let y = minY; y <= maxY; y++) {
      for (let x = minX; x <= maxX; x++) {
        this.data[y * this.width + x] = label;
      }
    }
  }

  /**
   * Visit every cell in row-major order.
   */
  forEach(callback: (x: number, y: number, label: CellLabel) => void): void {
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        callback(x, y, this.getUnsafe(x, y));
      }
    }
  }

  countLabel(label: CellLabel): number {
    let count = 0;
    for (const value of this.data) {
      if (value === label) count++;
    }
    return count;
  }

  // ===========================================================================
  // COPYING
  // ===========================================================================

  clone(): Grid {
    const copy = new Grid(this.width, this.height);
    copy.data.set(this.data);
    return copy;
  }

  /**
   * Overwrite every cell with the contents of a grid of the same size.
   */
  copyFrom(other: Grid): void {
    if (this.width !== other.width || this.height !== other.height) {
      throw MazeError.configInvalid(
        `Cannot copy a ${other.width}x${other.height} grid into ${this.width}x${this.height}`,
      );
    }
    this.data.set(other.data);
  }

  getRawDataCopy(): Uint8Array {
    return new Uint8Array(this.data);
  }

  equals(other: Grid): boolean {
    if (this.width !== other.width || this.height !== other.height) {
      return false;
    }
    for (let i = 0; i < this.data.length; i++) {
      if (this.data[i] !== other.data[i]) return false;
    }
    return true;
  }
}
