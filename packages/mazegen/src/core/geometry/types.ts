/**
 * Core geometry types for maze generation.
 * All types are immutable value objects.
 */

/**
 * 2D point with integer coordinates
 */
export interface Point {
  readonly x: number;
  readonly y: number;
}

/**
 * Inclusive bounding box defined by min/max corners
 */
export interface Bounds {
  readonly minX: number;
  readonly minY: number;
  readonly maxX: number;
  readonly maxY: number;
}

/**
 * Grid dimensions
 */
export interface Dimensions {
  readonly width: number;
  readonly height: number;
}

/**
 * Orthogonal direction vectors in scan order: right, left, down, up.
 *
 * Every walk in the package uses this order, so it fixes which neighbour
 * wins when several qualify.
 */
export const DIRECTIONS_4 = [
  { x: 1, y: 0 }, // Right
  { x: -1, y: 0 }, // Left
  { x: 0, y: 1 }, // Down
  { x: 0, y: -1 }, // Up
] as const;

export type Direction4 = (typeof DIRECTIONS_4)[number];

export function pointsEqual(a: Point, b: Point): boolean {
  return a.x === b.x && a.y === b.y;
}

export function containsPoint(bounds: Bounds, x: number, y: number): boolean {
  return (
    x >= bounds.minX && x <= bounds.maxX && y >= bounds.minY && y <= bounds.maxY
  );
}

/**
 * True when the point lies on the outline of the bounds.
 */
export function onBoundsEdge(bounds: Bounds, x: number, y: number): boolean {
  return (
    x === bounds.minX || x === bounds.maxX || y === bounds.minY || y === bounds.maxY
  );
}
