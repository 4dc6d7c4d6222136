/**
 * Corridor graph types.
 *
 * Graph values are snapshots: they hold no reference to the grid they were
 * built from and go stale as soon as that grid changes.
 */

import type { Point } from "../geometry/types";

/** Node id of the maze center. */
export const START_NODE_ID = 0;
/** Node id of the exit cell. */
export const EXIT_NODE_ID = 1;

/**
 * - `start`/`exit`: the two fixed endpoints
 * - `dead-end`: one traversable neighbour
 * - `junction`: three or four traversable neighbours
 * - `isolated`: no traversable neighbour
 */
export type NodeKind = "start" | "exit" | "dead-end" | "junction" | "isolated";

export interface GraphNode {
  readonly id: number;
  readonly position: Point;
  readonly kind: NodeKind;
}

/**
 * Undirected edge stored with `startId < endId`.
 */
export interface GraphEdge {
  readonly startId: number;
  readonly endId: number;
  readonly weight: number;
}

export interface MazeGraph {
  /** Nodes indexed by id */
  readonly nodes: ReadonlyMap<number, GraphNode>;
  /** Edges ordered by `(startId, endId)` */
  readonly edges: readonly GraphEdge[];
}

export interface SpanningTree extends MazeGraph {
  readonly totalWeight: number;
}

export function edgeKey(startId: number, endId: number): string {
  return `${startId}-${endId}`;
}

export function compareEdges(a: GraphEdge, b: GraphEdge): number {
  return a.startId - b.startId || a.endId - b.endId;
}
