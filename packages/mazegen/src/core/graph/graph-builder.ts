/**
 * Corridor Graph Builder
 *
 * Collapses the maze into a weighted graph: nodes at the center, the exit,
 * dead ends and junctions; edges along the corridors between them, weighted
 * by the sum of the cell weights walked over.
 */

import { cellIndex } from "../data-structures";
import { DIRECTIONS_4, type Point } from "../geometry/types";
import { CellLabel, cellWeight, isTraversable, type ReadonlyGrid } from "../grid";
import {
  compareEdges,
  EXIT_NODE_ID,
  edgeKey,
  type GraphEdge,
  type GraphNode,
  type MazeGraph,
  type NodeKind,
  START_NODE_ID,
} from "./types";

const EMPTY_GRAPH: MazeGraph = { nodes: new Map(), edges: [] };

/**
 * Locate the exit: left and right border columns first, then the top and
 * bottom rows.
 */
export function findExit(grid: ReadonlyGrid): Point | undefined {
  for (const x of [0, grid.width - 1]) {
    for (let y = 0; y < grid.height; y++) {
      if (grid.getUnsafe(x, y) === CellLabel.EXIT) return { x, y };
    }
  }
  for (const y of [0, grid.height - 1]) {
    for (let x = 0; x < grid.width; x++) {
      if (grid.getUnsafe(x, y) === CellLabel.EXIT) return { x, y };
    }
  }
  return undefined;
}

function countOpenNeighbors(grid: ReadonlyGrid, x: number, y: number): number {
  let count = 0;
  for (const dir of DIRECTIONS_4) {
    const nx = x + dir.x;
    const ny = y + dir.y;
    if (grid.isInBounds(nx, ny) && isTraversable(grid.getUnsafe(nx, ny))) {
      count++;
    }
  }
  return count;
}

function kindFor(openNeighbors: number): NodeKind {
  if (openNeighbors === 0) return "isolated";
  if (openNeighbors === 1) return "dead-end";
  return "junction";
}

/**
 * Build the corridor graph of a grid.
 *
 * Node 0 is `center`, node 1 the exit; other ids follow row-major order over
 * interior traversable cells whose open-neighbour count is not 2. Without an
 * exit the graph is empty. When two corridors join the same pair of nodes
 * the lighter one is kept.
 */
export function buildGraph(grid: ReadonlyGrid, center: Point): MazeGraph {
  const exit = findExit(grid);
  if (!exit) return EMPTY_GRAPH;

  const width = grid.width;
  const nodes = new Map<number, GraphNode>();
  const idAt = new Map<number, number>();

  const addNode = (position: Point, kind: NodeKind): void => {
    const id = nodes.size;
    nodes.set(id, { id, position, kind });
    idAt.set(cellIndex(position.x, position.y, width), id);
  };

  addNode(center, "start");
  addNode(exit, "exit");

  for (let y = 1; y < grid.height - 1; y++) {
    for (let x = 1; x < width - 1; x++) {
      if (!isTraversable(grid.getUnsafe(x, y))) continue;
      if (idAt.has(cellIndex(x, y, width))) continue;
      const open = countOpenNeighbors(grid, x, y);
      if (open !== 2) addNode({ x, y }, kindFor(open));
    }
  }

  const edges = new Map<string, GraphEdge>();
  const record = (startId: number, endId: number, weight: number): void => {
    const key = edgeKey(startId, endId);
    const existing = edges.get(key);
    if (!existing || weight < existing.weight) {
      edges.set(key, { startId, endId, weight });
    }
  };

  for (const node of nodes.values()) {
    for (const dir of DIRECTIONS_4) {
      let x = node.position.x + dir.x;
      let y = node.position.y + dir.y;
      if (!grid.isInBounds(x, y)) continue;

      const first = grid.getUnsafe(x, y);
      if (!isTraversable(first)) continue;

      let weight: number = cellWeight(first);
      const visited = new Set<number>([
        cellIndex(node.position.x, node.position.y, width),
      ]);

      for (;;) {
        const here = cellIndex(x, y, width);
        const endId = idAt.get(here);
        if (endId !== undefined) {
          if (node.id < endId) record(node.id, endId, weight);
          break;
        }
        visited.add(here);

        let moved = false;
        for (const step of DIRECTIONS_4) {
          const nx = x + step.x;
          const ny = y + step.y;
          if (!grid.isInBounds(nx, ny)) continue;
          const label = grid.getUnsafe(nx, ny);
          if (!isTraversable(label) || visited.has(cellIndex(nx, ny, width))) {
            continue;
          }
          x = nx;
          y = ny;
          weight += cellWeight(label);
          moved = true;
          break;
        }
        if (!moved) break;
      }
    }
  }

  return { nodes, edges: [...edges.values()].sort(compareEdges) };
}

export function startNode(graph: MazeGraph): GraphNode | undefined {
  return graph.nodes.get(START_NODE_ID);
}

export function exitNode(graph: MazeGraph): GraphNode | undefined {
  return graph.nodes.get(EXIT_NODE_ID);
}
