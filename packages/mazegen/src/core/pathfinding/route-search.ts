/**
 * Route Search
 *
 * Finds a walkable route from the maze center to the exit. The default
 * depth-first order returns some connecting route; breadth-first returns
 * one with the fewest steps from the first entry that reaches the exit.
 */

import { CoordSet, WorkList } from "../data-structures";
import { containsPoint, DIRECTIONS_4, onBoundsEdge, type Point } from "../geometry/types";
import { CellLabel, isTraversable, type MazeLayout, type ReadonlyGrid } from "../grid";

export type RouteOrder = "depth-first" | "breadth-first";

export interface RouteSearchOptions {
  /** Default: "depth-first" */
  readonly order?: RouteOrder;
}

interface RouteEntry {
  readonly position: Point;
  readonly parent: RouteEntry | undefined;
}

function toPath(entry: RouteEntry): Point[] {
  const path: Point[] = [];
  for (let at: RouteEntry | undefined = entry; at; at = at.parent) {
    path.push(at.position);
  }
  return path.reverse();
}

/**
 * Room outline cells, row-major, that have a traversable neighbour outside
 * the room.
 */
export function roomDoorways(grid: ReadonlyGrid, layout: MazeLayout): Point[] {
  const { room } = layout;
  const doorways: Point[] = [];

  for (let y = room.minY; y <= room.maxY; y++) {
    for (let x = room.minX; x <= room.maxX; x++) {
      if (!onBoundsEdge(room, x, y)) continue;
      const leadsOut = DIRECTIONS_4.some((dir) => {
        const nx = x + dir.x;
        const ny = y + dir.y;
        return (
          grid.isInBounds(nx, ny) &&
          !containsPoint(room, nx, ny) &&
          isTraversable(grid.getUnsafe(nx, ny))
        );
      });
      if (leadsOut) doorways.push({ x, y });
    }
  }

  return doorways;
}

/**
 * Search from the center towards the `EXIT` cell.
 *
 * The work list holds the center plus every room doorway, each starting its
 * own route. The center is taken first, then the doorways in scan order.
 * Cells are marked visited when added. Returns `null` when the exit cannot
 * be reached.
 */
export function routeSearch(
  grid: ReadonlyGrid,
  layout: MazeLayout,
  options: RouteSearchOptions = {},
): Point[] | null {
  const depthFirst = (options.order ?? "depth-first") === "depth-first";
  const visited = new CoordSet(grid.width, grid.height);

  const start: RouteEntry = { position: layout.center, parent: undefined };
  visited.add(start.position.x, start.position.y);

  const seeds: RouteEntry[] = [];
  for (const doorway of roomDoorways(grid, layout)) {
    if (!visited.add(doorway.x, doorway.y)) continue;
    seeds.push({ position: doorway, parent: undefined });
  }

  const work = depthFirst
    ? WorkList.from([...seeds.reverse(), start])
    : WorkList.from([start, ...seeds]);

  while (!work.isEmpty) {
    const entry = depthFirst ? work.takeLast() : work.takeFirst();
    if (!entry) break;

    const { x, y } = entry.position;
    if (grid.getUnsafe(x, y) === CellLabel.EXIT) return toPath(entry);

    for (const dir of DIRECTIONS_4) {
      const nx = x + dir.x;
      const ny = y + dir.y;
      if (!grid.isInBounds(nx, ny)) continue;
      if (!isTraversable(grid.getUnsafe(nx, ny))) continue;
      if (!visited.add(nx, ny)) continue;
      work.add({ position: { x: nx, y: ny }, parent: entry });
    }
  }

  return null;
}
