/**
 * Route search unit tests
 */

import { SeededRandom } from "@labyrinth/contracts";
import { describe, expect, it } from "vitest";
import { CellLabel, isTraversable, Maze, type Point, roomDoorways, routeSearch } from "../src";
import { gridFromAscii, layoutAt } from "./helpers";

// Center (3,3) with a one-cell room. Going up is the long way round,
// going down reaches the exit in three steps.
const TWO_WAYS = [
  "#######",
  "#.....#",
  "#.#.#.#",
  "#.#.#.#",
  "#.#.#.#",
  "#.....#",
  "###E###",
];

// 3x3 room around (3,3); only its bottom-left cell leads out.
const ONE_DOOR = [
  "#######",
  "#######",
  "##...##",
  "##...##",
  "##...##",
  "##.####",
  "##E####",
];

function pts(...coords: [number, number][]): Point[] {
  return coords.map(([x, y]) => ({ x, y }));
}

describe("roomDoorways", () => {
  it("lists outline cells with a way out of the room", () => {
    const grid = gridFromAscii(ONE_DOOR);
    expect(roomDoorways(grid, layoutAt({ x: 3, y: 3 }, 3))).toEqual(pts([2, 4]));
  });
});

describe("routeSearch", () => {
  it("follows the last-added branch first by default", () => {
    const grid = gridFromAscii(TWO_WAYS);
    const route = routeSearch(grid, layoutAt({ x: 3, y: 3 }, 1));
    expect(route).toEqual(
      pts(
        [3, 3],
        [3, 2],
        [3, 1],
        [2, 1],
        [1, 1],
        [1, 2],
        [1, 3],
        [1, 4],
        [1, 5],
        [2, 5],
        [3, 5],
        [3, 6],
      ),
    );
  });

  it("finds the fewest steps breadth-first", () => {
    const grid = gridFromAscii(TWO_WAYS);
    const route = routeSearch(grid, layoutAt({ x: 3, y: 3 }, 1), {
      order: "breadth-first",
    });
    expect(route).toEqual(pts([3, 3], [3, 4], [3, 5], [3, 6]));
  });

  it("starts a route at the doorway it left the room through", () => {
    const grid = gridFromAscii(ONE_DOOR);
    const layout = layoutAt({ x: 3, y: 3 }, 3);
    const expected = pts([2, 4], [2, 5], [2, 6]);
    expect(routeSearch(grid, layout)).toEqual(expected);
    expect(routeSearch(grid, layout, { order: "breadth-first" })).toEqual(expected);
  });

  it("returns null when the exit is walled off", () => {
    const rows = [...ONE_DOOR];
    rows[5] = "#######";
    const grid = gridFromAscii(rows);
    const layout = layoutAt({ x: 3, y: 3 }, 3);
    expect(routeSearch(grid, layout)).toBeNull();
    expect(routeSearch(grid, layout, { order: "breadth-first" })).toBeNull();
  });

  it("walks over artifacts", () => {
    const grid = gridFromAscii(["#######", "#.z.c.E", "#######"]);
    expect(routeSearch(grid, layoutAt({ x: 1, y: 1 }, 1))).toEqual(
      pts([1, 1], [2, 1], [3, 1], [4, 1], [5, 1], [6, 1]),
    );
  });

  it("produces a connected walk to the exit on generated mazes", () => {
    for (const seed of [1, 2, 3, 4, 5]) {
      const maze = new Maze(27, 15, 3, "random");
      maze.generate(new SeededRandom(seed));
      maze.placeArtifacts(0.1, new SeededRandom(seed + 100));

      for (const order of ["depth-first", "breadth-first"] as const) {
        const route = maze.routeSearch({ order });
        expect(route).not.toBeNull();
        if (!route) continue;

        const last = route[route.length - 1];
        expect(last).toEqual(maze.getExit());
        for (const cell of route) {
          expect(isTraversable(maze.get(cell.x, cell.y))).toBe(true);
        }
        for (let i = 1; i < route.length; i++) {
          const a = route[i - 1];
          const b = route[i];
          if (!a || !b) continue;
          expect(Math.abs(a.x - b.x) + Math.abs(a.y - b.y)).toBe(1);
        }
        expect(route.filter((p) => maze.get(p.x, p.y) === CellLabel.EXIT)).toHaveLength(1);
      }
    }
  });
});
