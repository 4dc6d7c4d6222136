import { MAZE_DIMENSION_STEP, MIN_MAZE_DIMENSION } from "@labyrinth/contracts";
import { CoordSet, WorkList } from "../core/data-structures";
import { containsPoint, DIRECTIONS_4, type Point } from "../core/geometry/types";
import { CellLabel, cellName, isArtifact, isTraversable } from "../core/grid";
import type { Maze } from "../maze";
import {
  hasErrorViolations,
  type MazeValidationResult,
  type Violation,
} from "./result-types";

function isValidDimension(dim: number): boolean {
  return dim >= MIN_MAZE_DIMENSION && (dim - MIN_MAZE_DIMENSION) % MAZE_DIMENSION_STEP === 0;
}

function checkDimensions(maze: Maze, violations: Violation[]): void {
  const { width, height } = maze.getSize();
  if (!isValidDimension(width) || !isValidDimension(height)) {
    violations.push({
      type: "invariant.dimensions",
      message: `Size ${width}x${height} is not of the form 7 + 4k`,
      severity: "error",
    });
  }
}

function checkBorder(maze: Maze, violations: Violation[]): void {
  const exits: Point[] = [];
  maze.forEach((x, y, label) => {
    const onBorder =
      x === 0 || y === 0 || x === maze.width - 1 || y === maze.height - 1;
    if (label === CellLabel.EXIT) {
      exits.push({ x, y });
      if (!onBorder) {
        violations.push({
          type: "invariant.exit.border",
          message: `Exit at (${x}, ${y}) is not on the border`,
          severity: "error",
        });
      }
    } else if (onBorder && label !== CellLabel.WALL) {
      violations.push({
        type: "invariant.border.wall",
        message: `Border cell (${x}, ${y}) is ${cellName(label)} instead of Wall`,
        severity: "error",
      });
    }
  });

  if (exits.length !== 1) {
    violations.push({
      type: "invariant.exit.count",
      message: `Expected exactly one exit, found ${exits.length}`,
      severity: "error",
    });
  }
}

function checkRoom(maze: Maze, violations: Violation[]): void {
  const room = maze.getRoomBounds();
  for (let y = room.minY; y <= room.maxY; y++) {
    for (let x = room.minX; x <= room.maxX; x++) {
      const label = maze.getUnsafe(x, y);
      if (label !== CellLabel.PATH) {
        violations.push({
          type: "invariant.room.path",
          message: `Room cell (${x}, ${y}) is ${cellName(label)} instead of Path`,
          severity: "error",
        });
      }
    }
  }
}

function checkArtifactSpacing(maze: Maze, violations: Violation[]): void {
  const room = maze.getRoomBounds();
  maze.forEach((x, y, label) => {
    if (!isArtifact(label)) return;
    if (containsPoint(room, x, y)) {
      violations.push({
        type: "invariant.artifacts.room",
        message: `${cellName(label)} at (${x}, ${y}) lies inside the central room`,
        severity: "error",
      });
    }
    // Right and down cover every adjacent pair once
    for (const [nx, ny] of [
      [x + 1, y],
      [x, y + 1],
    ] as const) {
      if (maze.isInBounds(nx, ny) && isArtifact(maze.getUnsafe(nx, ny))) {
        violations.push({
          type: "invariant.artifacts.adjacent",
          message: `Artifacts at (${x}, ${y}) and (${nx}, ${ny}) touch`,
          severity: "error",
        });
      }
    }
  });
}

function checkConnectivity(maze: Maze, violations: Violation[]): void {
  if (maze.routeSearch() === null) {
    violations.push({
      type: "invariant.connectivity.exit",
      message: "Exit is not reachable from the center",
      severity: "error",
    });
  }

  const center = maze.getCenter();
  const reached = new CoordSet(maze.width, maze.height);
  const work = WorkList.from([center]);
  reached.add(center.x, center.y);
  while (!work.isEmpty) {
    const cell = work.takeFirst();
    if (!cell) break;
    for (const dir of DIRECTIONS_4) {
      const nx = cell.x + dir.x;
      const ny = cell.y + dir.y;
      if (maze.isTraversable(nx, ny) && reached.add(nx, ny)) {
        work.add({ x: nx, y: ny });
      }
    }
  }

  let traversable = 0;
  maze.forEach((_x, _y, label) => {
    if (isTraversable(label)) traversable++;
  });
  const unreachable = traversable - reached.size;
  if (unreachable > 0) {
    violations.push({
      type: "connectivity.unreachable",
      message: `${unreachable} traversable cells cannot be reached from the center`,
      severity: "warning",
    });
  }
}

/**
 * Check a generated maze against its structural invariants.
 *
 * Checks:
 * - Dimensions follow the 7 + 4k rule
 * - Exactly one exit, on the border; every other border cell is a wall
 * - The central room is open
 * - Artifacts stay outside the room and never touch each other
 * - The exit is reachable from the center (unreachable corridors only warn)
 */
export function validateMaze(maze: Maze): MazeValidationResult {
  const violations: Violation[] = [];

  checkDimensions(maze, violations);
  checkBorder(maze, violations);
  checkRoom(maze, violations);
  checkArtifactSpacing(maze, violations);
  checkConnectivity(maze, violations);

  if (hasErrorViolations(violations)) {
    return { success: false, violations };
  }
  return { success: true, violations };
}
