/**
 * Maze facade and generateMaze unit tests
 */

import { MazeError, SeededRandom } from "@labyrinth/contracts";
import { describe, expect, it } from "vitest";
import {
  CellLabel,
  createMaze,
  createTraceCollector,
  generateMaze,
  Maze,
  validateMaze,
} from "../src";

describe("Maze", () => {
  it("rounds sizes up to 7 + 4k", () => {
    expect(new Maze(8, 5).getSize()).toEqual({ width: 11, height: 7 });
    expect(new Maze(11, 12).getSize()).toEqual({ width: 11, height: 15 });
    expect(new Maze(0, 63).getSize()).toEqual({ width: 7, height: 63 });
  });

  it("shrinks a room that would touch the border", () => {
    expect(new Maze(7, 11, 9).roomSize).toBe(5);
    expect(new Maze(15, 15, 4).roomSize).toBe(4);
    expect(new Maze(15, 15, 0).roomSize).toBe(1);
  });

  it("falls back to a one-cell room for a NaN room size", () => {
    const maze = new Maze(11, 11, Number.NaN, "right");
    expect(maze.roomSize).toBe(1);
    expect(maze.getRoomBounds()).toEqual({ minX: 5, minY: 5, maxX: 5, maxY: 5 });

    maze.generate(new SeededRandom(6));
    expect(maze.get(5, 5)).toBe(CellLabel.PATH);
    expect(validateMaze(maze)).toEqual({ success: true, violations: [] });
  });

  it("is all walls before generation", () => {
    const maze = new Maze(11, 7);
    expect(maze.countLabel(CellLabel.WALL)).toBe(77);
    expect(maze.getExit()).toBeUndefined();
  });

  it("carves the smallest maze around its room", () => {
    const maze = new Maze(7, 7, 3, "right");
    const report = maze.generate(new SeededRandom(1));

    expect(maze.get(6, 3)).toBe(CellLabel.EXIT);
    for (let y = 2; y <= 4; y++) {
      for (let x = 2; x <= 4; x++) expect(maze.get(x, y)).toBe(CellLabel.PATH);
    }
    expect(report).toMatchObject({
      seed: 1,
      exitSide: "right",
      exit: { x: 6, y: 3 },
      latticeCells: 9,
      exitCellsOpened: 0,
    });
    expect(report.wallsRemoved).toBeLessThanOrEqual(1);
  });

  it("places the exit in the middle of the configured side", () => {
    const cases = [
      ["left", { x: 0, y: 5 }],
      ["right", { x: 14, y: 5 }],
      ["top", { x: 7, y: 0 }],
      ["bottom", { x: 7, y: 10 }],
    ] as const;
    for (const [side, position] of cases) {
      const maze = new Maze(15, 11, 3, side);
      maze.generate(new SeededRandom(3));
      expect(maze.getExit()).toEqual(position);
      expect(maze.getExitSide()).toBe(side);
      expect(maze.countLabel(CellLabel.EXIT)).toBe(1);
    }
  });

  it("resolves a random exit side on generation", () => {
    const maze = new Maze(15, 11, 3, "random");
    expect(maze.getExitSide()).toBeUndefined();
    const report = maze.generate(new SeededRandom(8));
    expect(maze.getExitSide()).toBe(report.exitSide);
    expect(maze.getExit()).toEqual(report.exit);
  });

  it("regenerates from scratch with the same seed", () => {
    const maze = new Maze(23, 15);
    maze.generate(new SeededRandom(42));
    const first = maze.getRawDataCopy();
    maze.placeArtifacts(0.3, new SeededRandom(1));
    maze.generate(new SeededRandom(42));
    expect(maze.getRawDataCopy()).toEqual(first);
  });

  it("throws OUT_OF_BOUNDS from get and set", () => {
    const maze = new Maze(7, 7);
    expect(() => maze.get(7, 0)).toThrow(MazeError);
    expect(() => maze.set(0, -1, CellLabel.PATH)).toThrow(MazeError);
    expect(maze.isTraversable(7, 0)).toBe(false);
  });

  it("clones without sharing cells", () => {
    const maze = new Maze(11, 7, 3, "random");
    maze.generate(new SeededRandom(2));
    const copy = maze.clone();
    expect(copy.getRawDataCopy()).toEqual(maze.getRawDataCopy());
    expect(copy.getExitSide()).toBe(maze.getExitSide());

    copy.set(5, 3, CellLabel.WITCH);
    expect(maze.get(5, 3)).toBe(CellLabel.PATH);
  });

  it("passes its own invariant checks", () => {
    for (const seed of [1, 2, 3, 4, 5, 6]) {
      const maze = new Maze(27, 19, 5, "random");
      maze.generate(new SeededRandom(seed));
      maze.placeArtifacts(0.25, new SeededRandom(seed));
      expect(validateMaze(maze)).toEqual({ success: true, violations: [] });
    }
  });
});

describe("createMaze", () => {
  it("allocates from a normalized config", () => {
    const maze = createMaze({
      width: 19,
      height: 11,
      roomSize: 5,
      exitSide: "top",
      fillRatio: 0,
    });
    expect(maze.getSize()).toEqual({ width: 19, height: 11 });
    expect(maze.roomSize).toBe(5);
    expect(maze.getRoomBounds()).toEqual({ minX: 7, minY: 3, maxX: 11, maxY: 7 });
  });
});

describe("generateMaze", () => {
  it("generates with defaults", () => {
    const result = generateMaze({ seed: 1 });
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.value.maze.getSize()).toEqual({ width: 63, height: 31 });
    expect(result.value.report.exit).toEqual({ x: 62, y: 15 });
    expect(result.value.artifacts).toBeUndefined();
  });

  it("normalizes the config it reports", () => {
    const result = generateMaze({ width: 20, height: 9, roomSize: 99, fillRatio: 4, seed: 2 });
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.value.config).toEqual({
      width: 23,
      height: 11,
      roomSize: 9,
      exitSide: "right",
      fillRatio: 1,
      seed: 2,
    });
    expect(result.value.artifacts?.requested).toBeGreaterThan(0);
  });

  it("reproduces the same maze for the same seed", () => {
    const a = generateMaze({ width: 31, height: 15, fillRatio: 0.1, seed: 1234 });
    const b = generateMaze({ width: 31, height: 15, fillRatio: 0.1, seed: 1234 });
    if (!a.success || !b.success) throw new Error("generation failed");
    expect(a.value.maze.getRawDataCopy()).toEqual(b.value.maze.getRawDataCopy());
    expect(a.value.artifacts).toEqual(b.value.artifacts);
  });

  it("rejects malformed input", () => {
    const result = generateMaze({ width: "wide" });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe("CONFIG_INVALID");

    const badSeed = generateMaze({ seed: -1 });
    expect(badSeed.success).toBe(false);
  });

  it("traces every pass in order", () => {
    const trace = createTraceCollector(true);
    const result = generateMaze({ width: 15, height: 11, fillRatio: 0.1, seed: 3 }, { trace });
    expect(result.success).toBe(true);

    const started = trace
      .getEvents()
      .filter((event) => event.eventType === "start")
      .map((event) => event.passId);
    expect(started).toEqual([
      "carving.center-room",
      "carving.exit",
      "carving.backtracker",
      "carving.exit-connect",
      "carving.loops",
      "content.artifacts",
    ]);
  });
});
