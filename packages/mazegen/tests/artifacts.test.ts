/**
 * Artifact placement unit tests
 */

import { SeededRandom } from "@labyrinth/contracts";
import { describe, expect, it } from "vitest";
import {
  CellLabel,
  DefaultTraceCollector,
  isArtifact,
  isDanger,
  isReward,
  Maze,
  type MazeState,
  passes,
  runPass,
  validateMaze,
} from "../src";
import { countAdjacentPairs, gridFromAscii, layoutAt } from "./helpers";

function generated(seed: number): Maze {
  const maze = new Maze(31, 19, 3, "right");
  maze.generate(new SeededRandom(seed));
  return maze;
}

describe("artifactQuota", () => {
  it("gives rewards 40% of the target, rounded down", () => {
    expect(passes.artifactQuota(100, 0.1)).toEqual({ requested: 10, rewards: 4, dangers: 6 });
    expect(passes.artifactQuota(7, 0.5)).toEqual({ requested: 3, rewards: 1, dangers: 2 });
    expect(passes.artifactQuota(1, 1)).toEqual({ requested: 1, rewards: 0, dangers: 1 });
  });

  it("clamps the ratio to [0, 1]", () => {
    expect(passes.artifactQuota(10, 2)).toEqual({ requested: 10, rewards: 4, dangers: 6 });
    expect(passes.artifactQuota(10, -1)).toEqual({ requested: 0, rewards: 0, dangers: 0 });
    expect(passes.artifactQuota(10, Number.NaN)).toEqual({
      requested: 0,
      rewards: 0,
      dangers: 0,
    });
  });
});

describe("placeArtifacts", () => {
  it("leaves the maze untouched at a zero ratio", () => {
    const maze = generated(11);
    const before = maze.getRawDataCopy();
    const summary = maze.placeArtifacts(0, new SeededRandom(1));

    expect(summary).toEqual({ requested: 0, rewards: 0, dangers: 0, placements: [] });
    expect(maze.getRawDataCopy()).toEqual(before);
  });

  it("keeps artifacts apart and out of the room", () => {
    for (const seed of [1, 2, 3]) {
      const maze = generated(seed);
      const summary = maze.placeArtifacts(1, new SeededRandom(seed));

      expect(countAdjacentPairs(maze, isArtifact)).toBe(0);
      const room = maze.getRoomBounds();
      for (let y = room.minY; y <= room.maxY; y++) {
        for (let x = room.minX; x <= room.maxX; x++) {
          expect(maze.get(x, y)).toBe(CellLabel.PATH);
        }
      }
      expect(summary.placements).toHaveLength(summary.rewards + summary.dangers);
      expect(summary.rewards).toBeLessThanOrEqual(
        passes.artifactQuota(summary.requested, 1).rewards,
      );
    }
  });

  it("writes every placement into the grid with a label of its family", () => {
    const maze = generated(21);
    const summary = maze.placeArtifacts(0.1, new SeededRandom(22));

    let rewards = 0;
    let dangers = 0;
    maze.forEach((_x, _y, label) => {
      if (isReward(label)) rewards++;
      if (isDanger(label)) dangers++;
    });
    expect(rewards).toBe(summary.rewards);
    expect(dangers).toBe(summary.dangers);

    summary.placements.slice(0, summary.rewards).forEach((placement) => {
      expect(isReward(placement.label)).toBe(true);
      expect(maze.get(placement.position.x, placement.position.y)).toBe(placement.label);
    });
    summary.placements.slice(summary.rewards).forEach((placement) => {
      expect(isDanger(placement.label)).toBe(true);
      expect(maze.get(placement.position.x, placement.position.y)).toBe(placement.label);
    });
  });

  it("fills rewards before dangers and warns when the corridor runs out", () => {
    // Seven corridor cells; the center (4,1) is the room.
    const state: MazeState = {
      grid: gridFromAscii(["#########", "#.......#", "#########"]),
      layout: layoutAt({ x: 4, y: 1 }, 1),
    };
    const trace = new DefaultTraceCollector(true);
    const summary = runPass(passes.placeArtifactsPass(1), state, {
      rng: new SeededRandom(9),
      trace,
    });

    expect(summary.requested).toBe(7);
    expect(summary.rewards).toBe(2);
    expect(summary.rewards + summary.dangers).toBeLessThanOrEqual(4);
    expect(state.grid.get(4, 1)).toBe(CellLabel.PATH);
    expect(countAdjacentPairs(state.grid, isArtifact)).toBe(0);
    expect(trace.getEvents().map((e) => e.eventType)).toEqual([
      "start",
      "decision",
      "warning",
      "end",
    ]);
  });

  it("keeps clear of artifacts placed by an earlier call", () => {
    for (const seed of [1, 2, 3, 4]) {
      const maze = generated(seed);
      maze.placeArtifacts(0.3, new SeededRandom(seed));
      maze.placeArtifacts(0.3, new SeededRandom(seed + 50));

      expect(countAdjacentPairs(maze, isArtifact)).toBe(0);
      expect(validateMaze(maze).success).toBe(true);
    }
  });

  it("skips corridor cells next to an existing artifact", () => {
    // (1,1) is the room; the zombie at (3,1) blocks (2,1) and (4,1).
    const state: MazeState = {
      grid: gridFromAscii(["#######", "#..z..#", "#######"]),
      layout: layoutAt({ x: 1, y: 1 }, 1),
    };
    const summary = runPass(passes.placeArtifactsPass(1), state, {
      rng: new SeededRandom(4),
      trace: new DefaultTraceCollector(),
    });

    expect(summary.requested).toBe(4);
    expect(summary.rewards).toBe(1);
    expect(summary.dangers).toBe(0);
    expect(summary.placements.map((placement) => placement.position)).toEqual([
      { x: 5, y: 1 },
    ]);
    expect(state.grid.get(2, 1)).toBe(CellLabel.PATH);
    expect(state.grid.get(4, 1)).toBe(CellLabel.PATH);
  });

  it("repeats for the same seed", () => {
    const a = generated(5);
    const b = generated(5);
    a.placeArtifacts(0.2, new SeededRandom(6));
    b.placeArtifacts(0.2, new SeededRandom(6));
    expect(a.getRawDataCopy()).toEqual(b.getRawDataCopy());
  });
});
