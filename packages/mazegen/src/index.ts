/**
 * Mazegen - Procedural Maze Package
 *
 * Carves a maze around a central room, scatters weighted rewards and
 * dangers, and answers route and spanning-tree queries over it.
 *
 * @example
 * ```typescript
 * import { generateMaze } from "@labyrinth/mazegen";
 *
 * const result = generateMaze({ width: 41, height: 21, fillRatio: 0.07, seed: 12345 });
 * if (result.success) {
 *   const { maze } = result.value;
 *   console.log(maze.routeSearch()?.length, maze.minimumSpanningTree().totalWeight);
 * }
 * ```
 */

// Core modules
export * from "./core";
// Maze facade
export {
  createMaze,
  type GeneratedMaze,
  type GenerationReport,
  generateMaze,
  Maze,
  type MazeOptions,
  roomBounds,
} from "./maze";
// Pass Library
export * as passes from "./passes";
// Pipeline
export * from "./pipeline";
// Utilities
export * from "./utils";
// Validation
export * from "./validation";
