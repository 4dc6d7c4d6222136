/**
 * Maze facade: owns the grid and exposes generation, artifact placement
 * and the structural queries.
 */

import {
  buildMazeConfig,
  clampRoomSize,
  createRandom,
  DEFAULT_MAZE_CONFIG,
  Err,
  type ExitSide,
  type ExitSideOption,
  flatMapResult,
  MazeError,
  type MazeConfig,
  normalizeDimension,
  Ok,
  type Result,
  type SeededRandom,
} from "@labyrinth/contracts";
import type { Bounds, Dimensions, Point } from "./core/geometry/types";
import {
  buildGraph,
  findExit,
  type MazeGraph,
  primSpanningTree,
  type SpanningTree,
} from "./core/graph";
import {
  CellLabel,
  Grid,
  isTraversable,
  type MazeLayout,
  type ReadonlyGrid,
} from "./core/grid";
import { type RouteSearchOptions, routeSearch } from "./core/pathfinding";
import {
  type ArtifactSummary,
  carveCenterRoom,
  carvePassages,
  connectExit,
  injectLoops,
  placeArtifactsPass,
  placeExit,
} from "./passes";
import { runPass } from "./pipeline/run-pass";
import { NoOpTraceCollector } from "./pipeline/trace";
import type { MazeState, PassContext, TraceCollector } from "./pipeline/types";

export interface MazeOptions {
  /** Receives pass timings and decisions. Default: no-op */
  readonly trace?: TraceCollector;
}

export interface GenerationReport {
  readonly seed: number;
  readonly exitSide: ExitSide;
  readonly exit: Point;
  /** Lattice cells reached by the backtracker */
  readonly latticeCells: number;
  /** Walls opened between the exit and the maze */
  readonly exitCellsOpened: number;
  readonly wallsRemoved: number;
}

/**
 * Square room of side `2 * floor(roomSize / 2) + 1` around the center.
 */
export function roomBounds(center: Point, roomSize: number): Bounds {
  const half = Math.floor(roomSize / 2);
  return {
    minX: center.x - half,
    minY: center.y - half,
    maxX: center.x + half,
    maxY: center.y + half,
  };
}

/**
 * A rectangular maze around a central room with one exit on the border.
 *
 * Width and height are rounded up to `7 + 4k`, and the room is shrunk to fit
 * inside the outer wall. A new maze is all walls until `generate()` runs.
 *
 * @example
 * ```typescript
 * const maze = new Maze(21, 11, 3, "right");
 * maze.generate(new SeededRandom(42));
 * maze.placeArtifacts(0.1);
 * const route = maze.routeSearch();
 * ```
 */
export class Maze implements ReadonlyGrid {
  readonly width: number;
  readonly height: number;
  readonly roomSize: number;
  readonly exitSide: ExitSideOption;

  private readonly grid: Grid;
  private readonly layout: MazeLayout;
  private readonly trace: TraceCollector;
  private resolvedExitSide: ExitSide | undefined;

  constructor(
    width: number,
    height: number,
    roomSize: number = DEFAULT_MAZE_CONFIG.roomSize,
    exitSide: ExitSideOption = DEFAULT_MAZE_CONFIG.exitSide,
    options: MazeOptions = {},
  ) {
    this.width = normalizeDimension(width);
    this.height = normalizeDimension(height);
    this.roomSize = clampRoomSize(roomSize, this.width, this.height);
    this.exitSide = exitSide;
    this.trace = options.trace ?? new NoOpTraceCollector();

    const center = {
      x: Math.floor(this.width / 2),
      y: Math.floor(this.height / 2),
    };
    this.layout = { center, room: roomBounds(center, this.roomSize) };
    this.grid = new Grid(this.width, this.height);
    this.resolvedExitSide = exitSide === "random" ? undefined : exitSide;
  }

  private context(rng: SeededRandom): PassContext {
    return { rng, trace: this.trace };
  }

  private get state(): MazeState {
    return { grid: this.grid, layout: this.layout };
  }

  // ===========================================================================
  // GENERATION
  // ===========================================================================

  /**
   * Carve the maze: room, exit, backtracker, exit corridor, loops.
   *
   * Starts from an all-wall grid, so calling it again regenerates.
   */
  generate(rng: SeededRandom = createRandom()): GenerationReport {
    const ctx = this.context(rng);
    const state = this.state;

    this.grid.fill(CellLabel.WALL);
    runPass(carveCenterRoom(), state, ctx);
    const exit = runPass(placeExit(this.exitSide), state, ctx);
    const latticeCells = runPass(carvePassages(), state, ctx);
    const exitCellsOpened = runPass(connectExit(exit), state, ctx);
    const wallsRemoved = runPass(injectLoops(), state, ctx);

    this.resolvedExitSide = exit.side;

    return {
      seed: rng.seed,
      exitSide: exit.side,
      exit: exit.position,
      latticeCells,
      exitCellsOpened,
      wallsRemoved,
    };
  }

  /**
   * Turn a share of the corridor cells into rewards (40%) and dangers.
   * `fillRatio` is clamped to [0, 1].
   */
  placeArtifacts(
    fillRatio: number,
    rng: SeededRandom = createRandom(),
  ): ArtifactSummary {
    return runPass(placeArtifactsPass(fillRatio), this.state, this.context(rng));
  }

  // ===========================================================================
  // CELL ACCESS
  // ===========================================================================

  getSize(): Dimensions {
    return { width: this.width, height: this.height };
  }

  isInBounds(x: number, y: number): boolean {
    return this.grid.isInBounds(x, y);
  }

  /**
   * @throws MazeError `OUT_OF_BOUNDS` for coordinates outside the grid
   */
  get(x: number, y: number): CellLabel {
    return this.grid.get(x, y);
  }

  getUnsafe(x: number, y: number): CellLabel {
    return this.grid.getUnsafe(x, y);
  }

  /**
   * @throws MazeError `OUT_OF_BOUNDS` for coordinates outside the grid
   */
  set(x: number, y: number, label: CellLabel): void {
    this.grid.set(x, y, label);
  }

  isTraversable(x: number, y: number): boolean {
    return this.isInBounds(x, y) && isTraversable(this.grid.getUnsafe(x, y));
  }

  forEach(callback: (x: number, y: number, label: CellLabel) => void): void {
    this.grid.forEach(callback);
  }

  countLabel(label: CellLabel): number {
    return this.grid.countLabel(label);
  }

  getCenter(): Point {
    return this.layout.center;
  }

  getRoomBounds(): Bounds {
    return this.layout.room;
  }

  /**
   * Exit side of the last generation, or the configured side when it is
   * fixed. `undefined` for a `random` maze that has not been generated.
   */
  getExitSide(): ExitSide | undefined {
    return this.resolvedExitSide;
  }

  /**
   * Current position of the `EXIT` cell on the border, if any.
   */
  getExit(): Point | undefined {
    return findExit(this.grid);
  }

  clone(): Maze {
    const copy = new Maze(this.width, this.height, this.roomSize, this.exitSide, {
      trace: this.trace,
    });
    copy.grid.copyFrom(this.grid);
    copy.resolvedExitSide = this.resolvedExitSide;
    return copy;
  }

  getRawDataCopy(): Uint8Array {
    return this.grid.getRawDataCopy();
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  /**
   * Corridor graph of the current grid. Recomputed on every call.
   */
  buildGraph(): MazeGraph {
    return buildGraph(this.grid, this.layout.center);
  }

  /**
   * Route from the center to the exit, or `null` when there is none.
   */
  routeSearch(options: RouteSearchOptions = {}): Point[] | null {
    return routeSearch(this.grid, this.layout, options);
  }

  minimumSpanningTree(): SpanningTree {
    const tree = primSpanningTree(this.buildGraph());
    this.trace.decision(
      "graph.spanning-tree",
      "What does the lightest skeleton weigh?",
      [],
      tree.totalWeight,
      `${tree.edges.length} edges over ${tree.nodes.size} nodes`,
    );
    return tree;
  }
}

/**
 * Allocate an ungenerated maze from a validated config.
 */
export function createMaze(config: MazeConfig, options: MazeOptions = {}): Maze {
  return new Maze(
    config.width,
    config.height,
    config.roomSize,
    config.exitSide,
    options,
  );
}

export interface GeneratedMaze {
  readonly maze: Maze;
  readonly config: MazeConfig;
  readonly report: GenerationReport;
  readonly artifacts: ArtifactSummary | undefined;
}

/**
 * Validate `input`, generate, and place artifacts when `fillRatio > 0`.
 *
 * The same seed reproduces the same maze.
 */
export function generateMaze(
  input: unknown = {},
  options: MazeOptions = {},
): Result<GeneratedMaze, MazeError> {
  return flatMapResult(buildMazeConfig(input), (config) => {
    try {
      const maze = createMaze(config, options);
      const rng = createRandom(config.seed);
      const report = maze.generate(rng);
      const artifacts =
        config.fillRatio > 0 ? maze.placeArtifacts(config.fillRatio, rng) : undefined;
      return Ok({ maze, config, report, artifacts });
    } catch (error) {
      if (MazeError.isMazeError(error)) return Err(error);
      return Err(
        MazeError.generationFailed(
          error instanceof Error ? error.message : String(error),
        ),
      );
    }
  });
}
