import {
  MAZE_DIMENSION_STEP,
  MIN_MAZE_DIMENSION,
  type MazeConfig,
  MazeConfigInputSchema,
  MazeConfigSchema,
} from "../schemas/maze";
import { MazeError } from "../types/error";
import { Err, Ok, type Result } from "../types/result";

export const DEFAULT_MAZE_CONFIG = {
  width: 63,
  height: 31,
  roomSize: 3,
  exitSide: "right",
  fillRatio: 0,
} as const satisfies MazeConfig;

/**
 * Round a side length up to the nearest valid maze dimension
 * (at least 7, and 7 plus a multiple of 4).
 */
export function normalizeDimension(dim: number): number {
  const whole = Math.ceil(dim);
  if (!(whole > MIN_MAZE_DIMENSION)) return MIN_MAZE_DIMENSION;
  const remainder = (whole - MIN_MAZE_DIMENSION) % MAZE_DIMENSION_STEP;
  return remainder === 0 ? whole : whole + (MAZE_DIMENSION_STEP - remainder);
}

/**
 * Shrink the room so it stays inside the outer wall ring. NaN falls back
 * to a single cell.
 */
export function clampRoomSize(
  roomSize: number,
  width: number,
  height: number,
): number {
  if (Number.isNaN(roomSize)) return 1;
  const size = Math.max(1, Math.floor(roomSize));
  const maxHalf = Math.min(Math.floor(width / 2), Math.floor(height / 2)) - 1;
  return Math.floor(size / 2) > maxHalf ? maxHalf * 2 + 1 : size;
}

export function clampFillRatio(ratio: number): number {
  if (Number.isNaN(ratio)) return 0;
  return Math.min(1, Math.max(0, ratio));
}

/**
 * Apply defaults, normalize out-of-range values and validate.
 *
 * Dimensions are rounded up rather than rejected; only input that is not
 * numeric (or a malformed seed/exit side) fails.
 */
export function buildMazeConfig(
  input: unknown = {},
): Result<MazeConfig, MazeError> {
  const parsedInput = MazeConfigInputSchema.safeParse(input);
  if (!parsedInput.success) {
    return Err(
      MazeError.configInvalid("Invalid maze configuration input", {
        issues: parsedInput.error.issues.map((issue) => ({
          path: issue.path.map(String).join("."),
          message: issue.message,
        })),
      }),
    );
  }

  const raw = parsedInput.data;
  const width = normalizeDimension(raw.width ?? DEFAULT_MAZE_CONFIG.width);
  const height = normalizeDimension(raw.height ?? DEFAULT_MAZE_CONFIG.height);

  const candidate: MazeConfig = {
    width,
    height,
    roomSize: clampRoomSize(
      raw.roomSize ?? DEFAULT_MAZE_CONFIG.roomSize,
      width,
      height,
    ),
    exitSide: raw.exitSide ?? DEFAULT_MAZE_CONFIG.exitSide,
    fillRatio: clampFillRatio(raw.fillRatio ?? DEFAULT_MAZE_CONFIG.fillRatio),
    seed: raw.seed,
  };

  const parsed = MazeConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    return Err(
      MazeError.configInvalid("Maze configuration failed validation", {
        issues: parsed.error.issues.map((issue) => ({
          path: issue.path.map(String).join("."),
          message: issue.message,
        })),
      }),
    );
  }
  return Ok(parsed.data);
}
