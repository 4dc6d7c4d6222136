/**
 * Error codes for maze operations.
 */
export type MazeErrorCode =
  | "CONFIG_INVALID"
  | "OUT_OF_BOUNDS"
  | "GENERATION_FAILED";

/**
 * Unified error type for maze configuration and grid access.
 *
 * @example
 * ```typescript
 * throw MazeError.outOfBounds(12, 3, { width: 11, height: 11 });
 * ```
 */
export class MazeError extends Error {
  readonly name = "MazeError";

  constructor(
    public readonly code: MazeErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MazeError);
    }
  }

  static configInvalid(
    message: string,
    details?: Record<string, unknown>,
  ): MazeError {
    return new MazeError("CONFIG_INVALID", message, details);
  }

  static outOfBounds(
    x: number,
    y: number,
    size: { readonly width: number; readonly height: number },
  ): MazeError {
    return new MazeError(
      "OUT_OF_BOUNDS",
      `Cell (${x}, ${y}) is outside the ${size.width}x${size.height} grid`,
      { x, y, width: size.width, height: size.height },
    );
  }

  static generationFailed(
    message: string,
    details?: Record<string, unknown>,
  ): MazeError {
    return new MazeError("GENERATION_FAILED", message, details);
  }

  static isMazeError(error: unknown): error is MazeError {
    return error instanceof MazeError;
  }

  toJSON(): {
    name: string;
    code: MazeErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}
