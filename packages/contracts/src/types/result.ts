/**
 * Result type for explicit, type-safe error handling.
 *
 * A plain discriminated union so callers narrow on `success`:
 *
 * @example
 * ```typescript
 * const result = buildMazeConfig({ width: 40 });
 * if (!result.success) {
 *   console.warn(result.error.message);
 * } else {
 *   const maze = createMaze(result.value);
 * }
 * ```
 */
export interface OkResult<T> {
  readonly success: true;
  readonly value: T;
}

export interface ErrResult<E> {
  readonly success: false;
  readonly error: E;
}

export type Result<T, E> = OkResult<T> | ErrResult<E>;

export function Ok<T>(value: T): OkResult<T> {
  return { success: true, value };
}

export function Err<E>(error: E): ErrResult<E> {
  return { success: false, error };
}

/**
 * Run a function that might throw and capture the outcome.
 */
export function fromThrowable<T, E>(
  fn: () => T,
  onError: (e: unknown) => E,
): Result<T, E> {
  try {
    return Ok(fn());
  } catch (e) {
    return Err(onError(e));
  }
}

export function mapResult<T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => U,
): Result<U, E> {
  return result.success ? Ok(fn(result.value)) : result;
}

export function flatMapResult<T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => Result<U, E>,
): Result<U, E> {
  return result.success ? fn(result.value) : result;
}

export function getOrElse<T, E>(result: Result<T, E>, fallback: T): T {
  return result.success ? result.value : fallback;
}

/**
 * Unwrap a Result, throwing the error when it failed.
 */
export function getOrThrow<T, E>(result: Result<T, E>): T {
  if (result.success) return result.value;
  throw result.error;
}

export type ResultOk<R> = R extends Result<infer T, unknown> ? T : never;
export type ResultErr<R> = R extends Result<unknown, infer E> ? E : never;
