import type { MazePass, MazeState, PassContext } from "./types";

/**
 * Run one pass between `start` and `end` trace events.
 */
export function runPass<TResult>(
  pass: MazePass<TResult>,
  state: MazeState,
  ctx: PassContext,
): TResult {
  ctx.trace.start(pass.id);
  const startedAt = performance.now();
  const result = pass.run(state, ctx);
  ctx.trace.end(pass.id, performance.now() - startedAt);
  return result;
}
