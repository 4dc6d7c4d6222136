/**
 * Pass & Trace Types
 *
 * Generation runs as a sequence of named passes over a grid; each pass
 * reports what it did to a trace collector.
 */

import type { SeededRandom } from "@labyrinth/contracts";
import type { Grid, MazeLayout } from "../core/grid";

// =============================================================================
// TRACE TYPES
// =============================================================================

export type TraceEventType = "start" | "end" | "decision" | "warning";

export interface TraceEvent {
  readonly timestamp: number;
  readonly passId: string;
  readonly eventType: TraceEventType;
  readonly data?: unknown;
}

/**
 * Decision event for "explain why" debugging
 */
export interface DecisionEvent extends TraceEvent {
  readonly eventType: "decision";
  readonly data: {
    readonly question: string;
    readonly options: readonly unknown[];
    readonly chosen: unknown;
    readonly reason: string;
  };
}

export interface TraceCollector {
  readonly enabled: boolean;
  start(passId: string): void;
  end(passId: string, durationMs: number): void;
  decision(
    passId: string,
    question: string,
    options: readonly unknown[],
    chosen: unknown,
    reason: string,
  ): void;
  warning(passId: string, message: string): void;
  getEvents(): readonly TraceEvent[];
  clear(): void;
}

// =============================================================================
// PASSES
// =============================================================================

/**
 * Runtime context available to passes.
 */
export interface PassContext {
  readonly rng: SeededRandom;
  readonly trace: TraceCollector;
}

/**
 * Grid under construction together with its fixed layout.
 */
export interface MazeState {
  readonly grid: Grid;
  readonly layout: MazeLayout;
}

/**
 * A pass mutates the maze state and reports a summary of its work.
 *
 * @example
 * ```typescript
 * function fillRoom(): MazePass<number> {
 *   return {
 *     id: "fill-room",
 *     run(state, ctx) {
 *       // ...
 *     },
 *   };
 * }
 * ```
 */
export interface MazePass<TResult = void> {
  readonly id: string;
  run(state: MazeState, ctx: PassContext): TResult;
}
