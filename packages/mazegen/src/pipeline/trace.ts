/**
 * Trace collector implementation for debugging and observability.
 */

import type { TraceCollector, TraceEvent, TraceEventType } from "./types";

/**
 * Default trace collector implementation
 */
export class DefaultTraceCollector implements TraceCollector {
  readonly enabled: boolean;
  private readonly events: TraceEvent[] = [];
  private readonly startTime: number;

  constructor(enabled: boolean = false) {
    this.enabled = enabled;
    this.startTime = performance.now();
  }

  private emit(passId: string, eventType: TraceEventType, data?: unknown): void {
    if (!this.enabled) return;

    this.events.push({
      timestamp: performance.now() - this.startTime,
      passId,
      eventType,
      data,
    });
  }

  start(passId: string): void {
    this.emit(passId, "start");
  }

  end(passId: string, durationMs: number): void {
    this.emit(passId, "end", { durationMs });
  }

  decision(
    passId: string,
    question: string,
    options: readonly unknown[],
    chosen: unknown,
    reason: string,
  ): void {
    this.emit(passId, "decision", { question, options, chosen, reason });
  }

  warning(passId: string, message: string): void {
    this.emit(passId, "warning", { message });
  }

  getEvents(): readonly TraceEvent[] {
    return this.events;
  }

  clear(): void {
    this.events.length = 0;
  }
}

/**
 * No-op trace collector for production
 */
export class NoOpTraceCollector implements TraceCollector {
  readonly enabled = false;

  start(_passId: string): void {}
  end(_passId: string, _durationMs: number): void {}
  decision(
    _passId: string,
    _question: string,
    _options: readonly unknown[],
    _chosen: unknown,
    _reason: string,
  ): void {}
  warning(_passId: string, _message: string): void {}
  getEvents(): readonly TraceEvent[] {
    return [];
  }
  clear(): void {}
}

export function createTraceCollector(enabled: boolean): TraceCollector {
  return enabled ? new DefaultTraceCollector(true) : new NoOpTraceCollector();
}
