export { runPass } from "./run-pass";
export {
  createTraceCollector,
  DefaultTraceCollector,
  NoOpTraceCollector,
} from "./trace";
export type {
  DecisionEvent,
  MazePass,
  MazeState,
  PassContext,
  TraceCollector,
  TraceEvent,
  TraceEventType,
} from "./types";
