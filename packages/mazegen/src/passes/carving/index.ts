export { type CarveStep, carveCandidates, carvePassages } from "./backtracker";
export { carveCenterRoom } from "./center-room";
export {
  connectExit,
  type ExitPlacement,
  exitPosition,
  inwardStep,
  placeExit,
} from "./exit";
export { findLoopCandidates, injectLoops, loopRemovalCount } from "./loop-injector";
