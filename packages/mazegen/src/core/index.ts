export * from "./data-structures";
export * from "./geometry/types";
export * from "./graph";
export * from "./grid";
export * from "./pathfinding";
