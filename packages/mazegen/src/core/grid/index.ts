export * from "./cell-label";
export { Grid } from "./grid";
export type { MazeLayout, MutableGrid, ReadonlyGrid } from "./types";
