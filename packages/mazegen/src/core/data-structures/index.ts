export { CoordSet, cellFromIndex, cellIndex } from "./coord-set";
export { WorkList } from "./work-list";
