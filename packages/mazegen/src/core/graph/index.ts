export { buildGraph, exitNode, findExit, startNode } from "./graph-builder";
export { primSpanningTree } from "./spanning-tree";
export {
  compareEdges,
  EXIT_NODE_ID,
  edgeKey,
  type GraphEdge,
  type GraphNode,
  type MazeGraph,
  type NodeKind,
  type SpanningTree,
  START_NODE_ID,
} from "./types";
