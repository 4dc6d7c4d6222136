import {
  compareEdges,
  type GraphEdge,
  type MazeGraph,
  type SpanningTree,
  START_NODE_ID,
} from "./types";

/**
 * Minimum spanning tree by Prim's algorithm, grown from the start node.
 *
 * Each round scans every edge for the lightest one with exactly one endpoint
 * in the tree; ties go to the first edge in `(startId, endId)` order. A
 * disconnected graph yields the tree of the start node's component. The
 * result keeps every node of the input graph.
 */
export function primSpanningTree(graph: MazeGraph): SpanningTree {
  const start = graph.nodes.get(START_NODE_ID);
  if (!start) return { nodes: graph.nodes, edges: [], totalWeight: 0 };

  const edges = [...graph.edges].sort(compareEdges);
  const inTree = new Set<number>([start.id]);

  const treeEdges: GraphEdge[] = [];
  let totalWeight = 0;

  while (inTree.size < graph.nodes.size) {
    let best: GraphEdge | undefined;
    for (const edge of edges) {
      if (inTree.has(edge.startId) === inTree.has(edge.endId)) continue;
      if (!best || edge.weight < best.weight) best = edge;
    }
    if (!best) break;

    treeEdges.push(best);
    totalWeight += best.weight;
    inTree.add(best.startId);
    inTree.add(best.endId);
  }

  return { nodes: graph.nodes, edges: treeEdges, totalWeight };
}
