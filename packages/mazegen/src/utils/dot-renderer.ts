/**
 * Graphviz DOT export of the corridor graph.
 */

import type { GraphNode, MazeGraph } from "../core/graph";

export interface DOTOptions {
  /** Graph name (default: "Maze") */
  readonly name?: string;
}

function nodeAttributes(node: GraphNode): string {
  switch (node.kind) {
    case "start":
      return `color=green, shape=circle, label="Start"`;
    case "exit":
      return `color=red, shape=box, label="Exit"`;
    case "dead-end":
      return `label="Dead End"`;
    case "junction":
      return `label="Junction"`;
    case "isolated":
      return `label="Isolated"`;
  }
}

/**
 * Render a maze graph (or spanning tree) as an undirected DOT graph.
 *
 * Edge weights become both the label and the layout length.
 */
export function renderDOT(graph: MazeGraph, options: DOTOptions = {}): string {
  const { name = "Maze" } = options;
  const lines = [
    `graph ${name} {`,
    "    node [shape=point];",
    "    edge [len=1.0];",
  ];

  const nodes = [...graph.nodes.values()].sort((a, b) => a.id - b.id);
  for (const node of nodes) {
    lines.push(`    n${node.id} [${nodeAttributes(node)}];`);
  }

  for (const edge of graph.edges) {
    lines.push(
      `    n${edge.startId} -- n${edge.endId} [len=${edge.weight.toFixed(1)}, label="${edge.weight}"];`,
    );
  }

  lines.push("}");
  return lines.join("\n");
}
