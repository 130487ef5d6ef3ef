import type { Graph, VertexId, WeightedEdge } from "./model.js";

/** JSON-safe view of a graph used by the CLI's JSON output. */
export interface GraphSnapshot {
  readonly directed: boolean;
  readonly order: number;
  readonly size: number;
  readonly adjacency: Record<VertexId, VertexId[]>;
  readonly edges: WeightedEdge[];
}

/**
 * Renders one line per vertex, in insertion order, listing each neighbor with
 * the weight recorded for that direction (`N/A` when the table has no entry).
 */
export function renderAdjacency(graph: Graph): string {
  let output = "";
  for (const vertex of graph.listVertices()) {
    const entries = graph.adjacentVertices(vertex).map((neighbor) => {
      const weight = graph.edgeWeight(vertex, neighbor);
      return `${neighbor} (Weight: ${weight === undefined ? "N/A" : weight})`;
    });
    output += `${vertex}: ${entries.join(", ")}\n`;
  }
  return output;
}

export function snapshotGraph(graph: Graph): GraphSnapshot {
  const adjacency: Record<VertexId, VertexId[]> = {};
  for (const vertex of graph.listVertices()) {
    adjacency[vertex] = [...graph.adjacentVertices(vertex)];
  }
  return {
    directed: graph.directed,
    order: graph.order(),
    size: graph.size(),
    adjacency,
    edges: graph.listWeightedEdges(),
  };
}
