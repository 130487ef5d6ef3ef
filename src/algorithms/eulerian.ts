import type { Graph, VertexId } from "../graph/model.js";

export interface EulerianClassification {
  readonly eulerian: boolean;
  readonly semiEulerian: boolean;
  /** Vertices with an odd neighbor-list length, in insertion order. */
  readonly oddVertices: VertexId[];
}

/**
 * Classifies the graph from the parity of every vertex's neighbor-list length:
 * no odd vertex means an Eulerian circuit, exactly two means an Eulerian path.
 *
 * The check uses the undirected criterion whatever the graph's directedness
 * and does not look at connectivity, so disjoint Eulerian components still
 * report `eulerian: true`.
 */
export function isEulerian(graph: Graph): EulerianClassification {
  const oddVertices = graph
    .listVertices()
    .filter((vertex) => graph.adjacentVertices(vertex).length % 2 !== 0);

  return {
    eulerian: oddVertices.length === 0,
    semiEulerian: oddVertices.length === 2,
    oddVertices,
  };
}
