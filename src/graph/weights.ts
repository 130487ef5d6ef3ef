import type { Graph, VertexId } from "./model.js";

/** Weight assumed for an edge whose (source, target) pair has no recorded entry. */
export const DEFAULT_EDGE_WEIGHT = 1;

/**
 * Composite key identifying the ordered pair (source, target) in the weight
 * table. Encoding the pair as a JSON array keeps identifiers containing
 * separators such as spaces or colons from colliding.
 */
export type EdgeKey = string;

export function edgeKey(source: VertexId, target: VertexId): EdgeKey {
  return JSON.stringify([source, target]);
}

/** Splits a key produced by {@link edgeKey} back into its endpoints. */
export function parseEdgeKey(key: EdgeKey): [VertexId, VertexId] {
  const parsed: unknown = JSON.parse(key);
  if (
    !Array.isArray(parsed) ||
    parsed.length !== 2 ||
    typeof parsed[0] !== "string" ||
    typeof parsed[1] !== "string"
  ) {
    throw new TypeError(`malformed edge key ${key}`);
  }
  return [parsed[0], parsed[1]];
}

/**
 * Weight used by the algorithm layer when traversing (source, target). Falls
 * back to {@link DEFAULT_EDGE_WEIGHT} when the weight table has no entry.
 */
export function weightOrDefault(graph: Graph, source: VertexId, target: VertexId): number {
  return graph.edgeWeight(source, target) ?? DEFAULT_EDGE_WEIGHT;
}
