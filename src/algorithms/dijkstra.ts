import { InvalidVertexError } from "../graph/errors.js";
import type { Graph, VertexId } from "../graph/model.js";
import { weightOrDefault } from "../graph/weights.js";
import { MinHeap } from "./minHeap.js";

export interface DijkstraResult {
  /** Best distance from the start; `Infinity` for unreachable vertices. */
  readonly distances: Map<VertexId, number>;
  readonly predecessors: Map<VertexId, VertexId | null>;
  /** Vertices in the order their distance was finalised. */
  readonly settledOrder: VertexId[];
}

export type ShortestPathResult =
  | { readonly reachable: true; readonly cost: number; readonly path: VertexId[] }
  | { readonly reachable: false; readonly cost: null; readonly path: [] };

/**
 * Single-source shortest distances over non-negative weights. Missing weight
 * entries cost {@link weightOrDefault}'s fallback. Stale heap entries for an
 * already settled vertex are skipped.
 */
export function dijkstra(graph: Graph, start: VertexId): DijkstraResult {
  if (!graph.hasVertex(start)) {
    throw new InvalidVertexError(start, "start");
  }

  const distances = new Map<VertexId, number>();
  const predecessors = new Map<VertexId, VertexId | null>();
  const settled = new Set<VertexId>();
  const settledOrder: VertexId[] = [];

  for (const vertex of graph.listVertices()) {
    distances.set(vertex, Number.POSITIVE_INFINITY);
    predecessors.set(vertex, null);
  }
  distances.set(start, 0);

  const queue = new MinHeap();
  queue.push({ vertex: start, priority: 0 });

  for (let current = queue.pop(); current !== undefined; current = queue.pop()) {
    if (settled.has(current.vertex)) {
      continue;
    }
    settled.add(current.vertex);
    settledOrder.push(current.vertex);

    for (const neighbor of graph.adjacentVertices(current.vertex)) {
      const candidate = current.priority + weightOrDefault(graph, current.vertex, neighbor);
      if (candidate < (distances.get(neighbor) ?? Number.POSITIVE_INFINITY)) {
        distances.set(neighbor, candidate);
        predecessors.set(neighbor, current.vertex);
        queue.push({ vertex: neighbor, priority: candidate });
      }
    }
  }

  return { distances, predecessors, settledOrder };
}

/**
 * Runs {@link dijkstra} from `start` and walks the predecessor chain back
 * from `end`. A start equal to the end yields the single-vertex path.
 */
export function shortestPath(graph: Graph, start: VertexId, end: VertexId): ShortestPathResult {
  if (!graph.hasVertex(start)) {
    throw new InvalidVertexError(start, "start");
  }
  if (!graph.hasVertex(end)) {
    throw new InvalidVertexError(end, "end");
  }
  const { distances, predecessors } = dijkstra(graph, start);

  const cost = distances.get(end) ?? Number.POSITIVE_INFINITY;
  if (!Number.isFinite(cost)) {
    return { reachable: false, cost: null, path: [] };
  }

  const path: VertexId[] = [end];
  let current = predecessors.get(end) ?? null;
  while (current !== null) {
    path.unshift(current);
    current = predecessors.get(current) ?? null;
  }
  return { reachable: true, cost, path };
}
