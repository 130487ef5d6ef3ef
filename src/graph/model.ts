import { DEFAULT_EDGE_WEIGHT, edgeKey, parseEdgeKey, type EdgeKey } from "./weights.js";

/** Opaque label naming a vertex. */
export type VertexId = string;

/** In/out split reported for vertices of a directed graph. */
export interface DirectedDegree {
  readonly inDegree: number;
  readonly outDegree: number;
}

/** Degree shape depends on the directedness of the graph at query time. */
export type VertexDegree = number | DirectedDegree;

/** Weighted (source, target) entry stored in the weight table. */
export interface WeightedEdge {
  readonly source: VertexId;
  readonly target: VertexId;
  readonly weight: number;
}

export interface GraphOptions {
  readonly directed?: boolean;
}

/**
 * Mutable adjacency-list graph. Vertices are created on first reference and
 * never removed. Undirected insertions write both directions as a pair while
 * directed insertions only write the requested one.
 */
export class Graph {
  private isDirected: boolean;
  private readonly adjacency = new Map<VertexId, VertexId[]>();
  private readonly weights = new Map<EdgeKey, number>();

  constructor(options: GraphOptions = {}) {
    this.isDirected = options.directed ?? false;
  }

  get directed(): boolean {
    return this.isDirected;
  }

  /**
   * Switches the directedness flag. Existing edges are kept as stored: an
   * undirected graph turned directed still holds both directions of every
   * edge, and a directed graph turned undirected is not symmetrised.
   */
  setDirected(directed: boolean): void {
    this.isDirected = directed;
  }

  addVertex(id: VertexId): void {
    if (!this.adjacency.has(id)) {
      this.adjacency.set(id, []);
    }
  }

  addEdge(source: VertexId, target: VertexId, weight: number = DEFAULT_EDGE_WEIGHT): void {
    this.appendNeighbor(source, target, weight);
    if (!this.isDirected) {
      this.appendNeighbor(target, source, weight);
    }
  }

  hasVertex(id: VertexId): boolean {
    return this.adjacency.has(id);
  }

  listVertices(): VertexId[] {
    return Array.from(this.adjacency.keys());
  }

  /** Recorded weight for the ordered pair, or `undefined` when none exists. */
  edgeWeight(source: VertexId, target: VertexId): number | undefined {
    return this.weights.get(edgeKey(source, target));
  }

  /** Weight table entries in insertion order of their first write. */
  listWeightedEdges(): WeightedEdge[] {
    const edges: WeightedEdge[] = [];
    for (const [key, weight] of this.weights) {
      const [source, target] = parseEdgeKey(key);
      edges.push({ source, target, weight });
    }
    return edges;
  }

  order(): number {
    return this.adjacency.size;
  }

  size(): number {
    let endpoints = 0;
    for (const neighbors of this.adjacency.values()) {
      endpoints += neighbors.length;
    }
    return this.isDirected ? endpoints : Math.floor(endpoints / 2);
  }

  adjacentVertices(id: VertexId): readonly VertexId[] {
    return this.adjacency.get(id) ?? [];
  }

  degree(id: VertexId): VertexDegree {
    const outDegree = this.adjacentVertices(id).length;
    if (!this.isDirected) {
      return outDegree;
    }
    let inDegree = 0;
    for (const neighbors of this.adjacency.values()) {
      if (neighbors.includes(id)) {
        inDegree += 1;
      }
    }
    return { inDegree, outDegree };
  }

  /** Directional membership check: is `second` in the neighbor list of `first`? */
  areAdjacent(first: VertexId, second: VertexId): boolean {
    return this.adjacentVertices(first).includes(second);
  }

  private appendNeighbor(source: VertexId, target: VertexId, weight: number): void {
    this.addVertex(source);
    this.addVertex(target);
    const neighbors = this.adjacency.get(source) ?? [];
    neighbors.push(target);
    this.adjacency.set(source, neighbors);
    this.weights.set(edgeKey(source, target), weight);
  }
}
