import { describe, it } from "mocha";
import { expect } from "chai";

import { dijkstra, shortestPath } from "../../src/algorithms/dijkstra.js";
import { MinHeap } from "../../src/algorithms/minHeap.js";
import { InvalidVertexError } from "../../src/graph/errors.js";
import { Graph } from "../../src/graph/model.js";

function buildTriangle(): Graph {
  const graph = new Graph();
  graph.addEdge("A", "B", 1);
  graph.addEdge("B", "C", 2);
  graph.addEdge("A", "C", 5);
  return graph;
}

describe("algorithms/minHeap", () => {
  it("pops entries by ascending priority", () => {
    const heap = new MinHeap();
    for (const [vertex, priority] of [
      ["d", 4],
      ["a", 1],
      ["e", 9],
      ["b", 2],
      ["c", 3],
      ["a", 7],
    ] as const) {
      heap.push({ vertex, priority });
    }

    expect(heap.size).to.equal(6);
    const popped: number[] = [];
    for (let entry = heap.pop(); entry !== undefined; entry = heap.pop()) {
      popped.push(entry.priority);
    }
    expect(popped).to.deep.equal([1, 2, 3, 4, 7, 9]);
    expect(heap.isEmpty()).to.equal(true);
    expect(heap.pop()).to.equal(undefined);
  });
});

describe("algorithms/dijkstra", () => {
  it("finds the cheaper two-hop route", () => {
    const result = shortestPath(buildTriangle(), "A", "C");
    expect(result).to.deep.equal({ reachable: true, cost: 3, path: ["A", "B", "C"] });
  });

  it("returns the single-vertex path for identical endpoints", () => {
    expect(shortestPath(buildTriangle(), "B", "B")).to.deep.equal({ reachable: true, cost: 0, path: ["B"] });
  });

  it("reports no path between disconnected components", () => {
    const graph = buildTriangle();
    graph.addEdge("X", "Y", 1);

    expect(shortestPath(graph, "A", "Y")).to.deep.equal({ reachable: false, cost: null, path: [] });
  });

  it("follows edge direction on directed graphs", () => {
    const graph = new Graph({ directed: true });
    graph.addEdge("A", "B", 1);
    graph.addEdge("B", "C", 1);

    expect(shortestPath(graph, "A", "C").reachable).to.equal(true);
    expect(shortestPath(graph, "C", "A").reachable).to.equal(false);
  });

  it("computes distances to every vertex with infinity for unreachable ones", () => {
    const graph = buildTriangle();
    graph.addVertex("island");

    const { distances, predecessors, settledOrder } = dijkstra(graph, "A");
    expect(Object.fromEntries(distances)).to.deep.equal({ A: 0, B: 1, C: 3, island: Number.POSITIVE_INFINITY });
    expect(Object.fromEntries(predecessors)).to.deep.equal({ A: null, B: "A", C: "B", island: null });
    expect(settledOrder).to.deep.equal(["A", "B", "C"]);
  });

  it("accepts zero-weight edges", () => {
    const graph = new Graph();
    graph.addEdge("A", "B", 0);
    graph.addEdge("B", "C", 0);
    graph.addEdge("A", "C", 1);

    expect(shortestPath(graph, "A", "C")).to.deep.equal({ reachable: true, cost: 0, path: ["A", "B", "C"] });
  });

  it("prefers the cheaper of parallel routes through intermediate vertices", () => {
    const graph = new Graph();
    graph.addEdge("S", "A", 4);
    graph.addEdge("S", "B", 1);
    graph.addEdge("B", "A", 2);
    graph.addEdge("A", "T", 1);
    graph.addEdge("B", "T", 6);

    expect(shortestPath(graph, "S", "T")).to.deep.equal({ reachable: true, cost: 4, path: ["S", "B", "A", "T"] });
  });

  it("rejects unknown start and end vertices", () => {
    const graph = buildTriangle();

    expect(() => dijkstra(graph, "Z")).to.throw(InvalidVertexError, "unknown start vertex 'Z'");
    expect(() => shortestPath(graph, "A", "Z")).to.throw(InvalidVertexError, "unknown end vertex 'Z'");

    try {
      shortestPath(graph, "Q", "A");
      expect.fail("expected an InvalidVertexError");
    } catch (error) {
      expect(error).to.be.instanceOf(InvalidVertexError);
      if (error instanceof InvalidVertexError) {
        expect(error.code).to.equal("E-GRAPH-VERTEX");
        expect(error.details).to.deep.equal({ vertex: "Q", role: "start" });
      }
    }
  });
});
