/**
 * Graph Tests
 */

import { describe, expect, it } from "vitest";
import { Edge, Graph, Vertex } from "../src/core/graph";
import { thrownCode } from "./helpers";

describe("Vertex", () => {
  it("keeps identity distinct for equal elements", () => {
    const graph = new Graph<string, number>();
    const first = graph.addVertex("A");
    const second = graph.addVertex("A");

    expect(first).not.toBe(second);
    expect(graph.numVertices()).toBe(2);
  });

  it("orders by element for display", () => {
    expect(new Vertex(2).compareTo(new Vertex(10))).toBeLessThan(0);
    expect(new Vertex("b").compareTo(new Vertex("a"))).toBeGreaterThan(0);
    expect(new Vertex(3).compareTo(new Vertex(3))).toBe(0);
  });
});

describe("Edge", () => {
  it("returns the opposite endpoint", () => {
    const a = new Vertex("A");
    const b = new Vertex("B");
    const c = new Vertex("C");
    const edge = new Edge(a, b, 5);

    expect(edge.opposite(a)).toBe(b);
    expect(edge.opposite(b)).toBe(a);
    expect(edge.opposite(c)).toBeUndefined();
  });

  it("formats as (start--end : element)", () => {
    const edge = new Edge(new Vertex("A"), new Vertex("B"), 2.5);
    expect(edge.toString()).toBe("(A--B : 2.5)");
  });
});

describe("Graph", () => {
  it("stores a two-way edge once, visible from both ends", () => {
    const graph = new Graph<string, number>();
    const a = graph.addVertex("A");
    const b = graph.addVertex("B");
    const edge = graph.addEdge(a, b, 7);

    expect(graph.getEdge(a, b)).toBe(edge);
    expect(graph.getEdge(b, a)).toBe(edge);
    expect(graph.numEdges()).toBe(1);
    expect(graph.edges()).toEqual([edge]);
  });

  it("stores a one-way edge under its start only", () => {
    const graph = new Graph<string, number>();
    const a = graph.addVertex("A");
    const b = graph.addVertex("B");
    const edge = graph.addEdge(a, b, 7, true);

    expect(graph.getEdge(a, b)).toBe(edge);
    expect(graph.getEdge(b, a)).toBeUndefined();
    expect(graph.degree(a)).toBe(1);
    expect(graph.degree(b)).toBe(0);
  });

  it("counts k two-way and m one-way edges as k + m", () => {
    const graph = new Graph<number, number>();
    const v0 = graph.addVertex(0);
    const v1 = graph.addVertex(1);
    const v2 = graph.addVertex(2);
    const v3 = graph.addVertex(3);
    const v4 = graph.addVertex(4);

    graph.addEdge(v0, v1, 1);
    graph.addEdge(v1, v2, 1);
    graph.addEdge(v2, v3, 1, true);
    graph.addEdge(v3, v4, 1, true);
    graph.addEdge(v4, v0, 1, true);

    expect(graph.numEdges()).toBe(5);
    expect(graph.edges()).toHaveLength(5);
  });

  it("stores a self-loop once", () => {
    const graph = new Graph<string, number>();
    const a = graph.addVertex("A");
    graph.addEdge(a, a, 1);

    expect(graph.degree(a)).toBe(1);
    expect(graph.numEdges()).toBe(1);
  });

  it("replaces an edge re-added between the same pair", () => {
    const graph = new Graph<string, number>();
    const a = graph.addVertex("A");
    const b = graph.addVertex("B");
    graph.addEdge(a, b, 1);
    const replacement = graph.addEdge(a, b, 9);

    expect(graph.getEdge(a, b)?.element).toBe(9);
    expect(graph.getEdge(b, a)).toBe(replacement);
    expect(graph.numEdges()).toBe(1);
  });

  it("rejects edges to vertices outside the graph", () => {
    const graph = new Graph<string, number>();
    const a = graph.addVertex("A");
    const stranger = new Vertex("Z");

    expect(graph.hasVertex(a)).toBe(true);
    expect(graph.hasVertex(stranger)).toBe(false);
    expect(thrownCode(() => graph.addEdge(a, stranger, 1))).toBe(
      "VERTEX_NOT_FOUND",
    );
    expect(graph.degree(a)).toBe(0);
  });

  it("rejects degree and getEdges on an absent vertex", () => {
    const graph = new Graph<string, number>();
    const stranger = new Vertex("Z");

    expect(thrownCode(() => graph.degree(stranger))).toBe("VERTEX_NOT_FOUND");
    expect(thrownCode(() => graph.getEdges(stranger))).toBe("VERTEX_NOT_FOUND");
  });

  it("reuses an existing vertex in addVertexIfNew", () => {
    const graph = new Graph<string, number>();
    const a = graph.addVertex("A");

    expect(graph.addVertexIfNew("A")).toBe(a);
    expect(graph.addVertexIfNew("B")).not.toBe(a);
    expect(graph.numVertices()).toBe(2);
  });

  it("finds the first vertex carrying a label", () => {
    const graph = new Graph<string, number>();
    const first = graph.addVertex("A");
    graph.addVertex("A");

    expect(graph.getVertexByLabel("A")).toBe(first);
    expect(graph.getVertexByLabel("Q")).toBeUndefined();
  });

  it("adds element-less edges from pairs", () => {
    const graph = new Graph<string, undefined>();
    const a = graph.addVertex("A");
    const b = graph.addVertex("B");
    const c = graph.addVertex("C");
    graph.addEdgePairs([
      [a, b],
      [b, c],
    ]);

    expect(graph.numEdges()).toBe(2);
    expect(graph.getEdge(c, b)?.element).toBeUndefined();
  });

  it("summarises itself as text", () => {
    const graph = new Graph<string, number>();
    const a = graph.addVertex("A");
    const b = graph.addVertex("B");
    graph.addEdge(a, b, 3);

    expect(graph.toString()).toBe(
      "|V| = 2; |E| = 1\nVertices: A-B\nEdges: (A--B : 3)",
    );
  });
});
