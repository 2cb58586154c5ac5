/**
 * Adjacency-map graph.
 *
 * Each vertex maps to a map of neighbour -> edge. A two-way edge is the same
 * Edge instance in both endpoints' maps; a one-way edge or a self-loop is
 * stored only under its start vertex.
 */

import { GraphError } from "@routegraph/contracts";
import { Edge } from "./edge";
import { Vertex } from "./vertex";

/**
 * Query surface of a graph. Searches take this instead of `Graph` so that
 * nothing reachable from a running search can add vertices or edges.
 */
export interface ReadonlyGraph<V, E> {
  numVertices(): number;
  numEdges(): number;
  vertices(): Vertex<V>[];
  edges(): Edge<V, E>[];
  hasVertex(v: Vertex<V>): boolean;
  /**
   * Resolve a label to a vertex. The base graph scans; specializations may
   * index.
   */
  getVertexByLabel(label: V): Vertex<V> | undefined;
  getEdge(v: Vertex<V>, w: Vertex<V>): Edge<V, E> | undefined;
  getEdges(v: Vertex<V>): Edge<V, E>[];
  degree(v: Vertex<V>): number;
}

export class Graph<V, E> implements ReadonlyGraph<V, E> {
  protected readonly structure = new Map<
    Vertex<V>,
    Map<Vertex<V>, Edge<V, E>>
  >();

  numVertices(): number {
    return this.structure.size;
  }

  /**
   * Number of distinct edges. An edge is counted under its start vertex
   * only, so k two-way and m one-way edges report k + m.
   */
  numEdges(): number {
    let count = 0;
    for (const [v, adjacent] of this.structure) {
      for (const edge of adjacent.values()) {
        if (edge.start() === v) count++;
      }
    }
    return count;
  }

  vertices(): Vertex<V>[] {
    return [...this.structure.keys()];
  }

  edges(): Edge<V, E>[] {
    const result: Edge<V, E>[] = [];
    for (const [v, adjacent] of this.structure) {
      for (const edge of adjacent.values()) {
        if (edge.start() === v) result.push(edge);
      }
    }
    return result;
  }

  hasVertex(v: Vertex<V>): boolean {
    return this.structure.has(v);
  }

  /**
   * First vertex whose element equals `label`, in insertion order. O(n).
   */
  getVertexByLabel(label: V): Vertex<V> | undefined {
    for (const v of this.structure.keys()) {
      if (v.element === label) return v;
    }
    return undefined;
  }

  getEdge(v: Vertex<V>, w: Vertex<V>): Edge<V, E> | undefined {
    return this.structure.get(v)?.get(w);
  }

  getEdges(v: Vertex<V>): Edge<V, E>[] {
    return [...this.adjacencyOf(v, "Graph.getEdges").values()];
  }

  degree(v: Vertex<V>): number {
    return this.adjacencyOf(v, "Graph.degree").size;
  }

  /**
   * Always creates a new vertex, even when an equal element is present.
   */
  addVertex(element: V): Vertex<V> {
    const v = new Vertex(element);
    this.structure.set(v, new Map());
    return v;
  }

  addVertexIfNew(element: V): Vertex<V> {
    return this.getVertexByLabel(element) ?? this.addVertex(element);
  }

  /**
   * Add an edge from `v` to `w`, replacing any edge already stored between
   * them. Two-way unless `oneway` is set or the edge is a self-loop.
   *
   * @throws {GraphError} VERTEX_NOT_FOUND when either endpoint is absent
   */
  addEdge(v: Vertex<V>, w: Vertex<V>, element: E, oneway = false): Edge<V, E> {
    const fromV = this.adjacencyOf(v, "Graph.addEdge");
    const fromW = this.adjacencyOf(w, "Graph.addEdge");

    const edge = new Edge(v, w, element);
    fromV.set(w, edge);
    if (!oneway && v !== w) {
      fromW.set(v, edge);
    }
    return edge;
  }

  /**
   * Connect each pair with a two-way edge carrying no element.
   */
  addEdgePairs(
    this: Graph<V, E | undefined>,
    pairs: Iterable<readonly [Vertex<V>, Vertex<V>]>,
  ): void {
    for (const [v, w] of pairs) {
      this.addEdge(v, w, undefined);
    }
  }

  toString(): string {
    const header = `|V| = ${this.numVertices()}; |E| = ${this.numEdges()}`;
    const vertices = this.vertices().map(String).join("-");
    const edges = this.edges().map(String).join(" ");
    return `${header}\nVertices: ${vertices}\nEdges: ${edges}`;
  }

  protected adjacencyOf(
    v: Vertex<V>,
    operation: string,
  ): Map<Vertex<V>, Edge<V, E>> {
    const adjacent = this.structure.get(v);
    if (!adjacent) {
      throw GraphError.vertexNotFound(operation, { vertex: String(v) });
    }
    return adjacent;
  }
}
