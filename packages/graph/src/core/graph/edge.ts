import type { Vertex } from "./vertex";

/**
 * An edge between two vertices, carrying an arbitrary element
 * (a cost, a label, a record).
 *
 * The vertex pair is ordered: `start()` is the vertex the edge was added
 * from, which matters for one-way edges and for `Graph.edges()` dedup.
 */
export class Edge<V, E> {
  private readonly endpoints: readonly [Vertex<V>, Vertex<V>];

  constructor(
    v: Vertex<V>,
    w: Vertex<V>,
    readonly element: E,
  ) {
    this.endpoints = [v, w];
  }

  vertices(): readonly [Vertex<V>, Vertex<V>] {
    return this.endpoints;
  }

  start(): Vertex<V> {
    return this.endpoints[0];
  }

  end(): Vertex<V> {
    return this.endpoints[1];
  }

  /**
   * The endpoint across from `v`, or `undefined` when `v` is not on this
   * edge. A self-loop returns `v` itself.
   */
  opposite(v: Vertex<V>): Vertex<V> | undefined {
    if (this.endpoints[0] === v) return this.endpoints[1];
    if (this.endpoints[1] === v) return this.endpoints[0];
    return undefined;
  }

  toString(): string {
    return `(${this.endpoints[0]}--${this.endpoints[1]} : ${String(this.element)})`;
  }
}
