/**
 * A vertex of a graph.
 *
 * Vertices compare by identity: two vertices created from equal elements
 * stay distinct, and graph maps are keyed on the instance.
 */
export class Vertex<V> {
  constructor(readonly element: V) {}

  /**
   * Order two vertices by element. Used for sorted display only; it is not
   * an equality test.
   */
  compareTo(other: Vertex<V>): number {
    const a = this.element;
    const b = other.element;
    if (typeof a === "number" && typeof b === "number") return a - b;
    return String(a).localeCompare(String(b));
  }

  toString(): string {
    return String(this.element);
  }
}
