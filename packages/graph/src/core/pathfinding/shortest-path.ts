/**
 * Single-source shortest paths (Dijkstra) over an adjacency-map graph.
 *
 * Tentative distances live in an adaptable priority queue; improving a
 * vertex's distance updates its existing entry in place through the handle
 * returned when it was first discovered, so each vertex is queued at most
 * once.
 *
 * Ties between equal-cost paths resolve by discovery and heap order. Which
 * of several shortest predecessors is recorded is not specified.
 */

import {
  Err,
  GraphError,
  Ok,
  type Result,
  type ShortestPathOptionsInput,
  ShortestPathOptionsSchema,
} from "@routegraph/contracts";
import {
  AdaptablePriorityQueue,
  compareNumbers,
  type QueueHandle,
} from "../data-structures";
import type { Edge } from "../graph/edge";
import type { ReadonlyGraph } from "../graph/graph";
import type { Vertex } from "../graph/vertex";

/**
 * Finalized distance of one vertex and the label it was reached from.
 * `predecessor` is null only for the source.
 */
export interface ClosedEntry<V> {
  readonly distance: number;
  readonly predecessor: V | null;
}

/**
 * Closed set keyed by vertex label, in finalization order (non-decreasing
 * distance). Unreachable vertices are absent.
 */
export type ShortestPathTable<V> = ReadonlyMap<V, ClosedEntry<V>>;

export type EdgeWeight<V, E> = (edge: Edge<V, E>) => number;

/** `maxDistance`: vertices farther than this are left out of the table. */
export type ShortestPathOptions = ShortestPathOptionsInput;

export const DEFAULT_SHORTEST_PATH_OPTIONS: Required<ShortestPathOptions> = {
  maxDistance: Infinity,
};

/**
 * Shortest paths from `source` over a graph whose edge elements are costs.
 */
export function shortestPath<V>(
  graph: ReadonlyGraph<V, number>,
  source: V,
  options: ShortestPathOptions = {},
): Result<ShortestPathTable<V>, GraphError> {
  return shortestPathBy(graph, source, (edge) => edge.element, options);
}

/**
 * Shortest paths from `source`, reading each edge's cost through `weight`.
 *
 * Fails with VERTEX_NOT_FOUND when no vertex carries the source label, and
 * with NEGATIVE_WEIGHT as soon as an edge leaving a finalized vertex costs
 * less than zero or is not a finite number, including edges that lead back
 * into the closed set.
 */
export function shortestPathBy<V, E>(
  graph: ReadonlyGraph<V, E>,
  source: V,
  weight: EdgeWeight<V, E>,
  options: ShortestPathOptions = {},
): Result<ShortestPathTable<V>, GraphError> {
  const parsed = ShortestPathOptionsSchema.safeParse(options);
  if (!parsed.success) {
    return Err(
      GraphError.inputInvalid(
        parsed.error.issues.map((issue) => issue.message).join("; "),
      ),
    );
  }
  const { maxDistance } = parsed.data;

  const sourceVertex = graph.getVertexByLabel(source);
  if (sourceVertex === undefined) {
    return Err(
      GraphError.vertexNotFound("shortestPath", { source: String(source) }),
    );
  }

  const open = new AdaptablePriorityQueue<number, Vertex<V>>(compareNumbers);
  const locations = new Map<V, QueueHandle<number, Vertex<V>>>();
  const predecessors = new Map<V, V | null>();
  const closed = new Map<V, ClosedEntry<V>>();

  locations.set(source, open.add(0, sourceVertex));
  predecessors.set(source, null);

  while (!open.isEmpty) {
    const { key: distance, value: current } = open.removeMin();
    const label = current.element;

    locations.delete(label);
    closed.set(label, {
      distance,
      predecessor: predecessors.get(label) ?? null,
    });
    predecessors.delete(label);

    for (const edge of graph.getEdges(current)) {
      const cost = weight(edge);
      if (!Number.isFinite(cost) || cost < 0) {
        return Err(GraphError.negativeWeight({ edge: String(edge), cost }));
      }

      const neighbour = edge.opposite(current);
      if (neighbour === undefined || closed.has(neighbour.element)) continue;

      const candidate = distance + cost;
      if (candidate > maxDistance) continue;

      const handle = locations.get(neighbour.element);
      if (handle === undefined) {
        locations.set(neighbour.element, open.add(candidate, neighbour));
        predecessors.set(neighbour.element, label);
      } else if (candidate < handle.key) {
        open.updateKey(handle, candidate);
        predecessors.set(neighbour.element, label);
      }
    }
  }

  return Ok(closed);
}
