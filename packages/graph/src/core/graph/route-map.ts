/**
 * Route map: a cost-weighted graph whose vertices carry map coordinates and
 * are indexed by label for constant-time lookup.
 */

import type { GraphError, Result } from "@routegraph/contracts";
import {
  type RouteHop,
  reconstructRoute,
} from "../pathfinding/path-reporter";
import {
  type ShortestPathOptions,
  shortestPath,
} from "../pathfinding/shortest-path";
import { Graph } from "./graph";
import type { Vertex } from "./vertex";

const DEV_MODE = process.env.NODE_ENV !== "production";

/** Vertex count from which `toString()` stops listing the whole graph. */
const MAX_PRINTABLE_VERTICES = 100;

export interface Coordinates {
  readonly latitude: number;
  readonly longitude: number;
}

export class RouteMap<V> extends Graph<V, number> {
  private readonly coordinates = new Map<Vertex<V>, Coordinates>();
  private readonly byLabel = new Map<V, Vertex<V>>();

  /**
   * Add a vertex, optionally placed at `coordinates`. Coordinates are fixed
   * for the vertex's lifetime.
   *
   * Labels are expected to be unique. When a label repeats, lookups resolve
   * to the newest vertex.
   */
  override addVertex(element: V, coordinates?: Coordinates): Vertex<V> {
    const v = super.addVertex(element);

    if (DEV_MODE && this.byLabel.has(element)) {
      console.warn(
        `RouteMap.addVertex: label ${String(element)} already indexed, lookups now resolve to the new vertex`,
      );
    }
    this.byLabel.set(element, v);

    if (coordinates) {
      this.coordinates.set(v, {
        latitude: coordinates.latitude,
        longitude: coordinates.longitude,
      });
    }
    return v;
  }

  override getVertexByLabel(label: V): Vertex<V> | undefined {
    return this.byLabel.get(label);
  }

  getCoordinates(v: Vertex<V>): Coordinates | undefined {
    return this.coordinates.get(v);
  }

  /**
   * Shortest route from `source` to `destination`, as hops ordered from the
   * destination back toward the source (the source itself is not a hop).
   *
   * Fails with VERTEX_NOT_FOUND for an unknown source and UNREACHABLE when
   * the destination was never finalized.
   */
  path(
    source: V,
    destination: V,
    options: ShortestPathOptions = {},
  ): Result<RouteHop<V>[], GraphError> {
    return shortestPath(this, source, options).flatMap((table) =>
      reconstructRoute(this, table, source, destination),
    );
  }

  override toString(): string {
    if (this.numVertices() >= MAX_PRINTABLE_VERTICES) {
      return `RouteMap with ${this.numVertices()} vertices and ${this.numEdges()} edges (too large to list)`;
    }
    return super.toString();
  }
}
