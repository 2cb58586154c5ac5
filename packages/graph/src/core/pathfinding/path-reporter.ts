/**
 * Route reconstruction and the text reports built from a shortest-path run.
 */

import { Err, GraphError, Ok, type Result } from "@routegraph/contracts";
import type { Coordinates } from "../graph/route-map";
import type { Vertex } from "../graph/vertex";
import type { ShortestPathTable } from "./shortest-path";

/** Role tag written in the first CSV column for every waypoint. */
export const WAYPOINT_ROLE = "W";

export const ROUTE_CSV_HEADER = "Type,Latitude,Longitude,element,cost";

export interface RouteHop<V> {
  readonly role: typeof WAYPOINT_ROLE;
  readonly label: V;
  readonly latitude: number | null;
  readonly longitude: number | null;
  /** Cumulative cost from the source to this hop. */
  readonly cost: number;
}

/**
 * Anything that can resolve labels and report coordinates.
 */
export interface CoordinateSource<V> {
  getVertexByLabel(label: V): Vertex<V> | undefined;
  getCoordinates(v: Vertex<V>): Coordinates | undefined;
}

/**
 * Walk predecessors from `destination` back to `source`.
 *
 * The walk takes at most one step per closed vertex. A missing table entry,
 * a chain that stops before the source, or a chain longer than the table
 * fails with UNREACHABLE.
 */
export function reconstructRoute<V>(
  map: CoordinateSource<V>,
  table: ShortestPathTable<V>,
  source: V,
  destination: V,
): Result<RouteHop<V>[], GraphError> {
  const unreachable = () =>
    Err(
      GraphError.unreachable({
        source: String(source),
        destination: String(destination),
      }),
    );

  const hops: RouteHop<V>[] = [];
  let label = destination;

  for (let step = 0; step <= table.size; step++) {
    if (label === source) {
      return Ok(hops);
    }

    const entry = table.get(label);
    if (entry === undefined || entry.predecessor === null) {
      return unreachable();
    }

    const vertex = map.getVertexByLabel(label);
    const coordinates = vertex ? map.getCoordinates(vertex) : undefined;
    hops.push({
      role: WAYPOINT_ROLE,
      label,
      latitude: coordinates?.latitude ?? null,
      longitude: coordinates?.longitude ?? null,
      cost: entry.distance,
    });
    label = entry.predecessor;
  }

  return unreachable();
}

export function formatRouteHop<V>(hop: RouteHop<V>): string {
  return [
    hop.role,
    hop.latitude ?? "",
    hop.longitude ?? "",
    String(hop.label),
    hop.cost,
  ].join(",");
}

/**
 * CSV route listing: header line, then one line per hop.
 */
export function formatRouteCsv<V>(hops: readonly RouteHop<V>[]): string {
  return [ROUTE_CSV_HEADER, ...hops.map(formatRouteHop)].join("\n");
}

/**
 * One line per closed vertex, in finalization order.
 */
export function formatClosedTable<V>(table: ShortestPathTable<V>): string {
  const lines: string[] = [];
  for (const [label, { distance, predecessor }] of table) {
    lines.push(
      `Destination vertex:${String(label)}  Path length:${distance}   Previous vertex:${predecessor === null ? "None" : String(predecessor)}`,
    );
  }
  return lines.join("\n");
}
