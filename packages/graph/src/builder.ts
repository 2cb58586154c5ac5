import {
  Err,
  GraphError,
  Ok,
  type Result,
  type RouteLabel,
  type RouteMapInput,
  RouteMapInputSchema,
} from "@routegraph/contracts";
import { RouteMap } from "./core/graph";

/**
 * Build a route map from already-parsed node and edge records.
 *
 * Nodes are added first, then edges in input order. A later edge between
 * the same ordered pair replaces the earlier one.
 *
 * @example
 * ```typescript
 * const map = buildRouteMap({
 *   nodes: [{ id: 1, latitude: 52.1, longitude: -9.5 }, { id: 2 }],
 *   edges: [{ source: 1, target: 2, cost: 4.5 }],
 * }).getOrThrow();
 * ```
 */
export function buildRouteMap(
  input: RouteMapInput,
): Result<RouteMap<RouteLabel>, GraphError> {
  const parsed = RouteMapInputSchema.safeParse(input);
  if (!parsed.success) {
    return Err(
      GraphError.inputInvalid("Route map input failed validation", {
        issues: parsed.error.issues.map((issue) => ({
          path: issue.path.map(String).join("."),
          message: issue.message,
        })),
      }),
    );
  }

  const map = new RouteMap<RouteLabel>();
  for (const node of parsed.data.nodes) {
    if (node.latitude !== undefined && node.longitude !== undefined) {
      map.addVertex(node.id, {
        latitude: node.latitude,
        longitude: node.longitude,
      });
    } else {
      map.addVertex(node.id);
    }
  }

  for (const [index, edge] of parsed.data.edges.entries()) {
    const from = map.getVertexByLabel(edge.source);
    const to = map.getVertexByLabel(edge.target);
    if (from === undefined || to === undefined) {
      return Err(
        GraphError.vertexNotFound("buildRouteMap", {
          edge: index,
          label: String(from === undefined ? edge.source : edge.target),
        }),
      );
    }
    map.addEdge(from, to, edge.cost, edge.oneway);
  }

  return Ok(map);
}
