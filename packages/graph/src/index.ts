/**
 * routegraph - weighted graphs and shortest routes.
 *
 * @example
 * ```typescript
 * import { RouteMap, formatRouteCsv } from "@routegraph/graph";
 *
 * const map = new RouteMap<string>();
 * const a = map.addVertex("A", { latitude: 0, longitude: 0 });
 * const b = map.addVertex("B", { latitude: 0, longitude: 1 });
 * map.addEdge(a, b, 3);
 *
 * const route = map.path("A", "B");
 * if (route.success) {
 *   console.log(formatRouteCsv(route.value));
 * }
 * ```
 */

export * from "./builder";
export * from "./core";
