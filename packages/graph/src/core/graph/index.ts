/**
 * Graph model: vertices, edges, the adjacency-map graph and the
 * coordinate-aware route map.
 */

export * from "./edge";
export * from "./graph";
export * from "./route-map";
export * from "./vertex";
