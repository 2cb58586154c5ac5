/**
 * Pathfinding Module
 */

export * from "./path-reporter";
export * from "./shortest-path";
