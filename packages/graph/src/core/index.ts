export * from "./data-structures";
export * from "./graph";
export * from "./pathfinding";
