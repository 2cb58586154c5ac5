export * from "./random/seeded-random";
export * from "./schemas/route-map";
export * from "./types/error";
export * from "./types/result";
