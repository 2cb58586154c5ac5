import { z } from "zod";

export const RouteLabelSchema = z.union([
  z.number().int(),
  z.string().min(1, { error: "Labels cannot be empty" }),
]);

export const RouteNodeSchema = z
  .object({
    id: RouteLabelSchema,
    latitude: z.number().min(-90).max(90).optional(),
    longitude: z.number().min(-180).max(180).optional(),
  })
  .refine(
    (node) => (node.latitude === undefined) === (node.longitude === undefined),
    { error: "Latitude and longitude must be given together" },
  );

export const RouteEdgeSchema = z.object({
  source: RouteLabelSchema,
  target: RouteLabelSchema,
  cost: z.number().min(0, { error: "Edge cost must be non-negative" }),
  oneway: z.boolean().default(false),
});

export const RouteMapInputSchema = z.object({
  nodes: z.array(RouteNodeSchema),
  edges: z.array(RouteEdgeSchema).default([]),
});

export type RouteLabel = z.infer<typeof RouteLabelSchema>;
export type RouteMapInput = z.input<typeof RouteMapInputSchema>;

/**
 * Search limits. Omitting `maxDistance` leaves the search unbounded.
 */
export const ShortestPathOptionsSchema = z.object({
  maxDistance: z
    .union([
      z.number().min(0, { error: "maxDistance must be non-negative" }),
      z.literal(Infinity),
    ])
    .default(Infinity),
});

export type ShortestPathOptionsInput = z.input<typeof ShortestPathOptionsSchema>;
