import { z } from "zod";
import { COORDINATE_BOUNDS } from "@roadnet/routing";

export const coordinateSchema = z.object({
  lat: z.number().min(COORDINATE_BOUNDS.minLat).max(COORDINATE_BOUNDS.maxLat),
  lng: z.number().min(COORDINATE_BOUNDS.minLng).max(COORDINATE_BOUNDS.maxLng),
});

export const segmentRefSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("road"), roadId: z.string().min(1) }),
  z.object({ kind: z.literal("route"), routeId: z.string().min(1) }),
]);

export const directionSchema = z.enum(["forth", "opposite"]);

export const createRoadSchema = z.object({
  identification: z.string(),
  endPoint1: coordinateSchema,
  endPoint2: coordinateSchema,
  /** Integer meters; out-of-range values are repaired, not rejected */
  lengthMeters: z.number().int(),
  /** Defaults to the network's default speed limit */
  speedLimit: z.number().optional(),
  averageSpeed: z.number(),
  directionality: z.enum(["one-way", "two-way"]),
});

export const updateRoadSchema = z
  .object({
    identification: z.string().optional(),
    lengthMeters: z.number().int().optional(),
    speedLimit: z.number().optional(),
    averageSpeed: z.number().optional(),
  })
  .refine((body) => Object.values(body).some((v) => v !== undefined), {
    message: "At least one property must be given",
  });

export const updateDirectionSchema = z
  .object({
    currentDelay: z.number().optional(),
    blocked: z.boolean().optional(),
  })
  .refine((body) => body.currentDelay !== undefined || body.blocked !== undefined, {
    message: "Either currentDelay or blocked must be given",
  });

export const createRouteSchema = z.object({
  startLocation: coordinateSchema,
  segments: z.array(segmentRefSchema),
});

export const segmentIndexSchema = z.coerce.number().int().min(0);

export type SegmentRef = z.infer<typeof segmentRefSchema>;
export type CreateRoadRequest = z.infer<typeof createRoadSchema>;
export type UpdateRoadRequest = z.infer<typeof updateRoadSchema>;
export type UpdateDirectionRequest = z.infer<typeof updateDirectionSchema>;
export type CreateRouteRequest = z.infer<typeof createRouteSchema>;
