/**
 * @roadnet/types
 *
 * Shared domain types for the road network model.
 *
 * - Geo: coordinates and the bounds they must fall in
 * - Road: a weighted edge between two endpoints, one-way or two-way
 * - Route: an ordered chain of segments (roads and nested routes)
 * - Network: the context that owns roads, routes and identifications
 */

export * from "./geo.js";
export * from "./road.js";
export * from "./route.js";
export * from "./network.js";
