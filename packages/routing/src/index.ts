/**
 * @roadnet/routing
 *
 * A road network model with composable routes.
 *
 * Key concepts:
 * - Road: a one-way or two-way connection between two endpoints
 * - Route: an ordered sequence of segments (roads and nested routes)
 *   forming one continuous path from a start location
 * - RoadNetwork: the arena that owns roads and routes and the registry of
 *   road identifications
 *
 * Every route edit is validated before it is applied; derived queries
 * (length, traversability, visited locations, travel time) refuse to run
 * on a route that no longer chains.
 */

// Errors
export * from "./errors.js";

// Geometry
export * from "./geometry/endpoint.js";

// Network and configuration
export * from "./network/network.js";
export * from "./config/network-config.js";

// Roads
export * from "./roads/constants.js";
export * from "./roads/identification.js";
export * from "./roads/road.js";

// Routes
export * from "./routes/segment.js";
export * from "./routes/chaining.js";
export * from "./routes/route.js";
export * from "./routes/queries.js";
