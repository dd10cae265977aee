// Base
export { ApiError, BaseClient, type ClientConfig, type RequestParams } from "./baseClient.js";

// Domain clients
export { RoadClient } from "./roadClient.js";
export { RouteClient } from "./routeClient.js";
export { HealthClient } from "./healthClient.js";

// Types
export type {
  // Coordinate
  Coordinate,
  // Roads
  Directionality,
  RoadDirection,
  DirectionState,
  CreateRoadRequest,
  UpdateRoadRequest,
  UpdateDirectionRequest,
  Road,
  // Routes
  SegmentRef,
  CreateRouteRequest,
  Route,
  RouteLengthResponse,
  RouteTraversableResponse,
  RouteLocationsResponse,
  RouteTravelTimeResponse,
  // Health
  NetworkStats,
  HealthResponse,
  // Errors
  ErrorResponse,
} from "./types.js";
