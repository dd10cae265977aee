import type { Coordinate, Directionality, DirectionState, Segment } from "@roadnet/types";
import type { NetworkStats } from "@roadnet/routing";

export interface HealthResponse {
  status: "ok";
  uptime: number;
  network: NetworkStats;
}

export interface RoadResponse {
  id: string;
  identification: string;
  directionality: Directionality;
  endPoint1: Coordinate;
  endPoint2: Coordinate;
  lengthMeters: number;
  speedLimit: number;
  averageSpeed: number;
  forth: DirectionState;
  /** Only present on two-way roads */
  opposite?: DirectionState;
  validStartLocations: Coordinate[];
  validEndLocations: Coordinate[];
  routeIds: string[];
  terminated: boolean;
}

export interface RouteResponse {
  id: string;
  startLocation: Coordinate;
  /** null for an empty route */
  endLocation: Coordinate | null;
  segments: Segment[];
  usedByRouteIds: string[];
  /** Whether the segments currently form a continuous path */
  proper: boolean;
  terminated: boolean;
}

export interface RouteLengthResponse {
  routeId: string;
  totalLengthMeters: number;
}

export interface RouteTraversableResponse {
  routeId: string;
  traversable: boolean;
}

export interface RouteLocationsResponse {
  routeId: string;
  locations: Coordinate[];
}

export interface RouteTravelTimeResponse {
  routeId: string;
  /** null when a road on the route has an average speed of 0 */
  seconds: number | null;
}

/** Uniform error body for every failure */
export interface ErrorResponse {
  error: "ModelError";
  message: string;
  /** Name of the underlying error, e.g. "InvalidSegmentError" */
  cause: string;
  details?: unknown;
}
