/**
 * API request/response types for the road network server.
 *
 * These mirror the server's models so the client has no dependency on the
 * server or model packages.
 */

// ---------------------------------------------------------------------------
// Coordinate
// ---------------------------------------------------------------------------

export interface Coordinate {
  lat: number;
  lng: number;
}

// ---------------------------------------------------------------------------
// Roads
// ---------------------------------------------------------------------------

export type Directionality = "one-way" | "two-way";
export type RoadDirection = "forth" | "opposite";

export interface DirectionState {
  currentDelay: number;
  blocked: boolean;
}

export interface CreateRoadRequest {
  identification: string;
  endPoint1: Coordinate;
  endPoint2: Coordinate;
  /** Integer meters */
  lengthMeters: number;
  /** Defaults to the network's default speed limit */
  speedLimit?: number;
  averageSpeed: number;
  directionality: Directionality;
}

export interface UpdateRoadRequest {
  identification?: string;
  lengthMeters?: number;
  speedLimit?: number;
  averageSpeed?: number;
}

export interface UpdateDirectionRequest {
  currentDelay?: number;
  blocked?: boolean;
}

export interface Road {
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

// ---------------------------------------------------------------------------
// Routes
// ---------------------------------------------------------------------------

export type SegmentRef = { kind: "road"; roadId: string } | { kind: "route"; routeId: string };

export interface CreateRouteRequest {
  startLocation: Coordinate;
  segments: SegmentRef[];
}

export interface Route {
  id: string;
  startLocation: Coordinate;
  endLocation: Coordinate | null;
  segments: SegmentRef[];
  usedByRouteIds: string[];
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

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

export interface NetworkStats {
  activeRoads: number;
  terminatedRoads: number;
  activeRoutes: number;
  terminatedRoutes: number;
}

export interface HealthResponse {
  status: "ok";
  uptime: number;
  network: NetworkStats;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export interface ErrorResponse {
  error: "ModelError";
  message: string;
  /** Name of the underlying error, e.g. "InvalidSegmentError" */
  cause: string;
  details?: unknown;
}
