/**
 * Routes - ordered chains of segments.
 *
 * A route starts at a fixed location and is composed of segments, which
 * can be either roads or other routes. Consecutive segments must share an
 * endpoint so that the whole route forms one continuous path. The end
 * location is never stored; it is derived by walking the segments.
 */

import type { Coordinate } from "./geo.js";

/** A segment that is a road */
export interface RoadSegment {
  kind: "road";
  roadId: string;
}

/** A segment that is a nested route */
export interface RouteSegment {
  kind: "route";
  routeId: string;
}

/** A segment of a route */
export type Segment = RoadSegment | RouteSegment;

/** A route through the network */
export interface Route {
  /** Network handle, stable for the lifetime of the network */
  id: string;
  startLocation: Coordinate;
  /** Ordered segments from start to end */
  segments: Segment[];
  /** Handles of the routes holding this route as a segment (one entry per occurrence) */
  usedByRouteIds: string[];
  terminated: boolean;
}
