/**
 * The chaining engine.
 *
 * A route is consistent when its segments, walked from the start
 * location, form one continuous path: each segment is entered at the
 * location the previous one left off. One-way roads can only be entered at
 * their first endpoint. Nested routes must start where the walk currently
 * is and must be consistent themselves.
 *
 * Every derived query (end location, length, traversability, visited
 * locations) is built on the same walk, so they all agree on which way
 * each road is travelled.
 */

import type { Coordinate, Road, RoadDirection, RoadNetwork, Route, Segment } from "@roadnet/types";
import { isSameLocation } from "../geometry/endpoint.js";
import { canHaveAsRoute, isSelfLoop } from "../roads/road.js";
import { hasAsSubSegment, routeSegment, type ResolvedSegment } from "./segment.js";

/** One segment of a walk, with the locations it is entered and left at */
export type ChainStep =
  | {
      kind: "road";
      index: number;
      road: Road;
      from: Coordinate;
      to: Coordinate;
      /**
       * Direction(s) the road is travelled in. A two-way self-loop can be
       * taken either way, so it lists both.
       */
      directions: RoadDirection[];
    }
  | {
      kind: "route";
      index: number;
      route: Route;
      from: Coordinate;
      to: Coordinate;
    };

// ---------------------------------------------------------------------------
// End location
// ---------------------------------------------------------------------------

/**
 * Where a route currently ends, or undefined for an empty route.
 *
 * For each road, the end moves to the endpoint that does not coincide with
 * the end so far:
 * - a self-loop leaves the end at its (single) location
 * - the first road leaves at whichever endpoint is not the start location
 * - a one-way road always leaves at its second endpoint
 * - a two-way road leaves at the endpoint opposite to where the route
 *   so far ends, which settles the case where both of its endpoints touch
 *   the previous segment
 * A nested route moves the end to its own end location.
 */
export function getEndLocation(network: RoadNetwork, route: Route): Coordinate | undefined {
  return endLocationOf(network, route, new Set());
}

function endLocationOf(network: RoadNetwork, route: Route, visiting: Set<string>): Coordinate | undefined {
  if (visiting.has(route.id)) return undefined;
  visiting.add(route.id);

  let end: Coordinate | undefined;
  for (const [index, segment] of route.segments.entries()) {
    if (segment.kind === "route") {
      const nested = network.routes.get(segment.routeId);
      end = nested ? endLocationOf(network, nested, visiting) : undefined;
      continue;
    }

    const road = network.roads.get(segment.roadId);
    if (!road) {
      end = undefined;
    } else if (isSelfLoop(road)) {
      end = road.endPoint1;
    } else if (index === 0) {
      end = isSameLocation(road.endPoint1, route.startLocation) ? road.endPoint2 : road.endPoint1;
    } else if (road.directionality === "one-way") {
      end = road.endPoint2;
    } else {
      end = end !== undefined && isSameLocation(end, road.endPoint1) ? road.endPoint2 : road.endPoint1;
    }
  }

  visiting.delete(route.id);
  return end;
}

// ---------------------------------------------------------------------------
// Walk
// ---------------------------------------------------------------------------

/**
 * Walk `segments` from `startLocation`, stopping at the first segment that
 * cannot be entered where the walk currently is. The chain is continuous
 * iff the result has one step per segment.
 */
export function walkChain(network: RoadNetwork, startLocation: Coordinate, segments: Segment[]): ChainStep[] {
  return walkFrom(network, startLocation, segments, new Set());
}

function walkFrom(
  network: RoadNetwork,
  startLocation: Coordinate,
  segments: Segment[],
  visiting: Set<string>,
): ChainStep[] {
  const steps: ChainStep[] = [];
  let cursor = startLocation;

  for (const [index, segment] of segments.entries()) {
    if (segment.kind === "road") {
      const road = network.roads.get(segment.roadId);
      if (!road) break;
      const step = enterRoad(road, cursor, index);
      if (!step) break;
      steps.push(step);
      cursor = step.to;
    } else {
      const nested = network.routes.get(segment.routeId);
      if (!nested || !isSameLocation(nested.startLocation, cursor)) break;
      if (!properSegments(network, nested, false, visiting)) break;
      const end = endLocationOf(network, nested, new Set());
      if (!end) break;
      steps.push({ kind: "route", index, route: nested, from: cursor, to: end });
      cursor = end;
    }
  }

  return steps;
}

function enterRoad(road: Road, at: Coordinate, index: number): ChainStep | undefined {
  const atFirst = isSameLocation(road.endPoint1, at);

  if (road.directionality === "one-way") {
    return atFirst
      ? { kind: "road", index, road, from: at, to: road.endPoint2, directions: ["forth"] }
      : undefined;
  }

  const atSecond = isSameLocation(road.endPoint2, at);
  if (atFirst && atSecond) {
    return { kind: "road", index, road, from: at, to: at, directions: ["forth", "opposite"] };
  }
  if (atFirst) {
    return { kind: "road", index, road, from: at, to: road.endPoint2, directions: ["forth"] };
  }
  if (atSecond) {
    return { kind: "road", index, road, from: at, to: road.endPoint1, directions: ["opposite"] };
  }
  return undefined;
}

/** Whether `segments` form a continuous, non-empty path from `startLocation` */
export function isContinuousChain(network: RoadNetwork, startLocation: Coordinate, segments: Segment[]): boolean {
  return segments.length > 0 && walkChain(network, startLocation, segments).length === segments.length;
}

// ---------------------------------------------------------------------------
// Invariant
// ---------------------------------------------------------------------------

/**
 * The route invariant:
 * - the route has at least one segment (unless `allowEmpty`)
 * - every road segment is active and lists this route among its routes
 * - every nested route lists this route among the routes using it
 * - walking the segments from the start location never breaks the chain
 *   (nested routes are checked recursively)
 * - the walk finishes at the route's end location
 */
export function hasProperSegments(network: RoadNetwork, route: Route, allowEmpty = false): boolean {
  return properSegments(network, route, allowEmpty, new Set());
}

function properSegments(network: RoadNetwork, route: Route, allowEmpty: boolean, visiting: Set<string>): boolean {
  if (route.segments.length === 0) return allowEmpty;
  // A route reached again while being checked contains itself
  if (visiting.has(route.id)) return false;

  for (const segment of route.segments) {
    if (segment.kind === "road") {
      const road = network.roads.get(segment.roadId);
      if (!road || !canHaveAsRoute(road, route) || !road.routeIds.has(route.id)) return false;
    } else {
      const nested = network.routes.get(segment.routeId);
      if (!nested || nested.terminated || !nested.usedByRouteIds.includes(route.id)) return false;
    }
  }

  visiting.add(route.id);
  const steps = walkFrom(network, route.startLocation, route.segments, visiting);
  visiting.delete(route.id);
  if (steps.length !== route.segments.length) return false;

  const last = steps[steps.length - 1];
  const end = endLocationOf(network, route, new Set());
  return last !== undefined && end !== undefined && isSameLocation(last.to, end);
}

// ---------------------------------------------------------------------------
// Appending
// ---------------------------------------------------------------------------

/**
 * Why `candidate` cannot be appended to `route` right now, or null if it can.
 *
 * The candidate must be active, must not contain the route (directly or
 * through nested routes), and must touch the route's current end (its
 * start location when empty). One-way roads must touch it with their
 * first endpoint; nested routes with their start location.
 */
export function appendRejection(
  network: RoadNetwork,
  route: Route,
  candidate: Segment,
  resolved: ResolvedSegment,
): string | null {
  if (route.terminated) return "route is terminated";
  if (resolved.kind === "road" ? resolved.road.terminated : resolved.route.terminated) {
    return `${resolved.kind} ${describe(resolved)} is terminated`;
  }
  if (hasAsSubSegment(network, candidate, routeSegment(route.id))) {
    return `${resolved.kind} ${describe(resolved)} contains this route`;
  }

  const anchor = route.segments.length === 0 ? route.startLocation : getEndLocation(network, route);
  if (!anchor) return "route has no end location";

  const touches =
    resolved.kind === "road"
      ? resolved.road.directionality === "one-way"
        ? isSameLocation(resolved.road.endPoint1, anchor)
        : isSameLocation(resolved.road.endPoint1, anchor) || isSameLocation(resolved.road.endPoint2, anchor)
      : isSameLocation(resolved.route.startLocation, anchor);
  if (!touches) {
    return `${resolved.kind} ${describe(resolved)} does not start at (${anchor.lat},${anchor.lng})`;
  }
  return null;
}

/** Whether `candidate` could legally be appended to `route` right now */
export function canHaveAsSegment(
  network: RoadNetwork,
  route: Route,
  candidate: Segment,
  resolved: ResolvedSegment,
): boolean {
  return appendRejection(network, route, candidate, resolved) === null;
}

/** The two locations a segment spans: a road's endpoints, or a route's start and end */
export function segmentEndpoints(network: RoadNetwork, resolved: ResolvedSegment): [Coordinate, Coordinate] | undefined {
  if (resolved.kind === "road") return [resolved.road.endPoint1, resolved.road.endPoint2];
  const end = getEndLocation(network, resolved.route);
  return end ? [resolved.route.startLocation, end] : undefined;
}

function describe(resolved: ResolvedSegment): string {
  return resolved.kind === "road" ? resolved.road.identification : resolved.route.id;
}
