/**
 * Segment references and containment.
 */

import type { Road, RoadNetwork, Route, Segment } from "@roadnet/types";
import { getRoad, getRoute } from "../network/network.js";

export function roadSegment(roadId: string): Segment {
  return { kind: "road", roadId };
}

export function routeSegment(routeId: string): Segment {
  return { kind: "route", routeId };
}

export function isSameSegment(a: Segment, b: Segment): boolean {
  if (a.kind === "road") return b.kind === "road" && a.roadId === b.roadId;
  return b.kind === "route" && a.routeId === b.routeId;
}

export function segmentId(segment: Segment): string {
  return segment.kind === "road" ? segment.roadId : segment.routeId;
}

/** A segment resolved against the network */
export type ResolvedSegment =
  | { kind: "road"; road: Road }
  | { kind: "route"; route: Route };

/**
 * @throws UnknownRoadError
 * @throws UnknownRouteError
 */
export function resolveSegment(network: RoadNetwork, segment: Segment): ResolvedSegment {
  return segment.kind === "road"
    ? { kind: "road", road: getRoad(network, segment.roadId) }
    : { kind: "route", route: getRoute(network, segment.routeId) };
}

export function isTerminatedSegment(resolved: ResolvedSegment): boolean {
  return resolved.kind === "road" ? resolved.road.terminated : resolved.route.terminated;
}

/**
 * Whether `container` is `target` or holds it, directly or through any
 * depth of nested routes. A road only contains itself.
 */
export function hasAsSubSegment(network: RoadNetwork, container: Segment, target: Segment): boolean {
  const visited = new Set<string>();

  function search(current: Segment): boolean {
    if (isSameSegment(current, target)) return true;
    if (current.kind === "road") return false;
    if (visited.has(current.routeId)) return false;
    visited.add(current.routeId);

    const route = network.routes.get(current.routeId);
    if (!route) return false;
    return route.segments.some(search);
  }

  return search(container);
}

/** Count the occurrences of a segment in a route */
export function countOccurrences(route: Route, segment: Segment): number {
  return route.segments.filter((s) => isSameSegment(s, segment)).length;
}

