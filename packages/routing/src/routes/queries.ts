/**
 * Derived route queries. Each one requires the route invariant to hold and
 * throws InvalidStateError otherwise, so a broken route never yields a
 * silently wrong answer.
 */

import type { Coordinate, RoadNetwork, Route } from "@roadnet/types";
import { InvalidStateError } from "../errors.js";
import { isSameLocation } from "../geometry/endpoint.js";
import { hasProperSegments, walkChain, type ChainStep } from "./chaining.js";

function properSteps(network: RoadNetwork, route: Route): ChainStep[] {
  if (!hasProperSegments(network, route)) {
    throw new InvalidStateError(route.id);
  }
  return walkChain(network, route.startLocation, route.segments);
}

/** Sum of the lengths of all roads, nested routes included, in meters. */
export function getTotalLength(network: RoadNetwork, route: Route): number {
  let total = 0;
  for (const step of properSteps(network, route)) {
    total += step.kind === "road" ? step.road.lengthMeters : getTotalLength(network, step.route);
  }
  return total;
}

/**
 * False if any road is blocked in the direction the route travels it
 * (either direction for a two-way self-loop), nested routes included.
 */
export function isTraversable(network: RoadNetwork, route: Route): boolean {
  for (const step of properSteps(network, route)) {
    if (step.kind === "road") {
      const { road } = step;
      const blocked = step.directions.some((direction) =>
        direction === "forth" ? road.forth.blocked : road.directionality === "two-way" && road.opposite.blocked,
      );
      if (blocked) return false;
    } else if (!isTraversable(network, step.route)) {
      return false;
    }
  }
  return true;
}

/**
 * The locations the route passes through, starting with its start location.
 *
 * Each road adds the endpoint it is left at, unless that is the location
 * added last (self-loops add nothing). A nested route splices in its own
 * visited locations minus its start, which is the location added last.
 * An empty route visits only its start location.
 */
export function getLocationsVisited(network: RoadNetwork, route: Route): Coordinate[] {
  if (route.segments.length === 0) return [{ ...route.startLocation }];

  const locations: Coordinate[] = [{ ...route.startLocation }];
  for (const step of properSteps(network, route)) {
    if (step.kind === "road") {
      const last = locations[locations.length - 1];
      if (last === undefined || !isSameLocation(last, step.to)) {
        locations.push({ ...step.to });
      }
    } else {
      locations.push(...getLocationsVisited(network, step.route).slice(1));
    }
  }
  return locations;
}

/**
 * Estimated time to travel the route in seconds: for every road, its
 * length over its average speed plus the current delay in the direction
 * travelled. A road with average speed 0 makes the estimate Infinity.
 */
export function estimateTravelTime(network: RoadNetwork, route: Route): number {
  let seconds = 0;
  for (const step of properSteps(network, route)) {
    if (step.kind === "route") {
      seconds += estimateTravelTime(network, step.route);
      continue;
    }
    const { road } = step;
    const delays = step.directions.map((direction) =>
      direction === "forth" ? road.forth.currentDelay : road.directionality === "two-way" ? road.opposite.currentDelay : 0,
    );
    seconds += road.lengthMeters / road.averageSpeed + Math.max(0, ...delays);
  }
  return seconds;
}
