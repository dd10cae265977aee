/**
 * Road construction, properties and termination.
 *
 * Roads live in the network's arena and are addressed by handle. All
 * mutators validate before they write, so a failing call leaves the road
 * untouched.
 */

import type {
  Coordinate,
  DirectionState,
  Directionality,
  Road,
  RoadDirection,
  RoadNetwork,
  Route,
} from "@roadnet/types";
import {
  assertContract,
  DuplicateIdentificationError,
  InvalidAverageSpeedError,
  InvalidDelayError,
  InvalidIdentificationError,
  InvalidSpeedLimitError,
} from "../errors.js";
import { formatLocation, isSameLocation, isValidLocation } from "../geometry/endpoint.js";
import {
  isIdentificationInUse,
  nextRoadId,
  registerIdentification,
  releaseIdentification,
} from "../network/network.js";
import { isValidIdentification } from "./identification.js";
import {
  MAX_LENGTH,
  MIN_LENGTH,
  SPEED_OF_LIGHT,
  TERMINATED_LENGTH,
  TERMINATED_SPEED,
} from "./constants.js";

export interface CreateRoadInput {
  identification: string;
  endPoint1: Coordinate;
  endPoint2: Coordinate;
  lengthMeters: number;
  /** Defaults to the network's default speed limit */
  speedLimit?: number;
  averageSpeed: number;
  directionality: Directionality;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export function isValidSpeedLimit(speedLimit: number): boolean {
  return speedLimit > 0 && speedLimit <= SPEED_OF_LIGHT;
}

export function isValidAverageSpeed(averageSpeed: number, speedLimit: number): boolean {
  return averageSpeed >= 0 && averageSpeed <= speedLimit;
}

export function isValidCurrentDelay(delay: number): boolean {
  return delay >= 0;
}

/** Whether a length can be stored as given, without repair */
export function canHaveAsLength(length: number): boolean {
  return length > 0 && length < MAX_LENGTH;
}

/**
 * Map any integer onto a storable road length.
 *
 * - 0 < L < MAX: kept
 * - MIN + 2 <= L < 0: its absolute value
 * - 0: 1
 * - anything else: MAX - 1
 */
export function repairLength(length: number): number {
  assertContract(Number.isInteger(length), `Road length must be an integer, got ${length}`);
  if (canHaveAsLength(length)) return length;
  if (length < 0 && length >= MIN_LENGTH + 2) return Math.abs(length);
  if (length === 0) return 1;
  return MAX_LENGTH - 1;
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

/**
 * Create a road and register its identification in the network.
 *
 * Nothing is registered or stored unless every check passes.
 *
 * @throws DuplicateIdentificationError if an active road already holds the identification
 * @throws InvalidIdentificationError if the identification breaks the network's format rules
 * @throws InvalidSpeedLimitError
 * @throws InvalidAverageSpeedError if the average speed exceeds the speed limit or is negative
 */
export function createRoad(network: RoadNetwork, input: CreateRoadInput): Road {
  assertContract(isValidLocation(input.endPoint1), `Invalid end point ${formatLocation(input.endPoint1)}`);
  assertContract(isValidLocation(input.endPoint2), `Invalid end point ${formatLocation(input.endPoint2)}`);

  const { identification } = input;
  if (isIdentificationInUse(network, identification)) {
    throw new DuplicateIdentificationError(identification);
  }
  if (!isValidIdentification(identification, network.identificationRules)) {
    throw new InvalidIdentificationError(identification);
  }

  const lengthMeters = repairLength(input.lengthMeters);
  const speedLimit = input.speedLimit ?? network.defaultSpeedLimit;
  if (!isValidSpeedLimit(speedLimit)) {
    throw new InvalidSpeedLimitError(speedLimit);
  }
  if (!isValidAverageSpeed(input.averageSpeed, speedLimit)) {
    throw new InvalidAverageSpeedError(input.averageSpeed, speedLimit);
  }

  const base = {
    id: nextRoadId(network),
    identification,
    // Copies, so callers cannot move an endpoint after construction
    endPoint1: { ...input.endPoint1 },
    endPoint2: { ...input.endPoint2 },
    lengthMeters,
    speedLimit,
    averageSpeed: input.averageSpeed,
    forth: { currentDelay: 0, blocked: false },
    routeIds: new Set<string>(),
    terminated: false,
  };
  const road: Road =
    input.directionality === "one-way"
      ? { ...base, directionality: "one-way" }
      : { ...base, directionality: "two-way", opposite: { currentDelay: 0, blocked: false } };

  registerIdentification(network, identification);
  network.roads.set(road.id, road);
  console.log(
    `[road] Created ${input.directionality} road ${identification} (${road.id}) ${formatLocation(road.endPoint1)} → ${formatLocation(road.endPoint2)}, ${lengthMeters}m`,
  );
  return road;
}

// ---------------------------------------------------------------------------
// Properties
// ---------------------------------------------------------------------------

/**
 * Give a road a new identification, releasing the old one.
 *
 * @throws InvalidIdentificationError
 * @throws DuplicateIdentificationError if any active road, this one included, holds it
 */
export function changeIdentification(network: RoadNetwork, road: Road, identification: string): void {
  if (!isValidIdentification(identification, network.identificationRules)) {
    throw new InvalidIdentificationError(identification);
  }
  if (isIdentificationInUse(network, identification)) {
    throw new DuplicateIdentificationError(identification);
  }
  if (road.terminated) {
    // Its old identification was already released on termination
    road.identification = identification;
    return;
  }
  releaseIdentification(network, road.identification);
  road.identification = identification;
  registerIdentification(network, identification);
}

/** Store a length, repaired if needed (see repairLength). */
export function setLength(road: Road, length: number): void {
  road.lengthMeters = repairLength(length);
}

/**
 * @throws InvalidSpeedLimitError
 * @throws InvalidAverageSpeedError if the current average speed would exceed the new limit
 */
export function setSpeedLimit(road: Road, speedLimit: number): void {
  if (!isValidSpeedLimit(speedLimit)) {
    throw new InvalidSpeedLimitError(speedLimit);
  }
  if (!isValidAverageSpeed(road.averageSpeed, speedLimit)) {
    throw new InvalidAverageSpeedError(road.averageSpeed, speedLimit);
  }
  road.speedLimit = speedLimit;
}

/** @throws InvalidAverageSpeedError */
export function setAverageSpeed(road: Road, averageSpeed: number): void {
  if (!isValidAverageSpeed(averageSpeed, road.speedLimit)) {
    throw new InvalidAverageSpeedError(averageSpeed, road.speedLimit);
  }
  road.averageSpeed = averageSpeed;
}

// ---------------------------------------------------------------------------
// Directions
// ---------------------------------------------------------------------------

export function supportsDirection(road: Road, direction: RoadDirection): boolean {
  return direction === "forth" || road.directionality === "two-way";
}

/** State of one direction. Asking a one-way road for "opposite" is a contract violation. */
export function getDirectionState(road: Road, direction: RoadDirection): DirectionState {
  if (direction === "forth") return road.forth;
  assertContract(
    road.directionality === "two-way",
    `Road ${road.identification} is one-way and has no opposite direction`,
  );
  return road.opposite;
}

export function getCurrentDelay(road: Road, direction: RoadDirection): number {
  return getDirectionState(road, direction).currentDelay;
}

/** @throws InvalidDelayError if the delay is negative */
export function setCurrentDelay(road: Road, direction: RoadDirection, delay: number): void {
  const state = getDirectionState(road, direction);
  if (!isValidCurrentDelay(delay)) {
    throw new InvalidDelayError(delay);
  }
  state.currentDelay = delay;
}

export function isBlocked(road: Road, direction: RoadDirection): boolean {
  return getDirectionState(road, direction).blocked;
}

export function setBlocked(road: Road, direction: RoadDirection, blocked: boolean): void {
  getDirectionState(road, direction).blocked = blocked;
}

/** Endpoints a route may enter this road from */
export function getValidStartLocations(road: Road): Coordinate[] {
  return road.directionality === "one-way" ? [road.endPoint1] : [road.endPoint1, road.endPoint2];
}

/** Endpoints a route may leave this road at */
export function getValidEndLocations(road: Road): Coordinate[] {
  return road.directionality === "one-way" ? [road.endPoint2] : [road.endPoint1, road.endPoint2];
}

export function isSelfLoop(road: Road): boolean {
  return isSameLocation(road.endPoint1, road.endPoint2);
}

// ---------------------------------------------------------------------------
// Routes using this road
// ---------------------------------------------------------------------------

export function canHaveAsRoute(road: Road, route: Route): boolean {
  return !road.terminated && !route.terminated;
}

/** Every back-referenced route is active and really contains this road. */
export function hasProperRoutes(network: RoadNetwork, road: Road): boolean {
  for (const routeId of road.routeIds) {
    const route = network.routes.get(routeId);
    if (!route || !canHaveAsRoute(road, route)) return false;
    if (!route.segments.some((s) => s.kind === "road" && s.roadId === road.id)) return false;
  }
  return true;
}

// ---------------------------------------------------------------------------
// Termination
// ---------------------------------------------------------------------------

/**
 * Terminate a road. Idempotent.
 *
 * Removes every occurrence of the road from the routes using it (without
 * re-validating them), releases the identification, and resets length and
 * speeds to their terminal marker values.
 */
export function terminateRoad(network: RoadNetwork, road: Road): void {
  if (road.terminated) return;
  road.terminated = true;

  for (const routeId of road.routeIds) {
    const route = network.routes.get(routeId);
    if (!route) continue;
    route.segments = route.segments.filter((s) => !(s.kind === "road" && s.roadId === road.id));
  }
  const detached = road.routeIds.size;
  road.routeIds.clear();

  releaseIdentification(network, road.identification);
  road.lengthMeters = TERMINATED_LENGTH;
  road.averageSpeed = TERMINATED_SPEED;
  road.speedLimit = TERMINATED_SPEED;
  console.log(`[road] Terminated ${road.identification} (${road.id}), detached from ${detached} route(s)`);
}
