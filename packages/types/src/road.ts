/**
 * Roads - the edges of the network.
 *
 * A road connects two endpoints. One-way roads can only be travelled from
 * the first endpoint to the second ("forth"); two-way roads can also be
 * travelled back ("opposite"), and each direction carries its own delay
 * and blocked state.
 */

import type { Coordinate } from "./geo.js";

/** Direction of travel along a road */
export type RoadDirection = "forth" | "opposite";

/** Whether a road supports one or both directions */
export type Directionality = "one-way" | "two-way";

/** Traffic state of one direction of a road */
export interface DirectionState {
  /** Current delay in seconds (>= 0) */
  currentDelay: number;
  blocked: boolean;
}

interface RoadBase {
  /** Network handle, stable for the lifetime of the network */
  id: string;
  /** Human-facing identification, unique among active roads (e.g. "A12") */
  identification: string;
  endPoint1: Coordinate;
  endPoint2: Coordinate;
  /** Length in meters */
  lengthMeters: number;
  /** Speed limit in meters per second */
  speedLimit: number;
  /** Average speed in meters per second, never above the speed limit */
  averageSpeed: number;
  /** State of the endPoint1 -> endPoint2 direction */
  forth: DirectionState;
  /** Handles of the routes currently using this road */
  routeIds: Set<string>;
  terminated: boolean;
}

/** A road that can only be travelled from endPoint1 to endPoint2 */
export interface OneWayRoad extends RoadBase {
  directionality: "one-way";
}

/** A road that can be travelled in both directions */
export interface TwoWayRoad extends RoadBase {
  directionality: "two-way";
  /** State of the endPoint2 -> endPoint1 direction */
  opposite: DirectionState;
}

export type Road = OneWayRoad | TwoWayRoad;
