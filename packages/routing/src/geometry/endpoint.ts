/**
 * Endpoint comparison and bounds checks.
 *
 * Equality is exact: two endpoints are the same location only when both
 * components compare equal.
 */

import type { BoundingBox, Coordinate } from "@roadnet/types";

/** Every road endpoint and route start must fall in this box */
export const COORDINATE_BOUNDS: BoundingBox = {
  minLat: 0,
  maxLat: 70,
  minLng: 0,
  maxLng: 70,
};

export function isSameLocation(a: Coordinate, b: Coordinate): boolean {
  return a.lat === b.lat && a.lng === b.lng;
}

export function isValidLocation(coord: Coordinate): boolean {
  return (
    coord.lat >= COORDINATE_BOUNDS.minLat &&
    coord.lat <= COORDINATE_BOUNDS.maxLat &&
    coord.lng >= COORDINATE_BOUNDS.minLng &&
    coord.lng <= COORDINATE_BOUNDS.maxLng
  );
}

/** True if both pairs hold the same two locations, in either order. */
export function isSameEndpointPair(
  a: [Coordinate, Coordinate],
  b: [Coordinate, Coordinate],
): boolean {
  return (
    (isSameLocation(a[0], b[0]) && isSameLocation(a[1], b[1])) ||
    (isSameLocation(a[0], b[1]) && isSameLocation(a[1], b[0]))
  );
}

export function formatLocation(coord: Coordinate): string {
  return `(${coord.lat},${coord.lng})`;
}
