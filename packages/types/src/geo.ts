/**
 * Geographic utility types.
 */

/** A road endpoint or route location, in degrees */
export interface Coordinate {
  lat: number;
  lng: number;
}

/** Axis-aligned bounding box every coordinate must fall in */
export interface BoundingBox {
  minLat: number;
  maxLat: number;
  minLng: number;
  maxLng: number;
}
