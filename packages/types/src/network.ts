/**
 * The network context.
 *
 * Owns every road and route by handle, plus the registry of
 * identifications held by active roads. Several networks can coexist
 * without sharing any state.
 */

import type { Road } from "./road.js";
import type { Route } from "./route.js";

/** Format rules for road identifications */
export interface IdentificationRules {
  /** Allowed identification lengths */
  lengths: number[];
  /** Characters allowed after the leading capital letter */
  allowedCharacters: Set<string>;
}

/** File-level network configuration (configs/network/*.json) */
export interface NetworkConfig {
  identification: {
    /** Lengths allowed on top of the default 2 and 3 */
    extraLengths: number[];
    /** Characters allowed on top of the digits */
    extraCharacters: string[];
  };
  /** Speed limit in m/s applied when a road is created without one */
  defaultSpeedLimit: number;
}

export interface RoadNetwork {
  roads: Map<string, Road>;
  routes: Map<string, Route>;
  /** Identifications held by active roads */
  identifications: Set<string>;
  identificationRules: IdentificationRules;
  defaultSpeedLimit: number;
  nextRoadIndex: number;
  nextRouteIndex: number;
}
