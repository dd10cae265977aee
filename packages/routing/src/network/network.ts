/**
 * The network context: arena storage for roads and routes, and the
 * registry of identifications held by active roads.
 */

import type { NetworkConfig, Road, RoadNetwork, Route } from "@roadnet/types";
import { UnknownRoadError, UnknownRouteError } from "../errors.js";
import { buildIdentificationRules } from "../roads/identification.js";
import { DEFAULT_NETWORK_CONFIG } from "../config/network-config.js";

/**
 * Create an empty network.
 *
 * @throws InvalidLengthError if the config lists an out-of-range identification length
 */
export function createNetwork(config: NetworkConfig = DEFAULT_NETWORK_CONFIG): RoadNetwork {
  return {
    roads: new Map(),
    routes: new Map(),
    identifications: new Set(),
    identificationRules: buildIdentificationRules(
      config.identification.extraLengths,
      config.identification.extraCharacters,
    ),
    defaultSpeedLimit: config.defaultSpeedLimit,
    nextRoadIndex: 0,
    nextRouteIndex: 0,
  };
}

export function getRoad(network: RoadNetwork, roadId: string): Road {
  const road = network.roads.get(roadId);
  if (!road) throw new UnknownRoadError(roadId);
  return road;
}

export function getRoute(network: RoadNetwork, routeId: string): Route {
  const route = network.routes.get(routeId);
  if (!route) throw new UnknownRouteError(routeId);
  return route;
}

export function nextRoadId(network: RoadNetwork): string {
  return `road-${network.nextRoadIndex++}`;
}

export function nextRouteId(network: RoadNetwork): string {
  return `route-${network.nextRouteIndex++}`;
}

// ---------------------------------------------------------------------------
// Identification registry
// ---------------------------------------------------------------------------

export function isIdentificationInUse(network: RoadNetwork, identification: string): boolean {
  return network.identifications.has(identification);
}

export function registerIdentification(network: RoadNetwork, identification: string): void {
  network.identifications.add(identification);
}

export function releaseIdentification(network: RoadNetwork, identification: string): void {
  network.identifications.delete(identification);
}

/** Road and route counts, split by active and terminated */
export interface NetworkStats {
  activeRoads: number;
  terminatedRoads: number;
  activeRoutes: number;
  terminatedRoutes: number;
}

export function getNetworkStats(network: RoadNetwork): NetworkStats {
  let activeRoads = 0;
  let activeRoutes = 0;
  for (const road of network.roads.values()) {
    if (!road.terminated) activeRoads++;
  }
  for (const route of network.routes.values()) {
    if (!route.terminated) activeRoutes++;
  }
  return {
    activeRoads,
    terminatedRoads: network.roads.size - activeRoads,
    activeRoutes,
    terminatedRoutes: network.routes.size - activeRoutes,
  };
}
