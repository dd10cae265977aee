/**
 * Network service: the facade between the HTTP layer and the model.
 *
 * Owns one in-memory network. Every operation runs through `run`, so
 * whatever the model throws leaves here as a ModelError.
 */

import type { RoadDirection, RoadNetwork, Road, Route } from "@roadnet/types";
import {
  addSegment,
  changeIdentification,
  changeSegment,
  createNetwork,
  createRoad,
  createRoute,
  DuplicateIdentificationError,
  estimateTravelTime,
  getEndLocation,
  getLocationsVisited,
  getNetworkStats,
  getRoad,
  getRoute,
  getTotalLength,
  getValidEndLocations,
  getValidStartLocations,
  hasProperSegments,
  InvalidAverageSpeedError,
  InvalidIdentificationError,
  InvalidSpeedLimitError,
  isIdentificationInUse,
  isTraversable,
  isValidAverageSpeed,
  isValidIdentification,
  isValidSpeedLimit,
  removeSegmentAt,
  setAverageSpeed,
  setBlocked,
  setCurrentDelay,
  setLength,
  setSpeedLimit,
  terminateRoad,
  terminateRoute,
  type NetworkStats,
} from "@roadnet/routing";
import type {
  CreateRoadRequest,
  CreateRouteRequest,
  SegmentRef,
  UpdateDirectionRequest,
  UpdateRoadRequest,
} from "../models/requests.js";
import type {
  RoadResponse,
  RouteLengthResponse,
  RouteLocationsResponse,
  RouteResponse,
  RouteTraversableResponse,
  RouteTravelTimeResponse,
} from "../models/responses.js";
import { toModelError } from "../models/model-error.js";

export class NetworkService {
  constructor(private readonly network: RoadNetwork = createNetwork()) {}

  private run<T>(action: () => T): T {
    try {
      return action();
    } catch (err) {
      throw toModelError(err);
    }
  }

  getStats(): NetworkStats {
    return getNetworkStats(this.network);
  }

  // ---------------------------------------------------------------------------
  // Roads
  // ---------------------------------------------------------------------------

  createRoad(request: CreateRoadRequest): RoadResponse {
    return this.run(() => toRoadResponse(createRoad(this.network, request)));
  }

  getRoad(roadId: string): RoadResponse {
    return this.run(() => toRoadResponse(getRoad(this.network, roadId)));
  }

  /**
   * Apply a partial update. Every new value is checked against the others
   * first, so either all of them are applied or none.
   */
  updateRoad(roadId: string, request: UpdateRoadRequest): RoadResponse {
    return this.run(() => {
      const road = getRoad(this.network, roadId);
      const { identification, lengthMeters } = request;
      const speedLimit = request.speedLimit ?? road.speedLimit;
      const averageSpeed = request.averageSpeed ?? road.averageSpeed;

      if (identification !== undefined) {
        if (!isValidIdentification(identification, this.network.identificationRules)) {
          throw new InvalidIdentificationError(identification);
        }
        if (isIdentificationInUse(this.network, identification)) {
          throw new DuplicateIdentificationError(identification);
        }
      }
      if (!isValidSpeedLimit(speedLimit)) {
        throw new InvalidSpeedLimitError(speedLimit);
      }
      if (!isValidAverageSpeed(averageSpeed, speedLimit)) {
        throw new InvalidAverageSpeedError(averageSpeed, speedLimit);
      }

      if (identification !== undefined) changeIdentification(this.network, road, identification);
      if (lengthMeters !== undefined) setLength(road, lengthMeters);
      // Lower whichever bound is in the way last
      if (speedLimit >= road.speedLimit) {
        setSpeedLimit(road, speedLimit);
        setAverageSpeed(road, averageSpeed);
      } else {
        setAverageSpeed(road, averageSpeed);
        setSpeedLimit(road, speedLimit);
      }
      return toRoadResponse(road);
    });
  }

  updateDirection(roadId: string, direction: RoadDirection, request: UpdateDirectionRequest): RoadResponse {
    return this.run(() => {
      const road = getRoad(this.network, roadId);
      if (request.currentDelay !== undefined) setCurrentDelay(road, direction, request.currentDelay);
      if (request.blocked !== undefined) setBlocked(road, direction, request.blocked);
      return toRoadResponse(road);
    });
  }

  terminateRoad(roadId: string): RoadResponse {
    return this.run(() => {
      const road = getRoad(this.network, roadId);
      terminateRoad(this.network, road);
      return toRoadResponse(road);
    });
  }

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------

  createRoute(request: CreateRouteRequest): RouteResponse {
    return this.run(() => this.toRouteResponse(createRoute(this.network, request.startLocation, request.segments)));
  }

  getRoute(routeId: string): RouteResponse {
    return this.run(() => this.toRouteResponse(getRoute(this.network, routeId)));
  }

  addSegment(routeId: string, segment: SegmentRef): RouteResponse {
    return this.run(() => {
      const route = getRoute(this.network, routeId);
      addSegment(this.network, route, segment);
      return this.toRouteResponse(route);
    });
  }

  changeSegment(routeId: string, index: number, segment: SegmentRef): RouteResponse {
    return this.run(() => {
      const route = getRoute(this.network, routeId);
      changeSegment(this.network, route, index, segment);
      return this.toRouteResponse(route);
    });
  }

  removeSegment(routeId: string, index: number): RouteResponse {
    return this.run(() => {
      const route = getRoute(this.network, routeId);
      removeSegmentAt(this.network, route, index);
      return this.toRouteResponse(route);
    });
  }

  terminateRoute(routeId: string): RouteResponse {
    return this.run(() => {
      const route = getRoute(this.network, routeId);
      terminateRoute(this.network, route);
      return this.toRouteResponse(route);
    });
  }

  getTotalLength(routeId: string): RouteLengthResponse {
    return this.run(() => ({
      routeId,
      totalLengthMeters: getTotalLength(this.network, getRoute(this.network, routeId)),
    }));
  }

  isTraversable(routeId: string): RouteTraversableResponse {
    return this.run(() => ({
      routeId,
      traversable: isTraversable(this.network, getRoute(this.network, routeId)),
    }));
  }

  getLocationsVisited(routeId: string): RouteLocationsResponse {
    return this.run(() => ({
      routeId,
      locations: getLocationsVisited(this.network, getRoute(this.network, routeId)),
    }));
  }

  estimateTravelTime(routeId: string): RouteTravelTimeResponse {
    return this.run(() => {
      const seconds = estimateTravelTime(this.network, getRoute(this.network, routeId));
      return { routeId, seconds: Number.isFinite(seconds) ? seconds : null };
    });
  }

  private toRouteResponse(route: Route): RouteResponse {
    return {
      id: route.id,
      startLocation: { ...route.startLocation },
      endLocation: getEndLocation(this.network, route) ?? null,
      segments: route.segments.map((s) => ({ ...s })),
      usedByRouteIds: [...route.usedByRouteIds],
      proper: hasProperSegments(this.network, route),
      terminated: route.terminated,
    };
  }
}

function toRoadResponse(road: Road): RoadResponse {
  return {
    id: road.id,
    identification: road.identification,
    directionality: road.directionality,
    endPoint1: { ...road.endPoint1 },
    endPoint2: { ...road.endPoint2 },
    lengthMeters: road.lengthMeters,
    speedLimit: road.speedLimit,
    averageSpeed: road.averageSpeed,
    forth: { ...road.forth },
    ...(road.directionality === "two-way" ? { opposite: { ...road.opposite } } : {}),
    validStartLocations: getValidStartLocations(road),
    validEndLocations: getValidEndLocations(road),
    routeIds: [...road.routeIds],
    terminated: road.terminated,
  };
}
