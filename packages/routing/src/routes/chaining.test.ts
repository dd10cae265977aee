import { describe, it, expect } from "vitest";
import type { Coordinate, Directionality, RoadNetwork } from "@roadnet/types";
import { createNetwork } from "../network/network.js";
import { createRoad } from "../roads/road.js";
import {
  appendRejection,
  canHaveAsSegment,
  getEndLocation,
  hasProperSegments,
  isContinuousChain,
  segmentEndpoints,
  walkChain,
} from "./chaining.js";
import { createRoute, removeSegmentAt } from "./route.js";
import { resolveSegment, roadSegment, routeSegment } from "./segment.js";

const A = { lat: 10, lng: 10 };
const B = { lat: 20, lng: 20 };
const C = { lat: 30, lng: 30 };
const D = { lat: 40, lng: 40 };

function road(
  network: RoadNetwork,
  identification: string,
  from: Coordinate,
  to: Coordinate,
  directionality: Directionality = "two-way",
) {
  return createRoad(network, {
    identification,
    endPoint1: from,
    endPoint2: to,
    lengthMeters: 1000,
    averageSpeed: 10,
    directionality,
  });
}

describe("getEndLocation", () => {
  it("is undefined for an empty route", () => {
    const network = createNetwork();
    const ab = road(network, "R1", A, B);
    const route = createRoute(network, A, [roadSegment(ab.id)]);
    removeSegmentAt(network, route, 0);
    expect(getEndLocation(network, route)).toBeUndefined();
  });

  it("leaves a single two-way road at the endpoint that is not the start", () => {
    const network = createNetwork();
    const ab = road(network, "R1", A, B);
    expect(getEndLocation(network, createRoute(network, A, [roadSegment(ab.id)]))).toEqual(B);
    expect(getEndLocation(network, createRoute(network, B, [roadSegment(ab.id)]))).toEqual(A);
  });

  it("ends a self-loop at its own location", () => {
    const network = createNetwork();
    const loop = road(network, "L1", A, A);
    expect(getEndLocation(network, createRoute(network, A, [roadSegment(loop.id)]))).toEqual(A);
  });

  it("follows a one-way road then a two-way road", () => {
    const network = createNetwork();
    const a1 = road(network, "A1", A, B, "one-way");
    const n1 = road(network, "N1", B, C);
    const route = createRoute(network, A, [roadSegment(a1.id), roadSegment(n1.id)]);
    expect(getEndLocation(network, route)).toEqual(C);
  });

  it("travels a two-way road backwards when the chain reaches its second endpoint", () => {
    const network = createNetwork();
    const ab = road(network, "R1", A, B);
    const cb = road(network, "R2", C, B);
    const route = createRoute(network, A, [roadSegment(ab.id), roadSegment(cb.id)]);
    expect(getEndLocation(network, route)).toEqual(C);
  });

  it("passes through a self-loop in the middle of a route", () => {
    const network = createNetwork();
    const ab = road(network, "R1", A, B);
    const loop = road(network, "L1", B, B);
    const bc = road(network, "R2", B, C);
    const route = createRoute(network, A, [roadSegment(ab.id), roadSegment(loop.id), roadSegment(bc.id)]);
    expect(getEndLocation(network, route)).toEqual(C);
  });

  it("uses a nested route's end location", () => {
    const network = createNetwork();
    const ab = road(network, "R1", A, B);
    const bc = road(network, "R2", B, C);
    const inner = createRoute(network, A, [roadSegment(ab.id), roadSegment(bc.id)]);
    const outer = createRoute(network, A, [routeSegment(inner.id)]);
    expect(getEndLocation(network, outer)).toEqual(C);
  });
});

describe("walkChain", () => {
  it("records the direction each road is travelled in", () => {
    const network = createNetwork();
    const ab = road(network, "R1", A, B);
    const steps = walkChain(network, A, [roadSegment(ab.id), roadSegment(ab.id)]);
    expect(steps.map((s) => (s.kind === "road" ? s.directions : []))).toEqual([["forth"], ["opposite"]]);
    expect(steps.map((s) => s.to)).toEqual([B, A]);
  });

  it("lists both directions for a two-way self-loop", () => {
    const network = createNetwork();
    const loop = road(network, "L1", A, A);
    const [step] = walkChain(network, A, [roadSegment(loop.id)]);
    expect(step?.kind === "road" && step.directions).toEqual(["forth", "opposite"]);
  });

  it("stops at the first segment that cannot be entered", () => {
    const network = createNetwork();
    const ab = road(network, "R1", A, B);
    const cd = road(network, "R2", C, D);
    const bc = road(network, "R3", B, C);
    const steps = walkChain(network, A, [roadSegment(ab.id), roadSegment(cd.id), roadSegment(bc.id)]);
    expect(steps).toHaveLength(1);
  });
});

describe("isContinuousChain", () => {
  it("only enters one-way roads at their first endpoint", () => {
    const network = createNetwork();
    const a1 = road(network, "A1", A, B, "one-way");
    expect(isContinuousChain(network, A, [roadSegment(a1.id)])).toBe(true);
    expect(isContinuousChain(network, B, [roadSegment(a1.id)])).toBe(false);
  });

  it("rejects an empty list", () => {
    const network = createNetwork();
    expect(isContinuousChain(network, A, [])).toBe(false);
  });

  it("requires a nested route to start where the chain is", () => {
    const network = createNetwork();
    const ab = road(network, "R1", A, B);
    const bc = road(network, "R2", B, C);
    const inner = createRoute(network, B, [roadSegment(bc.id)]);
    expect(isContinuousChain(network, A, [roadSegment(ab.id), routeSegment(inner.id)])).toBe(true);
    expect(isContinuousChain(network, A, [routeSegment(inner.id)])).toBe(false);
  });
});

describe("hasProperSegments", () => {
  it("holds for routes built through the API", () => {
    const network = createNetwork();
    const ab = road(network, "R1", A, B);
    const bc = road(network, "R2", B, C);
    const route = createRoute(network, A, [roadSegment(ab.id), roadSegment(bc.id)]);
    expect(hasProperSegments(network, route)).toBe(true);
  });

  it("fails when a road does not reference the route", () => {
    const network = createNetwork();
    const ab = road(network, "R1", A, B);
    const route = createRoute(network, A, [roadSegment(ab.id)]);
    ab.routeIds.delete(route.id);
    expect(hasProperSegments(network, route)).toBe(false);
  });

  it("fails when consecutive segments do not touch", () => {
    const network = createNetwork();
    const ab = road(network, "R1", A, B);
    const cd = road(network, "R2", C, D);
    const route = createRoute(network, A, [roadSegment(ab.id)]);
    route.segments.push(roadSegment(cd.id));
    cd.routeIds.add(route.id);
    expect(hasProperSegments(network, route)).toBe(false);
  });

  it("exempts an empty route only when asked to", () => {
    const network = createNetwork();
    const ab = road(network, "R1", A, B);
    const route = createRoute(network, A, [roadSegment(ab.id)]);
    removeSegmentAt(network, route, 0);
    expect(hasProperSegments(network, route)).toBe(false);
    expect(hasProperSegments(network, route, true)).toBe(true);
  });

  it("fails for a route that contains itself", () => {
    const network = createNetwork();
    const ab = road(network, "R1", A, B);
    const route = createRoute(network, A, [roadSegment(ab.id)]);
    route.segments.unshift(routeSegment(route.id));
    route.usedByRouteIds.push(route.id);
    expect(hasProperSegments(network, route)).toBe(false);
  });
});

describe("appendRejection", () => {
  it("accepts a road touching the current end", () => {
    const network = createNetwork();
    const ab = road(network, "R1", A, B);
    const cb = road(network, "R2", C, B);
    const route = createRoute(network, A, [roadSegment(ab.id)]);
    const candidate = roadSegment(cb.id);
    expect(appendRejection(network, route, candidate, resolveSegment(network, candidate))).toBeNull();
    expect(canHaveAsSegment(network, route, candidate, resolveSegment(network, candidate))).toBe(true);
  });

  it("explains a road that does not touch the current end", () => {
    const network = createNetwork();
    const ab = road(network, "R1", A, B);
    const cd = road(network, "C1", C, D);
    const route = createRoute(network, A, [roadSegment(ab.id)]);
    const candidate = roadSegment(cd.id);
    expect(appendRejection(network, route, candidate, resolveSegment(network, candidate))).toBe(
      "road C1 does not start at (20,20)",
    );
  });

  it("requires a one-way road to touch with its first endpoint", () => {
    const network = createNetwork();
    const ab = road(network, "R1", A, B);
    const cb = road(network, "W1", C, B, "one-way");
    const route = createRoute(network, A, [roadSegment(ab.id)]);
    const candidate = roadSegment(cb.id);
    expect(canHaveAsSegment(network, route, candidate, resolveSegment(network, candidate))).toBe(false);
  });

  it("rejects a route that contains the receiving route", () => {
    const network = createNetwork();
    const ab = road(network, "R1", A, B);
    const inner = createRoute(network, A, [roadSegment(ab.id)]);
    const outer = createRoute(network, A, [routeSegment(inner.id)]);

    const self = routeSegment(inner.id);
    expect(appendRejection(network, inner, self, resolveSegment(network, self))).toBe(
      `route ${inner.id} contains this route`,
    );
    const parent = routeSegment(outer.id);
    expect(appendRejection(network, inner, parent, resolveSegment(network, parent))).toBe(
      `route ${outer.id} contains this route`,
    );
  });
});

describe("segmentEndpoints", () => {
  it("spans a route's start and end", () => {
    const network = createNetwork();
    const ab = road(network, "R1", A, B);
    const bc = road(network, "R2", B, C);
    const route = createRoute(network, A, [roadSegment(ab.id), roadSegment(bc.id)]);
    expect(segmentEndpoints(network, resolveSegment(network, routeSegment(route.id)))).toEqual([A, C]);
    expect(segmentEndpoints(network, resolveSegment(network, roadSegment(bc.id)))).toEqual([B, C]);
  });
});
