import { describe, it, expect, beforeEach } from "vitest";
import request from "supertest";
import type { Express } from "express";
import { createNetwork } from "@roadnet/routing";
import { createApp } from "./app.js";

const P1 = { lat: 10, lng: 10 };
const P2 = { lat: 20, lng: 20 };
const P3 = { lat: 30, lng: 30 };

function roadBody(identification: string, endPoint1: typeof P1, endPoint2: typeof P1, overrides: object = {}) {
  return {
    identification,
    endPoint1,
    endPoint2,
    lengthMeters: 1000,
    averageSpeed: 10,
    directionality: "two-way",
    ...overrides,
  };
}

describe("road network API", () => {
  let app: Express;

  beforeEach(() => {
    app = createApp(createNetwork());
  });

  async function createRoad(body: object): Promise<string> {
    const res = await request(app).post("/api/roads").send(body);
    expect(res.status).toBe(201);
    return res.body.id;
  }

  describe("GET /health", () => {
    it("reports network counts", async () => {
      await createRoad(roadBody("A1", P1, P2));
      const res = await request(app).get("/health");
      expect(res.status).toBe(200);
      expect(res.body.status).toBe("ok");
      expect(res.body.network).toEqual({
        activeRoads: 1,
        terminatedRoads: 0,
        activeRoutes: 0,
        terminatedRoutes: 0,
      });
    });
  });

  describe("roads", () => {
    it("creates a road with the default speed limit", async () => {
      const res = await request(app).post("/api/roads").send(roadBody("A1", P1, P2, { directionality: "one-way" }));
      expect(res.status).toBe(201);
      expect(res.body).toMatchObject({
        id: "road-0",
        identification: "A1",
        directionality: "one-way",
        speedLimit: 19.5,
        validStartLocations: [P1],
        validEndLocations: [P2],
        routeIds: [],
        terminated: false,
      });
      expect(res.body).not.toHaveProperty("opposite");
    });

    it("rejects a duplicate identification with a ModelError", async () => {
      await createRoad(roadBody("A1", P1, P2));
      const res = await request(app).post("/api/roads").send(roadBody("A1", P2, P3));
      expect(res.status).toBe(409);
      expect(res.body).toEqual({
        error: "ModelError",
        message: 'Road identification already in use: "A1"',
        cause: "DuplicateIdentificationError",
      });
    });

    it("rejects malformed bodies and out-of-bounds endpoints", async () => {
      const res = await request(app)
        .post("/api/roads")
        .send(roadBody("A1", { lat: 80, lng: 10 }, P2));
      expect(res.status).toBe(422);
      expect(res.body.cause).toBe("ValidationError");
    });

    it("returns 404 for unknown roads", async () => {
      const res = await request(app).get("/api/roads/road-7");
      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: "ModelError", message: "Unknown road: road-7", cause: "UnknownRoadError" });
    });

    it("updates properties all together or not at all", async () => {
      const id = await createRoad(roadBody("A1", P1, P2));

      const rejected = await request(app).patch(`/api/roads/${id}`).send({ identification: "B2", averageSpeed: 25 });
      expect(rejected.status).toBe(409);
      expect(rejected.body.cause).toBe("InvalidAverageSpeedError");
      expect((await request(app).get(`/api/roads/${id}`)).body.identification).toBe("A1");

      const res = await request(app)
        .patch(`/api/roads/${id}`)
        .send({ identification: "B2", lengthMeters: -40, speedLimit: 30, averageSpeed: 25 });
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ identification: "B2", lengthMeters: 40, speedLimit: 30, averageSpeed: 25 });
    });

    it("sets direction state and refuses negative delays", async () => {
      const id = await createRoad(roadBody("A1", P1, P2));
      const res = await request(app).put(`/api/roads/${id}/directions/opposite`).send({ currentDelay: 12, blocked: true });
      expect(res.status).toBe(200);
      expect(res.body.opposite).toEqual({ currentDelay: 12, blocked: true });
      expect(res.body.forth).toEqual({ currentDelay: 0, blocked: false });

      const negative = await request(app).put(`/api/roads/${id}/directions/forth`).send({ currentDelay: -1 });
      expect(negative.status).toBe(409);
      expect(negative.body.cause).toBe("InvalidDelayError");
    });

    it("reports the opposite direction of a one-way road as a contract violation", async () => {
      const id = await createRoad(roadBody("A1", P1, P2, { directionality: "one-way" }));
      const res = await request(app).put(`/api/roads/${id}/directions/opposite`).send({ blocked: true });
      expect(res.status).toBe(500);
      expect(res.body.cause).toBe("ContractViolationError");
    });

    it("terminates a road and frees its identification", async () => {
      const id = await createRoad(roadBody("A1", P1, P2));
      const res = await request(app).delete(`/api/roads/${id}`);
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ terminated: true, lengthMeters: 1, speedLimit: 0.1, averageSpeed: 0.1 });
      expect(await createRoad(roadBody("A1", P1, P2))).toBe("road-1");
    });
  });

  describe("routes", () => {
    it("answers length, traversability and locations for a one-way then two-way route", async () => {
      const a1 = await createRoad(roadBody("A1", P1, P2, { lengthMeters: 10000, directionality: "one-way" }));
      const n1 = await createRoad(roadBody("N1", P2, P3, { lengthMeters: 4000 }));

      const created = await request(app)
        .post("/api/routes")
        .send({
          startLocation: P1,
          segments: [
            { kind: "road", roadId: a1 },
            { kind: "road", roadId: n1 },
          ],
        });
      expect(created.status).toBe(201);
      expect(created.body).toMatchObject({ id: "route-0", endLocation: P3, proper: true, terminated: false });

      expect((await request(app).get("/api/routes/route-0/length")).body).toEqual({
        routeId: "route-0",
        totalLengthMeters: 14000,
      });
      expect((await request(app).get("/api/routes/route-0/locations")).body.locations).toEqual([P1, P2, P3]);
      expect((await request(app).get("/api/routes/route-0/traversable")).body.traversable).toBe(true);

      await request(app).put(`/api/roads/${n1}/directions/forth`).send({ blocked: true });
      expect((await request(app).get("/api/routes/route-0/traversable")).body.traversable).toBe(false);

      // 10000 / 10 + 4000 / 10
      expect((await request(app).get("/api/routes/route-0/travel-time")).body.seconds).toBe(1400);
    });

    it("edits segments and reports rejected edits", async () => {
      const ab = await createRoad(roadBody("R1", P1, P2));
      const bc = await createRoad(roadBody("R2", P2, P3));
      const cb = await createRoad(roadBody("R3", P3, P2));
      await request(app)
        .post("/api/routes")
        .send({ startLocation: P1, segments: [{ kind: "road", roadId: ab }] });

      const added = await request(app).post("/api/routes/route-0/segments").send({ kind: "road", roadId: bc });
      expect(added.status).toBe(200);
      expect(added.body.endLocation).toEqual(P3);

      const changed = await request(app).put("/api/routes/route-0/segments/1").send({ kind: "road", roadId: cb });
      expect(changed.status).toBe(200);
      expect(changed.body.segments).toEqual([
        { kind: "road", roadId: ab },
        { kind: "road", roadId: cb },
      ]);

      const broken = await request(app).delete("/api/routes/route-0/segments/0");
      expect(broken.status).toBe(409);
      expect(broken.body).toEqual({
        error: "ModelError",
        message: "Route route-0: removing segment 0 breaks the path",
        cause: "InvalidSegmentError",
      });

      const removed = await request(app).delete("/api/routes/route-0/segments/1");
      expect(removed.status).toBe(200);
      expect(removed.body.endLocation).toEqual(P2);
    });

    it("rejects an empty segment list", async () => {
      const res = await request(app).post("/api/routes").send({ startLocation: P1, segments: [] });
      expect(res.status).toBe(409);
      expect(res.body.cause).toBe("InvalidSegmentError");
    });

    it("rejects a non-numeric segment index", async () => {
      const res = await request(app).delete("/api/routes/route-0/segments/first");
      expect(res.status).toBe(422);
    });

    it("reports InvalidStateError once a route is broken by a road termination", async () => {
      const ab = await createRoad(roadBody("R1", P1, P2));
      const bc = await createRoad(roadBody("R2", P2, P3));
      const cd = await createRoad(roadBody("R3", P3, { lat: 40, lng: 40 }));
      await request(app)
        .post("/api/routes")
        .send({
          startLocation: P1,
          segments: [
            { kind: "road", roadId: ab },
            { kind: "road", roadId: bc },
            { kind: "road", roadId: cd },
          ],
        });
      await request(app).delete(`/api/roads/${bc}`);

      const route = await request(app).get("/api/routes/route-0");
      expect(route.body.proper).toBe(false);

      const res = await request(app).get("/api/routes/route-0/length");
      expect(res.status).toBe(409);
      expect(res.body.cause).toBe("InvalidStateError");
    });

    it("terminates a route in cascade", async () => {
      const ab = await createRoad(roadBody("R1", P1, P2));
      await request(app)
        .post("/api/routes")
        .send({ startLocation: P1, segments: [{ kind: "road", roadId: ab }] });

      const res = await request(app).delete("/api/routes/route-0");
      expect(res.status).toBe(200);
      expect(res.body.terminated).toBe(true);
      expect((await request(app).get(`/api/roads/${ab}`)).body.terminated).toBe(true);
    });
  });
});
