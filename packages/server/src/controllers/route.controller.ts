import { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import { createRouteSchema, segmentIndexSchema, segmentRefSchema } from "../models/requests.js";
import type { NetworkService } from "../services/network.service.js";

type RouteParams = { routeId: string };
type SegmentParams = { routeId: string; index: string };

export function createRouteRouter(service: NetworkService): Router {
  const router = Router();

  /** POST /api/routes */
  router.post("/", (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = createRouteSchema.parse(req.body);
      res.status(201).json(service.createRoute(body));
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/routes/:routeId */
  router.get("/:routeId", (req: Request<RouteParams>, res: Response, next: NextFunction) => {
    try {
      res.json(service.getRoute(req.params.routeId));
    } catch (err) {
      next(err);
    }
  });

  /** DELETE /api/routes/:routeId - terminate, cascading to its segments */
  router.delete("/:routeId", (req: Request<RouteParams>, res: Response, next: NextFunction) => {
    try {
      res.json(service.terminateRoute(req.params.routeId));
    } catch (err) {
      next(err);
    }
  });

  // ─── Segments ──────────────────────────────────────────────────────────────

  router.post("/:routeId/segments", (req: Request<RouteParams>, res: Response, next: NextFunction) => {
    try {
      const segment = segmentRefSchema.parse(req.body);
      res.json(service.addSegment(req.params.routeId, segment));
    } catch (err) {
      next(err);
    }
  });

  router.put("/:routeId/segments/:index", (req: Request<SegmentParams>, res: Response, next: NextFunction) => {
    try {
      const index = segmentIndexSchema.parse(req.params.index);
      const segment = segmentRefSchema.parse(req.body);
      res.json(service.changeSegment(req.params.routeId, index, segment));
    } catch (err) {
      next(err);
    }
  });

  router.delete("/:routeId/segments/:index", (req: Request<SegmentParams>, res: Response, next: NextFunction) => {
    try {
      const index = segmentIndexSchema.parse(req.params.index);
      res.json(service.removeSegment(req.params.routeId, index));
    } catch (err) {
      next(err);
    }
  });

  // ─── Queries ───────────────────────────────────────────────────────────────

  router.get("/:routeId/length", (req: Request<RouteParams>, res: Response, next: NextFunction) => {
    try {
      res.json(service.getTotalLength(req.params.routeId));
    } catch (err) {
      next(err);
    }
  });

  router.get("/:routeId/traversable", (req: Request<RouteParams>, res: Response, next: NextFunction) => {
    try {
      res.json(service.isTraversable(req.params.routeId));
    } catch (err) {
      next(err);
    }
  });

  router.get("/:routeId/locations", (req: Request<RouteParams>, res: Response, next: NextFunction) => {
    try {
      res.json(service.getLocationsVisited(req.params.routeId));
    } catch (err) {
      next(err);
    }
  });

  router.get("/:routeId/travel-time", (req: Request<RouteParams>, res: Response, next: NextFunction) => {
    try {
      res.json(service.estimateTravelTime(req.params.routeId));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
