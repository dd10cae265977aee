import { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import {
  createRoadSchema,
  directionSchema,
  updateDirectionSchema,
  updateRoadSchema,
} from "../models/requests.js";
import type { NetworkService } from "../services/network.service.js";

export function createRoadRouter(service: NetworkService): Router {
  const router = Router();

  /** POST /api/roads */
  router.post("/", (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = createRoadSchema.parse(req.body);
      res.status(201).json(service.createRoad(body));
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/roads/:roadId */
  router.get("/:roadId", (req: Request<{ roadId: string }>, res: Response, next: NextFunction) => {
    try {
      res.json(service.getRoad(req.params.roadId));
    } catch (err) {
      next(err);
    }
  });

  /** PATCH /api/roads/:roadId - identification, length and speeds */
  router.patch("/:roadId", (req: Request<{ roadId: string }>, res: Response, next: NextFunction) => {
    try {
      const body = updateRoadSchema.parse(req.body);
      res.json(service.updateRoad(req.params.roadId, body));
    } catch (err) {
      next(err);
    }
  });

  /** PUT /api/roads/:roadId/directions/:direction - delay and blocked state */
  router.put(
    "/:roadId/directions/:direction",
    (req: Request<{ roadId: string; direction: string }>, res: Response, next: NextFunction) => {
      try {
        const direction = directionSchema.parse(req.params.direction);
        const body = updateDirectionSchema.parse(req.body);
        res.json(service.updateDirection(req.params.roadId, direction, body));
      } catch (err) {
        next(err);
      }
    },
  );

  /** DELETE /api/roads/:roadId - terminate */
  router.delete("/:roadId", (req: Request<{ roadId: string }>, res: Response, next: NextFunction) => {
    try {
      res.json(service.terminateRoad(req.params.roadId));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
