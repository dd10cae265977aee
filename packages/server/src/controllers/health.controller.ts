import { Router } from "express";
import type { Request, Response } from "express";
import type { HealthResponse } from "../models/responses.js";
import type { NetworkService } from "../services/network.service.js";

export function createHealthRouter(service: NetworkService): Router {
  const router = Router();

  /** GET /health - health check with road and route counts */
  router.get("/", (_req: Request, res: Response) => {
    const body: HealthResponse = {
      status: "ok",
      uptime: process.uptime(),
      network: service.getStats(),
    };
    res.json(body);
  });

  return router;
}
