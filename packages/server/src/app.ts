import express from "express";
import cors from "cors";
import type { RoadNetwork } from "@roadnet/types";
import { createNetwork } from "@roadnet/routing";
import { createHealthRouter } from "./controllers/health.controller.js";
import { createRoadRouter } from "./controllers/road.controller.js";
import { createRouteRouter } from "./controllers/route.controller.js";
import { errorHandler } from "./middleware/error-handler.js";
import { NetworkService } from "./services/network.service.js";

export function createApp(network: RoadNetwork = createNetwork()): express.Express {
  const app = express();
  const service = new NetworkService(network);

  // Middleware
  app.use(cors());
  app.use(express.json());

  app.use("/health", createHealthRouter(service));
  app.use("/api/roads", createRoadRouter(service));
  app.use("/api/routes", createRouteRouter(service));

  // Error handler (must be after routes)
  app.use(errorHandler);

  return app;
}
