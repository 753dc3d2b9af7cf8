import { Router } from "express";
import type { HealthResponse, ServiceConnectionStatus } from "@convomem/shared";
import type { GraphMemoryService } from "../services/GraphMemoryService.js";
import { logger } from "../utils/logger.js";
import { sendError } from "./httpErrors.js";

interface CreateHealthRouterOptions {
  memory: Pick<GraphMemoryService, "health">;
  neo4jStatus: (storeReachable: boolean) => ServiceConnectionStatus;
  checkLlm: () => Promise<ServiceConnectionStatus>;
  startTime?: number;
}

export function createHealthRouter(options: CreateHealthRouterOptions): Router {
  const startTime = options.startTime ?? Date.now();
  const healthRouter = Router();

  healthRouter.get("/", async (_req, res) => {
    try {
      const [memory, llm] = await Promise.all([options.memory.health(), options.checkLlm()]);
      const neo4j = options.neo4jStatus(memory.storeReachable);
      const status: HealthResponse["status"] =
        !memory.storeReachable || memory.fallbackActive || llm === "failed" ? "degraded" : "ok";

      if (status === "degraded") {
        logger.debug({ neo4j, llm, fallbackSize: memory.fallbackSize }, "Health check degraded");
      }

      const response: HealthResponse = {
        status,
        timestamp: new Date().toISOString(),
        uptimeSec: Math.max(0, Math.floor((Date.now() - startTime) / 1000)),
        checks: {
          neo4j,
          llm
        },
        memory
      };
      res.json(response);
    } catch (error) {
      sendError(res, error);
    }
  });

  return healthRouter;
}
