import { Router } from "express";
import { z } from "zod";
import type { GraphExportResponse, GraphResetResponse } from "@convomem/shared";
import { validate } from "../middleware/validator.js";
import type { GraphMemoryService } from "../services/GraphMemoryService.js";
import { logger } from "../utils/logger.js";
import { sendError } from "./httpErrors.js";

const exportQuerySchema = z.object({
  session: z.string().trim().min(1).optional()
});

const resetQuerySchema = z.object({
  confirm: z.literal("true", {
    errorMap: () => ({ message: "Pass confirm=true to clear the graph" })
  })
});

interface CreateGraphRouterOptions {
  memory: GraphMemoryService;
}

export function createGraphRouter(options: CreateGraphRouterOptions): Router {
  const { memory } = options;
  const graphRouter = Router();

  graphRouter.get("/", validate({ query: exportQuerySchema }), async (req, res) => {
    const { session } = exportQuerySchema.parse(req.query);

    try {
      const snapshot = await memory.exportGraph(session ? { sessionId: session } : {});
      const response: GraphExportResponse = snapshot;
      res.json(response);
    } catch (error) {
      sendError(res, error, { sessionId: session });
    }
  });

  graphRouter.delete("/", validate({ query: resetQuerySchema }), async (_req, res) => {
    try {
      await memory.reset();
      logger.warn("Graph memory cleared");
      const response: GraphResetResponse = { status: "graph cleared" };
      res.json(response);
    } catch (error) {
      sendError(res, error);
    }
  });

  return graphRouter;
}
