import { Router } from "express";
import { z } from "zod";
import type { ConsolidateResponse, MemoryHistoryResponse } from "@convomem/shared";
import { validate } from "../middleware/validator.js";
import type { GraphMemoryService } from "../services/GraphMemoryService.js";
import { sendError } from "./httpErrors.js";

const sessionParamsSchema = z.object({
  sessionId: z.string().trim().min(1)
});

const consolidateBodySchema = z.object({
  session: z.string().trim().min(1).max(200),
  note: z.string().trim().min(1).max(2000).optional()
});

interface CreateMemoryRouterOptions {
  memory: GraphMemoryService;
}

export function createMemoryRouter(options: CreateMemoryRouterOptions): Router {
  const { memory } = options;
  const memoryRouter = Router();

  memoryRouter.post(
    "/consolidate",
    validate({ body: consolidateBodySchema }),
    async (req, res) => {
      const { session, note } = consolidateBodySchema.parse(req.body);

      try {
        const knowledge = await memory.consolidate(session, note);
        const response: ConsolidateResponse = { knowledge };
        res.status(201).json(response);
      } catch (error) {
        sendError(res, error, { sessionId: session });
      }
    }
  );

  memoryRouter.get("/:sessionId", validate({ params: sessionParamsSchema }), async (req, res) => {
    const { sessionId } = sessionParamsSchema.parse(req.params);

    try {
      const response: MemoryHistoryResponse = {
        sessionId,
        messages: await memory.listMessages(sessionId)
      };
      res.json(response);
    } catch (error) {
      sendError(res, error, { sessionId });
    }
  });

  return memoryRouter;
}
