import { Router } from "express";
import { z } from "zod";
import type {
  SimulationCommitResponse,
  SimulationJobListResponse,
  SimulationJobResponse,
  SimulationRunResponse
} from "@convomem/shared";
import { validate } from "../middleware/validator.js";
import type { SimulationJobCoordinator } from "../simulation/SimulationJobCoordinator.js";
import { sendError } from "./httpErrors.js";

const participantSchema = z.object({
  role: z.string().trim().min(1).max(100),
  persona: z.string().trim().max(2000).optional()
});

const runBodySchema = z.object({
  participants: z.array(participantSchema).min(2),
  turnLimit: z.number().int().min(1),
  seedContext: z.string().trim().max(5000).optional()
});

const jobParamsSchema = z.object({
  jobId: z.string().trim().min(1)
});

const commitBodySchema = z.object({
  jobId: z.string().trim().min(1),
  sessionId: z.string().trim().min(1).max(200).optional()
});

interface CreateSimulationRouterOptions {
  coordinator: SimulationJobCoordinator;
}

export function createSimulationRouter(options: CreateSimulationRouterOptions): Router {
  const { coordinator } = options;
  const simulationRouter = Router();

  simulationRouter.post("/run", validate({ body: runBodySchema }), (req, res) => {
    const { participants, turnLimit, seedContext } = runBodySchema.parse(req.body);

    try {
      const job = coordinator.submit({
        participants: participants.map(({ role, persona }) => (persona ? { role, persona } : { role })),
        turnLimit,
        ...(seedContext ? { seedContext } : {})
      });
      const response: SimulationRunResponse = { jobId: job.id, status: job.status };
      res.status(202).json(response);
    } catch (error) {
      sendError(res, error);
    }
  });

  simulationRouter.get("/run", (_req, res) => {
    const response: SimulationJobListResponse = { jobs: coordinator.list() };
    res.json(response);
  });

  simulationRouter.get("/run/:jobId", validate({ params: jobParamsSchema }), (req, res) => {
    const { jobId } = jobParamsSchema.parse(req.params);

    try {
      const response: SimulationJobResponse = { job: coordinator.status(jobId) };
      res.json(response);
    } catch (error) {
      sendError(res, error, { jobId });
    }
  });

  simulationRouter.post(
    "/run/:jobId/cancel",
    validate({ params: jobParamsSchema }),
    (req, res) => {
      const { jobId } = jobParamsSchema.parse(req.params);

      try {
        const response: SimulationJobResponse = { job: coordinator.cancel(jobId) };
        res.json(response);
      } catch (error) {
        sendError(res, error, { jobId });
      }
    }
  );

  simulationRouter.delete("/run/:jobId", validate({ params: jobParamsSchema }), (req, res) => {
    const { jobId } = jobParamsSchema.parse(req.params);

    try {
      coordinator.discard(jobId);
      res.status(204).end();
    } catch (error) {
      sendError(res, error, { jobId });
    }
  });

  simulationRouter.post("/commit", validate({ body: commitBodySchema }), async (req, res) => {
    const { jobId, sessionId } = commitBodySchema.parse(req.body);

    try {
      const commit = await coordinator.commit(jobId, sessionId ? { sessionId } : {});
      const response: SimulationCommitResponse = { commit };
      res.json(response);
    } catch (error) {
      sendError(res, error, { jobId });
    }
  });

  return simulationRouter;
}
