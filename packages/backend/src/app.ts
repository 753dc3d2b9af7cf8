import cors from "cors";
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { requestLogger } from "./middleware/logger.js";
import { createApiRateLimiter } from "./middleware/rateLimiter.js";
import { createChatRouter } from "./routes/chat.js";
import { createGraphRouter } from "./routes/graph.js";
import { createHealthRouter } from "./routes/health.js";
import { createMemoryRouter } from "./routes/memory.js";
import { createSimulationRouter } from "./routes/simulation.js";
import { checkLlmConnection, neo4jConnectionStatus } from "./runtime/connectivity.js";
import type { Runtime } from "./runtime/container.js";
import { logger } from "./utils/logger.js";

export function createApp(runtime: Runtime, options: { startTime?: number } = {}): Express {
  const { config } = runtime;
  const app = express();

  app.use(requestLogger);
  app.use(cors({ origin: config.CORS_ORIGIN }));
  app.use(express.json({ limit: "1mb" }));
  app.use(
    createApiRateLimiter({
      windowMs: config.RATE_LIMIT_WINDOW_MS,
      limit: config.RATE_LIMIT_MAX
    })
  );

  app.use("/api/chat", createChatRouter({ chatService: runtime.chat }));
  app.use("/api/memory", createMemoryRouter({ memory: runtime.memory }));
  app.use("/api/graph", createGraphRouter({ memory: runtime.memory }));
  app.use("/api/simulation", createSimulationRouter({ coordinator: runtime.simulations }));
  app.use(
    "/api/health",
    createHealthRouter({
      memory: runtime.memory,
      neo4jStatus: (storeReachable) => neo4jConnectionStatus(config, storeReachable),
      checkLlm: () => checkLlmConnection({ config, completion: runtime.completion }),
      ...(options.startTime !== undefined ? { startTime: options.startTime } : {})
    })
  );

  app.use((_req, res) => {
    res.status(404).json({ error: "Route not found" });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError && "body" in err) {
      res.status(400).json({ error: "Malformed JSON body" });
      return;
    }
    logger.error({ err }, "Unhandled error");
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
