import type { RequestHandler } from "express";
import { logger } from "../utils/logger.js";

const pollingPattern = /^\/api\/simulation\/run\/[^/]+$/;

export const requestLogger: RequestHandler = (req, res, next) => {
  const startTime = Date.now();

  res.on("finish", () => {
    const entry = {
      method: req.method,
      url: req.originalUrl,
      statusCode: res.statusCode,
      durationMs: Date.now() - startTime
    };

    // Job polls log at debug.
    const path = req.originalUrl.split("?")[0] ?? "";
    if (req.method === "GET" && pollingPattern.test(path)) {
      logger.debug(entry, "HTTP request");
      return;
    }
    logger.info(entry, "HTTP request");
  });

  next();
};
