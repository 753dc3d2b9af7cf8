import rateLimit from "express-rate-limit";
import type { RequestHandler } from "express";

export function createApiRateLimiter(options: { windowMs: number; limit: number }): RequestHandler {
  return rateLimit({
    windowMs: options.windowMs,
    limit: options.limit,
    standardHeaders: true,
    legacyHeaders: false
  });
}
