import type { Response } from "express";
import type { ApiErrorResponse } from "@convomem/shared";
import {
  AlreadyCommittedError,
  GeneratorError,
  InvalidDeltaError,
  InvalidSimulationRequestError,
  InvalidStateError,
  NoMessagesError,
  NotFoundError,
  StorageUnavailableError
} from "../errors.js";
import { logger } from "../utils/logger.js";

export function statusForError(error: unknown): number {
  if (error instanceof InvalidSimulationRequestError) {
    return 400;
  }
  if (error instanceof NotFoundError || error instanceof NoMessagesError) {
    return 404;
  }
  if (error instanceof InvalidStateError || error instanceof AlreadyCommittedError) {
    return 409;
  }
  if (error instanceof InvalidDeltaError) {
    return 422;
  }
  if (error instanceof GeneratorError) {
    return 502;
  }
  if (error instanceof StorageUnavailableError) {
    return 503;
  }
  return 500;
}

export function sendError(res: Response, error: unknown, context: Record<string, unknown> = {}): void {
  const status = statusForError(error);
  if (status >= 500) {
    logger.error({ ...context, err: error }, "Request failed");
  } else {
    logger.debug({ ...context, err: error }, "Request rejected");
  }

  const body: ApiErrorResponse = {
    error: status === 500 || !(error instanceof Error) ? "Internal server error" : error.message
  };
  if (error instanceof GeneratorError) {
    body.details = { transient: error.transient };
  }
  res.status(status).json(body);
}
