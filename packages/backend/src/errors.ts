export class MemoryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class StorageUnavailableError extends MemoryError {
  constructor(operation: string, options?: { cause?: unknown }) {
    super(`Graph store unavailable during ${operation}`, options);
  }
}

export class NoMessagesError extends MemoryError {
  constructor(readonly sessionId: string) {
    super(`No live short-term messages for session ${sessionId}`);
  }
}

export class NotFoundError extends MemoryError {
  constructor(readonly kind: "job" | "session", readonly id: string) {
    super(`${kind === "job" ? "Simulation job" : "Session"} ${id} not found`);
  }
}

export class InvalidStateError extends MemoryError {
  constructor(readonly jobId: string, readonly status: string, operation: string) {
    super(`Cannot ${operation} simulation job ${jobId} while it is ${status}`);
  }
}

export class AlreadyCommittedError extends MemoryError {
  constructor(readonly jobId: string) {
    super(`Simulation job ${jobId} has already been committed`);
  }
}

export class GeneratorError extends MemoryError {
  constructor(message: string, readonly transient: boolean, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class InvalidSimulationRequestError extends MemoryError {
  constructor(message: string) {
    super(message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class InvalidDeltaError extends MemoryError {
  constructor(message: string) {
    super(`Malformed graph delta: ${message}`);
  }
}
