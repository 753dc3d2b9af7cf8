import { randomUUID } from "node:crypto";
import type {
  SimulationCommitResult,
  SimulationJob,
  SimulationJobStatus,
  SimulationJobSummary,
  SimulationParticipant,
  SimulationProgressRecord,
  SimulationRequest
} from "@convomem/shared";
import {
  AlreadyCommittedError,
  InvalidSimulationRequestError,
  InvalidStateError,
  NotFoundError,
  errorMessage
} from "../errors.js";
import type { GraphMemoryService } from "../services/GraphMemoryService.js";
import {
  buildSimulationDelta,
  simulationSessionId,
  transcriptMessages,
  type DeltaTranscriptEntry
} from "../services/graphDelta.js";
import type { DialogueGeneratorLike, DialogueTurn, Summarizer } from "../services/llmTypes.js";
import { logger } from "../utils/logger.js";

export type DeltaCommitter = Pick<GraphMemoryService, "applyDelta">;

export interface SimulationJobCoordinatorOptions {
  maxTurns: number;
  /** 0 disables the deadline. */
  timeoutSeconds: number;
  snapshotInterval: number;
  maxRetainedJobs: number;
  shortTermTtlMinutes: number;
  now?: () => Date;
}

interface JobRecord {
  job: SimulationJob;
  transcript: DeltaTranscriptEntry[];
  controller: AbortController;
  committing: boolean;
}

const terminalStatuses: ReadonlySet<SimulationJobStatus> = new Set([
  "completed",
  "failed",
  "cancelled"
]);

export function isTerminalStatus(status: SimulationJobStatus): boolean {
  return terminalStatuses.has(status);
}

/**
 * Runs simulated dialogues as background jobs. Callers poll snapshots of a
 * job; nothing reaches the graph until an operator commits a completed job.
 */
export class SimulationJobCoordinator {
  private readonly jobs = new Map<string, JobRecord>();
  private readonly tasks = new Map<string, Promise<void>>();
  private readonly now: () => Date;
  private readonly ttlMs: number;
  private closed = false;

  constructor(
    private readonly memory: DeltaCommitter,
    private readonly generator: DialogueGeneratorLike,
    private readonly summarizer: Summarizer,
    private readonly options: SimulationJobCoordinatorOptions
  ) {
    this.now = options.now ?? (() => new Date());
    this.ttlMs = options.shortTermTtlMinutes * 60_000;
  }

  get activeCount(): number {
    return this.tasks.size;
  }

  submit(request: SimulationRequest): SimulationJob {
    if (this.closed) {
      throw new InvalidSimulationRequestError("Simulation coordinator is shut down");
    }

    const participants = this.validateRequest(request);
    const createdAt = this.now();
    const job: SimulationJob = {
      id: randomUUID(),
      status: "queued",
      participants,
      turnLimit: request.turnLimit,
      progress: [],
      latestDelta: null,
      proposedDelta: null,
      summary: null,
      error: null,
      committed: false,
      createdAt,
      updatedAt: createdAt
    };
    const seedContext = request.seedContext?.trim();
    if (seedContext) {
      job.seedContext = seedContext;
    }

    const record: JobRecord = {
      job,
      transcript: [],
      controller: new AbortController(),
      committing: false
    };
    this.jobs.set(job.id, record);
    this.enforceRetention();
    this.schedule(record);

    logger.info(
      { jobId: job.id, participants: participants.length, turnLimit: job.turnLimit },
      "Simulation job queued"
    );
    return snapshot(job);
  }

  status(jobId: string): SimulationJob {
    return snapshot(this.require(jobId).job);
  }

  list(): SimulationJobSummary[] {
    return [...this.jobs.values()]
      .map(({ job }) => ({
        id: job.id,
        status: job.status,
        turnLimit: job.turnLimit,
        progressCount: job.progress.length,
        committed: job.committed,
        createdAt: job.createdAt,
        updatedAt: job.updatedAt
      }))
      .reverse();
  }

  cancel(jobId: string): SimulationJob {
    const record = this.require(jobId);
    if (!isTerminalStatus(record.job.status)) {
      this.transition(record, "cancelled");
      logger.info({ jobId }, "Simulation job cancelled");
    }
    return snapshot(record.job);
  }

  async commit(
    jobId: string,
    options: { sessionId?: string } = {}
  ): Promise<SimulationCommitResult> {
    const record = this.require(jobId);
    const { job } = record;
    if (job.committed || record.committing) {
      throw new AlreadyCommittedError(jobId);
    }
    if (job.status !== "completed" || !job.proposedDelta) {
      throw new InvalidStateError(jobId, job.status, "commit");
    }

    const delta = job.proposedDelta;
    const targetSessionId = options.sessionId ?? simulationSessionId(jobId);
    record.committing = true;
    try {
      const applied = await this.memory.applyDelta(delta, targetSessionId);
      const result: SimulationCommitResult = {
        jobId,
        sessionId: applied.sessionId,
        knowledgeId: applied.knowledge.id,
        messageIds: applied.messages.map((message) => message.id),
        nodeCount: delta.nodes.length,
        edgeCount: delta.edges.length,
        committedAt: this.now()
      };
      job.committed = true;
      job.commit = result;
      job.updatedAt = result.committedAt;

      logger.info(
        { jobId, sessionId: result.sessionId, knowledgeId: result.knowledgeId },
        "Simulation committed to graph"
      );
      return { ...result, messageIds: [...result.messageIds] };
    } finally {
      record.committing = false;
    }
  }

  discard(jobId: string): void {
    const record = this.require(jobId);
    this.transition(record, "cancelled");
    this.jobs.delete(jobId);
    logger.info({ jobId }, "Simulation job discarded");
  }

  async shutdown(): Promise<void> {
    this.closed = true;
    for (const record of this.jobs.values()) {
      if (!isTerminalStatus(record.job.status)) {
        this.transition(record, "cancelled");
        record.controller.abort();
      }
    }
    await Promise.allSettled([...this.tasks.values()]);
  }

  private validateRequest(request: SimulationRequest): SimulationParticipant[] {
    if (request.participants.length < 2) {
      throw new InvalidSimulationRequestError("A simulation needs at least two participants");
    }

    const seen = new Set<string>();
    const participants = request.participants.map((participant) => {
      const role = participant.role.trim();
      if (role.length === 0) {
        throw new InvalidSimulationRequestError("Participant roles must not be empty");
      }
      const key = role.toLowerCase();
      if (seen.has(key)) {
        throw new InvalidSimulationRequestError(`Duplicate participant role: ${role}`);
      }
      seen.add(key);

      const normalized: SimulationParticipant = { role };
      const persona = participant.persona?.trim();
      if (persona) {
        normalized.persona = persona;
      }
      return normalized;
    });

    const { turnLimit } = request;
    if (!Number.isInteger(turnLimit) || turnLimit < 1 || turnLimit > this.options.maxTurns) {
      throw new InvalidSimulationRequestError(
        `turnLimit must be an integer between 1 and ${this.options.maxTurns}`
      );
    }

    return participants;
  }

  private schedule(record: JobRecord): void {
    const jobId = record.job.id;
    const task = new Promise<void>((resolve) => {
      setTimeout(resolve, 0);
    })
      .then(() => this.run(record))
      .catch((error: unknown) => {
        logger.error({ jobId, err: error }, "Simulation run crashed");
        this.fail(record, `Simulation crashed: ${errorMessage(error)}`);
      })
      .finally(() => {
        this.tasks.delete(jobId);
      });

    this.tasks.set(jobId, task);
  }

  private async run(record: JobRecord): Promise<void> {
    const { job } = record;
    if (job.status !== "queued") {
      return;
    }
    this.transition(record, "running");

    const { timeoutSeconds } = this.options;
    const deadline =
      timeoutSeconds > 0
        ? setTimeout(() => {
            this.fail(record, `Simulation exceeded ${timeoutSeconds} seconds`);
          }, timeoutSeconds * 1000)
        : null;

    try {
      await this.runTurns(record);
      if (!this.isRunning(record)) {
        return;
      }
      await this.summarize(record);
    } finally {
      if (deadline) {
        clearTimeout(deadline);
      }
    }
  }

  private async runTurns(record: JobRecord): Promise<void> {
    const { job } = record;
    const snapshotInterval = Math.max(1, this.options.snapshotInterval);

    for (let turnIndex = 0; turnIndex < job.turnLimit; turnIndex += 1) {
      if (!this.isRunning(record)) {
        return;
      }

      const speaker = job.participants[turnIndex % job.participants.length];
      if (!speaker) {
        return;
      }

      let turn: DialogueTurn;
      try {
        turn = await this.generator.nextTurn({
          ...(job.seedContext !== undefined ? { seedContext: job.seedContext } : {}),
          participants: job.participants,
          speaker,
          transcript: record.transcript.map(({ speaker: name, content }) => ({
            speaker: name,
            content
          })),
          turnIndex,
          turnLimit: job.turnLimit,
          signal: record.controller.signal
        });
      } catch (error) {
        if (this.isRunning(record)) {
          this.fail(
            record,
            `Dialogue generation failed for ${speaker.role} at turn ${turnIndex + 1}: ${errorMessage(error)}`
          );
        }
        return;
      }

      // Cancelled or timed out while the turn was in flight.
      if (!this.isRunning(record)) {
        return;
      }

      const timestamp = this.now();
      record.transcript.push({ speaker: speaker.role, content: turn.content, timestamp });

      const isLast = turn.endOfDialogue || turnIndex === job.turnLimit - 1;
      const progress: SimulationProgressRecord = {
        turnIndex,
        speaker: speaker.role,
        content: turn.content,
        timestamp
      };
      if (isLast || (turnIndex + 1) % snapshotInterval === 0) {
        const delta = buildSimulationDelta({
          jobId: job.id,
          createdAt: job.createdAt,
          transcript: record.transcript,
          ttlMs: this.ttlMs
        });
        progress.delta = delta;
        job.latestDelta = delta;
      }
      job.progress.push(Object.freeze(progress));
      job.updatedAt = timestamp;

      logger.debug({ jobId: job.id, turnIndex, speaker: speaker.role }, "Simulation turn recorded");
      if (turn.endOfDialogue) {
        return;
      }
    }
  }

  private async summarize(record: JobRecord): Promise<void> {
    const { job } = record;
    let summary: string;
    try {
      summary = await this.summarizer.summarize(
        transcriptMessages(job.id, record.transcript, this.ttlMs),
        job.seedContext
      );
    } catch (error) {
      if (this.isRunning(record)) {
        this.fail(record, `Summary generation failed: ${errorMessage(error)}`);
      }
      return;
    }

    if (!this.isRunning(record)) {
      return;
    }

    job.summary = summary;
    job.proposedDelta = buildSimulationDelta({
      jobId: job.id,
      createdAt: job.createdAt,
      transcript: record.transcript,
      ttlMs: this.ttlMs,
      summary
    });
    this.transition(record, "completed");
    logger.info({ jobId: job.id, turns: job.progress.length }, "Simulation job completed");
  }

  private fail(record: JobRecord, message: string): void {
    if (isTerminalStatus(record.job.status)) {
      return;
    }
    record.job.error = message;
    this.transition(record, "failed");
    // Only a deadline or crash gets here with a call in flight.
    record.controller.abort();
    logger.warn({ jobId: record.job.id, error: message }, "Simulation job failed");
  }

  private transition(record: JobRecord, status: SimulationJobStatus): void {
    if (isTerminalStatus(record.job.status)) {
      return;
    }
    record.job.status = status;
    record.job.updatedAt = this.now();
  }

  private isRunning(record: JobRecord): boolean {
    return record.job.status === "running";
  }

  private require(jobId: string): JobRecord {
    const record = this.jobs.get(jobId);
    if (!record) {
      throw new NotFoundError("job", jobId);
    }
    return record;
  }

  private enforceRetention(): void {
    const limit = Math.max(1, this.options.maxRetainedJobs);
    if (this.jobs.size <= limit) {
      return;
    }

    for (const [jobId, record] of this.jobs) {
      if (this.jobs.size <= limit) {
        break;
      }
      if (isTerminalStatus(record.job.status) && !record.committing) {
        this.jobs.delete(jobId);
        logger.debug({ jobId }, "Simulation job superseded");
      }
    }
  }
}

// Pollers get a deep copy; the deltas stay private to the job.
function snapshot(job: SimulationJob): SimulationJob {
  return structuredClone(job);
}
