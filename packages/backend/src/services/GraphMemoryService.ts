import { randomUUID } from "node:crypto";
import type {
  AbstractGraphStore,
  ConnectionState,
  GraphDelta,
  GraphFilter,
  GraphSnapshot,
  Knowledge,
  MemoryHealth,
  MessageRole,
  ShortTermMessage
} from "@convomem/shared";
import { NoMessagesError, StorageUnavailableError, errorMessage } from "../errors.js";
import { KeyedMutex } from "../utils/KeyedMutex.js";
import { logger } from "../utils/logger.js";
import type { FallbackCache } from "./FallbackCache.js";
import { readDeltaConversation } from "./graphDelta.js";
import { mergeCachedMessages } from "./graphView.js";
import type { Summarizer } from "./llmTypes.js";

export interface GraphMemoryServiceOptions {
  shortTermTtlMinutes: number;
  probeIntervalMs: number;
  now?: () => Date;
}

export interface AppliedDelta {
  sessionId: string;
  knowledge: Knowledge;
  messages: ShortTermMessage[];
}

/**
 * Short-term and long-term conversation memory on top of the graph store.
 *
 * The store connection is either `healthy` or `degraded`. While degraded,
 * `recordMessage` lands in the fallback cache and read paths merge the
 * cache into whatever the store returns. The first successful probe writes
 * the cache through in chain order and flips the state back.
 */
export class GraphMemoryService {
  private readonly locks = new KeyedMutex();
  private readonly lastSequence = new Map<string, number>();
  private readonly ttlMs: number;
  private readonly now: () => Date;
  private state: ConnectionState = "healthy";
  private lastError: string | undefined;
  private lastProbeAt = Number.NEGATIVE_INFINITY;
  private reconcilePromise: Promise<boolean> | null = null;
  // Bumped by reset so a reconcile started before it cannot write back.
  private generation = 0;

  constructor(
    private readonly store: AbstractGraphStore,
    private readonly cache: FallbackCache,
    private readonly summarizer: Summarizer,
    private readonly options: GraphMemoryServiceOptions
  ) {
    this.ttlMs = options.shortTermTtlMinutes * 60_000;
    this.now = options.now ?? (() => new Date());
  }

  get connectionState(): ConnectionState {
    return this.state;
  }

  get trackedSequenceCount(): number {
    return this.lastSequence.size;
  }

  async recordMessage(
    sessionId: string,
    role: MessageRole,
    content: string
  ): Promise<ShortTermMessage> {
    return this.locks.runExclusive(sessionId, async () => {
      const now = this.now();
      const message = this.buildMessage(sessionId, role, content, now);

      if (await this.ensureStore(false)) {
        try {
          await this.store.appendMessages([message]);
          return message;
        } catch (error) {
          this.markDegraded(error, "recordMessage");
        }
      }

      logger.debug({ sessionId, messageId: message.id }, "Message kept in fallback cache");
      return this.cache.append(message, now);
    });
  }

  async listMessages(sessionId: string): Promise<ShortTermMessage[]> {
    const now = this.now();
    let stored: ShortTermMessage[] = [];

    if (await this.ensureStore(false)) {
      try {
        stored = await this.store.listLiveMessages(sessionId, now);
      } catch (error) {
        this.markDegraded(error, "listMessages");
      }
    }

    return mergeMessages(stored, this.cache.list(now, sessionId));
  }

  async consolidate(sessionId: string, note?: string): Promise<Knowledge> {
    return this.locks.runExclusive(sessionId, async () => {
      if (!(await this.ensureStore(true))) {
        throw new StorageUnavailableError("consolidation");
      }

      const now = this.now();
      let stored: ShortTermMessage[];
      try {
        stored = await this.store.listLiveMessages(sessionId, now);
      } catch (error) {
        this.markDegraded(error, "consolidate");
        throw new StorageUnavailableError("consolidation", { cause: error });
      }

      const storedIds = new Set(stored.map((message) => message.id));
      const unflushed = this.cache
        .list(now, sessionId)
        .filter((message) => !storedIds.has(message.id));
      const sources = mergeMessages(stored, unflushed);
      if (sources.length === 0) {
        throw new NoMessagesError(sessionId);
      }

      const summary = await this.summarizer.summarize(sources, note);
      const knowledge: Knowledge = {
        id: randomUUID(),
        sessionId,
        summary,
        createdAt: this.now(),
        sourceMessageIds: sources.map((message) => message.id)
      };
      if (note !== undefined) {
        knowledge.note = note;
      }

      try {
        await this.store.writeConsolidation({
          messages: unflushed.map(withoutDegradedFlag),
          knowledge
        });
      } catch (error) {
        this.markDegraded(error, "consolidate");
        throw new StorageUnavailableError("consolidation", { cause: error });
      }
      this.cache.remove(unflushed.map((message) => message.id));

      logger.info(
        { sessionId, knowledgeId: knowledge.id, sourceCount: sources.length },
        "Session consolidated into knowledge"
      );
      return knowledge;
    });
  }

  async exportGraph(filter: GraphFilter = {}): Promise<GraphSnapshot> {
    let snapshot: GraphSnapshot = { nodes: [], edges: [] };

    if (await this.ensureStore(false)) {
      try {
        snapshot = await this.store.getSnapshot(filter);
      } catch (error) {
        this.markDegraded(error, "exportGraph");
      }
    }

    return mergeCachedMessages(snapshot, this.cache.list(this.now(), filter.sessionId));
  }

  /**
   * Persists a simulated dialogue as if it had happened live in `sessionId`:
   * fresh messages chained after any existing ones plus one knowledge node
   * sourced from all of them, in a single store transaction.
   */
  async applyDelta(delta: GraphDelta, sessionId: string): Promise<AppliedDelta> {
    const conversation = readDeltaConversation(delta);

    return this.locks.runExclusive(sessionId, async () => {
      if (!(await this.ensureStore(true))) {
        throw new StorageUnavailableError("simulation commit");
      }

      const now = this.now();
      const messages = conversation.messages.map((entry) =>
        this.buildMessage(sessionId, entry.role, entry.content, now)
      );
      const knowledge: Knowledge = {
        id: randomUUID(),
        sessionId,
        summary: conversation.summary,
        createdAt: now,
        sourceMessageIds: messages.map((message) => message.id)
      };

      try {
        await this.store.writeConsolidation({ messages, knowledge });
      } catch (error) {
        this.markDegraded(error, "applyDelta");
        throw new StorageUnavailableError("simulation commit", { cause: error });
      }

      return { sessionId, knowledge, messages };
    });
  }

  async reset(): Promise<void> {
    this.generation += 1;
    while (this.reconcilePromise) {
      await this.reconcilePromise;
    }

    try {
      await this.store.clear();
    } catch (error) {
      this.markDegraded(error, "reset");
      throw new StorageUnavailableError("graph reset", { cause: error });
    }

    this.cache.clear();
    this.lastSequence.clear();
    this.markHealthy();
    logger.warn("Graph memory reset");
  }

  async health(): Promise<MemoryHealth> {
    if (this.state === "healthy") {
      await this.probeStore();
    } else {
      await this.reconcile();
    }

    const health: MemoryHealth = {
      state: this.state,
      storeReachable: this.state === "healthy",
      fallbackActive: this.state === "degraded",
      fallbackSize: this.cache.size(this.now())
    };
    if (this.lastError !== undefined) {
      health.lastError = this.lastError;
    }
    return health;
  }

  /**
   * Probes the store and, when it answers, writes every cached message
   * through. Concurrent callers share one attempt.
   */
  reconcile(): Promise<boolean> {
    if (!this.reconcilePromise) {
      this.reconcilePromise = this.runReconcile().finally(() => {
        this.reconcilePromise = null;
      });
    }
    return this.reconcilePromise;
  }

  private async runReconcile(): Promise<boolean> {
    const generation = this.generation;
    this.lastProbeAt = this.now().getTime();
    if (!(await this.probeStore())) {
      return false;
    }

    let flushed = 0;
    for (;;) {
      if (generation !== this.generation) {
        logger.debug("Reconcile superseded by a graph reset");
        return false;
      }
      const pending = this.cache.list(this.now());
      if (pending.length === 0) {
        break;
      }

      try {
        await this.store.appendMessages(pending.map(withoutDegradedFlag));
      } catch (error) {
        this.markDegraded(error, "reconcile");
        return false;
      }
      this.cache.remove(pending.map((message) => message.id));
      flushed += pending.length;
    }

    if (flushed > 0) {
      logger.info({ flushed }, "Fallback cache written through to graph store");
    }
    this.markHealthy();
    return true;
  }

  private async probeStore(): Promise<boolean> {
    try {
      if (await this.store.probe()) {
        return true;
      }
      this.markDegraded(new Error("Graph store probe failed"), "probe");
    } catch (error) {
      this.markDegraded(error, "probe");
    }
    return false;
  }

  private async ensureStore(force: boolean): Promise<boolean> {
    if (this.state === "healthy") {
      return true;
    }

    const sinceProbe = this.now().getTime() - this.lastProbeAt;
    if (!force && sinceProbe < this.options.probeIntervalMs) {
      return false;
    }

    return this.reconcile();
  }

  private buildMessage(
    sessionId: string,
    role: MessageRole,
    content: string,
    now: Date
  ): ShortTermMessage {
    const createdAt = new Date(now.getTime());
    return {
      id: randomUUID(),
      sessionId,
      role,
      content,
      sequence: this.nextSequence(sessionId, createdAt),
      createdAt,
      expiresAt: new Date(createdAt.getTime() + this.ttlMs)
    };
  }

  // Wall-clock milliseconds, bumped past the previous position of the session.
  // Only sessions bumped ahead of the clock need remembering.
  private nextSequence(sessionId: string, now: Date): number {
    const nowMs = now.getTime();
    const last = this.lastSequence.get(sessionId) ?? 0;
    const sequence = Math.max(nowMs, last + 1);

    for (const [key, value] of this.lastSequence) {
      if (value < nowMs) {
        this.lastSequence.delete(key);
      }
    }
    this.lastSequence.set(sessionId, sequence);
    return sequence;
  }


  private markDegraded(error: unknown, operation: string): void {
    this.lastError = errorMessage(error);
    if (this.state === "degraded") {
      return;
    }

    this.state = "degraded";
    this.lastProbeAt = this.now().getTime();
    logger.warn({ err: error, operation }, "Graph store unreachable, switching to fallback cache");
  }

  private markHealthy(): void {
    this.lastError = undefined;
    if (this.state === "healthy") {
      return;
    }

    this.state = "healthy";
    logger.info("Graph store reachable again");
  }
}

function mergeMessages(
  stored: ShortTermMessage[],
  cached: ShortTermMessage[]
): ShortTermMessage[] {
  const byId = new Map<string, ShortTermMessage>();
  for (const message of stored) {
    byId.set(message.id, message);
  }
  for (const message of cached) {
    if (!byId.has(message.id)) {
      byId.set(message.id, message);
    }
  }
  return [...byId.values()].sort((a, b) => a.sequence - b.sequence);
}

function withoutDegradedFlag(message: ShortTermMessage): ShortTermMessage {
  const { degraded: _degraded, ...rest } = message;
  return rest;
}
