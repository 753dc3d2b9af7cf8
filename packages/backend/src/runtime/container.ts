import type { AbstractGraphStore } from "@convomem/shared";
import { appConfig, type AppConfig } from "../config.js";
import { ChatService } from "../services/ChatService.js";
import { ConversationSummarizer } from "../services/ConversationSummarizer.js";
import { DialogueGenerator } from "../services/DialogueGenerator.js";
import { FallbackCache } from "../services/FallbackCache.js";
import { GraphMemoryService } from "../services/GraphMemoryService.js";
import { LLMService } from "../services/LLMService.js";
import type { DialogueGeneratorLike, Summarizer, TextCompletion } from "../services/llmTypes.js";
import { SimulationJobCoordinator } from "../simulation/SimulationJobCoordinator.js";
import { Neo4jGraphStore } from "../store/Neo4jGraphStore.js";
import { logger } from "../utils/logger.js";

export interface RuntimeOverrides {
  store?: AbstractGraphStore;
  completion?: TextCompletion;
  summarizer?: Summarizer;
  generator?: DialogueGeneratorLike;
  now?: () => Date;
}

export interface Runtime {
  config: AppConfig;
  store: AbstractGraphStore;
  completion: TextCompletion;
  memory: GraphMemoryService;
  chat: ChatService;
  simulations: SimulationJobCoordinator;
  /** Connects the store in the background; failures leave memory degraded. */
  start(): Promise<void>;
  close(): Promise<void>;
}

/**
 * Builds every long-lived service once. Routers receive these instances
 * explicitly; nothing else holds a reference to them.
 */
export function createRuntime(
  config: AppConfig = appConfig,
  overrides: RuntimeOverrides = {}
): Runtime {
  const store = overrides.store ?? Neo4jGraphStore.fromConfig(config);
  const completion = overrides.completion ?? LLMService.fromConfig(config);
  const summarizer = overrides.summarizer ?? new ConversationSummarizer(completion);
  const generator = overrides.generator ?? new DialogueGenerator(completion);

  const memory = new GraphMemoryService(
    store,
    new FallbackCache({ maxEntries: config.FALLBACK_MAX_ENTRIES }),
    summarizer,
    {
      shortTermTtlMinutes: config.SHORT_TERM_TTL_MINUTES,
      probeIntervalMs: config.STORE_PROBE_INTERVAL_MS,
      ...(overrides.now ? { now: overrides.now } : {})
    }
  );
  const chat = new ChatService(memory, completion, { historyLimit: config.CHAT_HISTORY_LIMIT });
  const simulations = new SimulationJobCoordinator(memory, generator, summarizer, {
    maxTurns: config.SIMULATION_MAX_TURNS,
    timeoutSeconds: config.SIMULATION_TIMEOUT_SECONDS,
    snapshotInterval: config.SIMULATION_SNAPSHOT_INTERVAL,
    maxRetainedJobs: config.SIMULATION_MAX_RETAINED_JOBS,
    shortTermTtlMinutes: config.SHORT_TERM_TTL_MINUTES,
    ...(overrides.now ? { now: overrides.now } : {})
  });

  return {
    config,
    store,
    completion,
    memory,
    chat,
    simulations,
    async start() {
      try {
        await store.connect();
        logger.info("Graph store connected");
      } catch (error) {
        logger.warn({ err: error }, "Graph store unavailable at startup, running degraded");
      }
      await memory.reconcile();
    },
    async close() {
      await simulations.shutdown();
      await store.disconnect();
    }
  };
}
