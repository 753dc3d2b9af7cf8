import type { ShortTermMessage, SimulationParticipant } from "@convomem/shared";

export interface CompletionOptions {
  system?: string;
  signal?: AbortSignal;
  temperature?: number;
  maxTokens?: number;
}

/**
 * The single text-completion capability behind chat replies, summaries and
 * simulated dialogue turns. Failures are reported as `GeneratorError`.
 */
export interface TextCompletion {
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
  ping(): Promise<void>;
}

export interface Summarizer {
  summarize(messages: ShortTermMessage[], note?: string): Promise<string>;
}

export interface TranscriptEntry {
  speaker: string;
  content: string;
}

export interface DialogueTurnInput {
  seedContext?: string;
  participants: SimulationParticipant[];
  speaker: SimulationParticipant;
  transcript: TranscriptEntry[];
  turnIndex: number;
  turnLimit: number;
  signal?: AbortSignal;
}

export interface DialogueTurn {
  content: string;
  /** The speaker closed the conversation; no further turns are requested. */
  endOfDialogue: boolean;
}

export interface DialogueGeneratorLike {
  nextTurn(input: DialogueTurnInput): Promise<DialogueTurn>;
}

export interface LLMConfig {
  apiKey: string;
  baseURL: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
  maxConcurrent?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
}

export interface CompletionLimitConfig {
  maxConcurrent: number;
  maxRetries: number;
  retryDelayMs: number;
  timeoutMs: number;
}

export interface OpenAICompatibleClient {
  chat: {
    completions: {
      create: (
        body: {
          model: string;
          messages: Array<{ role: "system" | "user" | "assistant"; content: string }>;
          temperature?: number;
          max_tokens?: number;
        },
        options?: { signal?: AbortSignal }
      ) => Promise<{
        choices: Array<{ message?: { content?: string | null } }>;
      }>;
    };
  };
  models: {
    list: () => Promise<unknown>;
  };
}
