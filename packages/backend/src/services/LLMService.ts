import OpenAI from "openai";
import type { AppConfig } from "../config.js";
import { GeneratorError, errorMessage } from "../errors.js";
import { CompletionLimiter, isRetryableError } from "./CompletionLimiter.js";
import type {
  CompletionOptions,
  LLMConfig,
  OpenAICompatibleClient,
  TextCompletion
} from "./llmTypes.js";

type NormalizedLLMConfig = LLMConfig & {
  temperature: number;
  maxTokens: number;
};

export class LLMService implements TextCompletion {
  private readonly client: OpenAICompatibleClient;
  private readonly limiter: CompletionLimiter;
  private readonly config: NormalizedLLMConfig;

  constructor(
    config: LLMConfig,
    deps?: {
      client?: OpenAICompatibleClient;
      limiter?: CompletionLimiter;
    }
  ) {
    this.config = {
      ...config,
      temperature: config.temperature ?? 0.7,
      maxTokens: config.maxTokens ?? 1024
    };

    this.client =
      deps?.client ??
      new OpenAI({
        apiKey: this.config.apiKey,
        baseURL: this.config.baseURL,
        maxRetries: 0
      });

    this.limiter =
      deps?.limiter ??
      new CompletionLimiter({
        maxConcurrent: config.maxConcurrent ?? 4,
        maxRetries: config.maxRetries ?? 2,
        retryDelayMs: config.retryDelayMs ?? 1000,
        timeoutMs: config.timeoutMs ?? 60_000
      });
  }

  static fromConfig(config: AppConfig): LLMService {
    return new LLMService({
      apiKey: config.LLM_API_KEY,
      baseURL: config.LLM_BASE_URL,
      model: config.LLM_MODEL,
      temperature: config.LLM_TEMPERATURE,
      maxTokens: config.LLM_MAX_TOKENS,
      maxConcurrent: config.LLM_MAX_CONCURRENT,
      maxRetries: config.LLM_MAX_RETRIES,
      retryDelayMs: config.LLM_RETRY_DELAY_MS,
      timeoutMs: config.LLM_TIMEOUT_MS
    });
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const messages: Array<{ role: "system" | "user"; content: string }> = [];
    if (options.system) {
      messages.push({ role: "system", content: options.system });
    }
    messages.push({ role: "user", content: prompt });

    let content: string;
    try {
      const response = await this.limiter.run(
        (signal) =>
          this.client.chat.completions.create(
            {
              model: this.config.model,
              temperature: options.temperature ?? this.config.temperature,
              max_tokens: options.maxTokens ?? this.config.maxTokens,
              messages
            },
            { signal }
          ),
        options.signal
      );
      content = response.choices[0]?.message?.content?.trim() ?? "";
    } catch (error) {
      throw new GeneratorError(`Text completion failed: ${errorMessage(error)}`, isRetryableError(error), {
        cause: error
      });
    }

    if (content.length === 0) {
      throw new GeneratorError("Text completion returned no content", true);
    }
    return content;
  }

  async ping(): Promise<void> {
    try {
      await this.client.models.list();
    } catch (error) {
      throw new GeneratorError(`Model endpoint unreachable: ${errorMessage(error)}`, true, {
        cause: error
      });
    }
  }
}
