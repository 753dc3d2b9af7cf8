import type { ShortTermMessage } from "@convomem/shared";
import { SUMMARY_SYSTEM_PROMPT, buildSummaryPrompt } from "../prompts/index.js";
import type { Summarizer, TextCompletion } from "./llmTypes.js";

export class ConversationSummarizer implements Summarizer {
  constructor(
    private readonly completion: TextCompletion,
    private readonly options: { temperature?: number } = {}
  ) {}

  summarize(messages: ShortTermMessage[], note?: string): Promise<string> {
    return this.completion.complete(buildSummaryPrompt(messages, note), {
      system: SUMMARY_SYSTEM_PROMPT,
      temperature: this.options.temperature ?? 0.2
    });
  }
}
