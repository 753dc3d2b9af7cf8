import type { ShortTermMessage } from "@convomem/shared";
import { formatTranscript } from "./chat.js";

export const SUMMARY_SYSTEM_PROMPT =
  "You condense conversations into durable knowledge. Reply with the summary only.";

export function buildSummaryPrompt(messages: ShortTermMessage[], note?: string): string {
  const sections = [
    "Summarize the following conversation focusing on stable knowledge:",
    "facts, decisions and preferences that stay true after the conversation ends.",
    "",
    formatTranscript(messages)
  ];
  if (note && note.trim().length > 0) {
    sections.push("", `Operator note: ${note.trim()}`);
  }
  return sections.join("\n");
}
