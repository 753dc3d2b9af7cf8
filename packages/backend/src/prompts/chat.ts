import type { ShortTermMessage } from "@convomem/shared";

export const CHAT_SYSTEM_PROMPT = `
You are a helpful assistant with a short-term conversational memory.
Answer the latest user message using the conversation so far.
Keep answers concise and do not invent earlier exchanges.
`.trim();

export function formatTranscript(messages: Array<Pick<ShortTermMessage, "role" | "content">>): string {
  return messages.map((message) => `${message.role}: ${message.content}`).join("\n");
}

export function buildChatPrompt(history: ShortTermMessage[]): string {
  return `${formatTranscript(history)}\nassistant:`;
}
