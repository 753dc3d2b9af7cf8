import type { DialogueTurnInput } from "../services/llmTypes.js";

export const END_OF_DIALOGUE_MARKER = "[END]";

export function buildDialogueSystemPrompt(input: DialogueTurnInput): string {
  const { speaker, participants } = input;
  const others = participants
    .filter((participant) => participant.role !== speaker.role)
    .map((participant) => participant.role)
    .join(", ");

  return `
You are ${speaker.role}, participating in a round-table discussion with ${others}.
${speaker.persona ? `Persona: ${speaker.persona}` : ""}
Speak only as ${speaker.role}, in one or two short paragraphs, and move the discussion forward.
When the discussion has reached a natural conclusion, end your message with ${END_OF_DIALOGUE_MARKER}.
`.trim();
}

export function buildDialogueTurnPrompt(input: DialogueTurnInput): string {
  const lines: string[] = [];
  if (input.seedContext) {
    lines.push(`Topic: ${input.seedContext}`, "");
  }

  if (input.transcript.length === 0) {
    lines.push("You open the discussion.");
  } else {
    lines.push("Discussion so far:");
    for (const entry of input.transcript) {
      lines.push(`${entry.speaker}: ${entry.content}`);
    }
  }

  lines.push("", `Turn ${input.turnIndex + 1} of ${input.turnLimit}.`, `${input.speaker.role}:`);
  return lines.join("\n");
}
