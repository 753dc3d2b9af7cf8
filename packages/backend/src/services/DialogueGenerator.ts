import {
  END_OF_DIALOGUE_MARKER,
  buildDialogueSystemPrompt,
  buildDialogueTurnPrompt
} from "../prompts/index.js";
import type {
  CompletionOptions,
  DialogueGeneratorLike,
  DialogueTurn,
  DialogueTurnInput,
  TextCompletion
} from "./llmTypes.js";

/**
 * Produces one simulated participant turn. A reply carrying the end marker
 * closes the dialogue; the marker itself is not part of the stored content.
 */
export class DialogueGenerator implements DialogueGeneratorLike {
  constructor(private readonly completion: TextCompletion) {}

  async nextTurn(input: DialogueTurnInput): Promise<DialogueTurn> {
    const options: CompletionOptions = { system: buildDialogueSystemPrompt(input) };
    if (input.signal) {
      options.signal = input.signal;
    }

    const reply = await this.completion.complete(buildDialogueTurnPrompt(input), options);
    return parseDialogueReply(reply, input.speaker.role);
  }
}

export function parseDialogueReply(reply: string, speaker: string): DialogueTurn {
  let content = reply.trim();

  // Models often echo the speaker label back.
  const label = `${speaker}:`;
  if (content.toLowerCase().startsWith(label.toLowerCase())) {
    content = content.slice(label.length).trim();
  }

  const endOfDialogue = content.includes(END_OF_DIALOGUE_MARKER);
  if (endOfDialogue) {
    content = content.split(END_OF_DIALOGUE_MARKER).join("").trim();
  }

  return { content, endOfDialogue };
}
