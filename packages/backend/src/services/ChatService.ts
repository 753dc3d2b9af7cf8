import type { ChatRole, ShortTermMessage } from "@convomem/shared";
import { CHAT_SYSTEM_PROMPT, buildChatPrompt } from "../prompts/index.js";
import type { GraphMemoryService } from "./GraphMemoryService.js";
import type { TextCompletion } from "./llmTypes.js";

interface ChatServiceOptions {
  historyLimit: number;
}

const defaultOptions: ChatServiceOptions = {
  historyLimit: 20
};

interface SendMessageInput {
  sessionId: string;
  content: string;
  role?: Exclude<ChatRole, "assistant">;
}

export interface ChatTurnResult {
  message: ShortTermMessage;
  reply: ShortTermMessage;
  history: ShortTermMessage[];
  degraded: boolean;
}

export class ChatService {
  private readonly options: ChatServiceOptions;

  constructor(
    private readonly memory: GraphMemoryService,
    private readonly completion: TextCompletion,
    options: Partial<ChatServiceOptions> = {}
  ) {
    this.options = { ...defaultOptions, ...options };
  }

  /**
   * Records the incoming message, then answers from the live history. A
   * generator failure propagates after the incoming message is recorded.
   */
  async sendMessage(input: SendMessageInput): Promise<ChatTurnResult> {
    const message = await this.memory.recordMessage(
      input.sessionId,
      input.role ?? "user",
      input.content
    );

    const live = await this.memory.listMessages(input.sessionId);
    const context = live.slice(-this.options.historyLimit);
    const replyText = await this.completion.complete(buildChatPrompt(context), {
      system: CHAT_SYSTEM_PROMPT
    });

    const reply = await this.memory.recordMessage(input.sessionId, "assistant", replyText);
    const history = await this.memory.listMessages(input.sessionId);

    return {
      message,
      reply,
      history,
      degraded: Boolean(message.degraded || reply.degraded)
    };
  }
}
