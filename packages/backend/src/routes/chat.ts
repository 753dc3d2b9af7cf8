import { Router } from "express";
import { z } from "zod";
import type { ChatResponse } from "@convomem/shared";
import { validate } from "../middleware/validator.js";
import type { ChatService } from "../services/ChatService.js";
import { sendError } from "./httpErrors.js";

const chatBodySchema = z.object({
  session: z.string().trim().min(1).max(200),
  content: z.string().trim().min(1).max(20_000),
  role: z.enum(["user", "system"]).optional()
});

interface CreateChatRouterOptions {
  chatService: ChatService;
}

export function createChatRouter(options: CreateChatRouterOptions): Router {
  const { chatService } = options;
  const chatRouter = Router();

  chatRouter.post("/", validate({ body: chatBodySchema }), async (req, res) => {
    const { session, content, role } = chatBodySchema.parse(req.body);

    try {
      const result = await chatService.sendMessage({
        sessionId: session,
        content,
        ...(role ? { role } : {})
      });
      const response: ChatResponse = {
        sessionId: session,
        message: result.message,
        reply: result.reply,
        degraded: result.degraded,
        history: result.history
      };
      res.json(response);
    } catch (error) {
      sendError(res, error, { sessionId: session });
    }
  });

  return chatRouter;
}
