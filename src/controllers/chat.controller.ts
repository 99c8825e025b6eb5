import type { Request, Response } from "express";
import { z } from "zod";

import { HttpError } from "../app";
import type { SupportChatbot } from "../chat/supportChatbot";

const chatRequestSchema = z.object({
  studentId: z.string().min(1).max(100),
  sessionId: z.string().min(1).max(100).optional(),
  message: z.string().max(12_000)
});

const sessionParamSchema = z.object({
  sessionId: z.string().min(1).max(100)
});

const summaryRequestSchema = z.object({
  history: z.array(z.unknown()).max(1_000)
});

export class ChatController {
  constructor(private readonly chatbot: SupportChatbot) {}

  async handleChat(req: Request, res: Response): Promise<void> {
    const parsedBody = chatRequestSchema.safeParse(req.body);
    if (!parsedBody.success) {
      throw new HttpError(400, "Invalid request body", parsedBody.error.flatten());
    }

    const reply = await this.chatbot.handleMessage(parsedBody.data);

    res.status(200).json({ ok: true, data: reply });
  }

  async getSession(req: Request, res: Response): Promise<void> {
    const parsedParams = sessionParamSchema.safeParse(req.params);
    if (!parsedParams.success) {
      throw new HttpError(400, "Invalid session ID", parsedParams.error.flatten());
    }

    const { sessionId } = parsedParams.data;
    const session = this.chatbot.getSession(sessionId);
    const summary = this.chatbot.summarizeSession(sessionId);

    if (!session || !summary) {
      throw new HttpError(404, "Chat session not found");
    }

    res.status(200).json({ ok: true, data: { session, summary } });
  }

  async summarize(req: Request, res: Response): Promise<void> {
    const parsedBody = summaryRequestSchema.safeParse(req.body);
    if (!parsedBody.success) {
      throw new HttpError(400, "Invalid request body", parsedBody.error.flatten());
    }

    res.status(200).json({ ok: true, data: this.chatbot.summarizeHistory(parsedBody.data.history) });
  }
}
