import type { Request, Response } from "express";
import { z } from "zod";

import { HttpError } from "../app";
import type { FeedbackService } from "../feedback/feedbackService";

const feedbackSchema = z.object({
  studentId: z.string().min(1).max(100),
  text: z.string().min(1).max(20_000),
  feedbackType: z.enum(["general", "course", "wellbeing"]).optional()
});

export class FeedbackController {
  constructor(private readonly feedback: FeedbackService) {}

  async submit(req: Request, res: Response): Promise<void> {
    const parsed = feedbackSchema.safeParse(req.body);
    if (!parsed.success) throw new HttpError(400, "Invalid request body", parsed.error.flatten());

    const outcome = await this.feedback.submit(parsed.data);

    res.status(201).json({ ok: true, data: outcome });
  }
}
