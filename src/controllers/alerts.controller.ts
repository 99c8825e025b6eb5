import type { Request, Response } from "express";
import { z } from "zod";

import { HttpError } from "../app";
import type { AlertSink } from "../alerts/alertSink";

const alertQuerySchema = z.object({
  studentId: z.string().min(1).max(100).optional()
});

export class AlertsController {
  constructor(private readonly alertSink: AlertSink) {}

  async list(req: Request, res: Response): Promise<void> {
    const parsedQuery = alertQuerySchema.safeParse(req.query);
    if (!parsedQuery.success) {
      throw new HttpError(400, "Invalid query", parsedQuery.error.flatten());
    }

    const alerts = await this.alertSink.list(parsedQuery.data.studentId);

    res.status(200).json({ ok: true, data: { total: alerts.length, alerts } });
  }
}
