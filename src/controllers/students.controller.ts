import type { Request, Response } from "express";
import { z } from "zod";

import { HttpError } from "../app";
import type { StudentEvaluator } from "../interventions/interventionAgent";

// Field-level validation of each student happens in createStudentMetrics.
const batchSchema = z.object({
  students: z.array(z.unknown()).min(1).max(500)
});

export class StudentsController {
  constructor(private readonly evaluator: StudentEvaluator) {}

  async evaluate(req: Request, res: Response): Promise<void> {
    res.status(200).json({ ok: true, data: await this.evaluator.evaluate(req.body) });
  }

  async evaluateBatch(req: Request, res: Response): Promise<void> {
    const parsed = batchSchema.safeParse(req.body);
    if (!parsed.success) throw new HttpError(400, "Invalid request body", parsed.error.flatten());

    const evaluations = await this.evaluator.evaluateBatch(parsed.data.students);

    res.status(200).json({ ok: true, data: { total: evaluations.length, evaluations } });
  }

  async recommendations(req: Request, res: Response): Promise<void> {
    res.status(200).json({ ok: true, data: await this.evaluator.recommend(req.body) });
  }
}
