import type { Request, Response } from "express";
import { z } from "zod";

import { HttpError } from "../app";
import { assessTextRisk } from "../interventions/textAssessment";
import type { SentimentAnalyzer } from "../sentiment/sentimentAnalyzer";
import { parsePriorAnalyses } from "../sentiment/sentimentResultSchema";

const MAX_TEXT_LENGTH = 20_000;

const analyzeSchema = z.object({
  text: z.string().max(MAX_TEXT_LENGTH)
});

const batchSchema = z.object({
  texts: z.array(z.string().max(MAX_TEXT_LENGTH)).min(1).max(100)
});

const trendsSchema = z.object({
  analyses: z.array(z.unknown()).max(1_000)
});

export class SentimentController {
  constructor(private readonly analyzer: SentimentAnalyzer) {}

  async analyze(req: Request, res: Response): Promise<void> {
    const parsed = analyzeSchema.safeParse(req.body);
    if (!parsed.success) throw new HttpError(400, "Invalid request body", parsed.error.flatten());

    const analysis = this.analyzer.analyze(parsed.data.text);

    res.status(200).json({ ok: true, data: { analysis, assessment: assessTextRisk(analysis) } });
  }

  async analyzeBatch(req: Request, res: Response): Promise<void> {
    const parsed = batchSchema.safeParse(req.body);
    if (!parsed.success) throw new HttpError(400, "Invalid request body", parsed.error.flatten());

    res.status(200).json({ ok: true, data: this.analyzer.analyzeBatch(parsed.data.texts) });
  }

  async trends(req: Request, res: Response): Promise<void> {
    const parsed = trendsSchema.safeParse(req.body);
    if (!parsed.success) throw new HttpError(400, "Invalid request body", parsed.error.flatten());

    const analyses = parsePriorAnalyses(parsed.data.analyses);

    res.status(200).json({ ok: true, data: this.analyzer.getSentimentTrends(analyses) });
  }
}
