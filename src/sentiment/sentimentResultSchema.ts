import { z } from "zod";

import { MalformedSentimentResultError } from "../errors";
import type { SentimentResult } from "./types";

const riskLevelSchema = z.enum(["low", "medium", "high"]);

export const sentimentResultSchema = z.object({
  text: z.string(),
  timestamp: z.string().datetime({ offset: true }),
  scores: z.object({
    generalPolarity: z.number().min(-1).max(1),
    subjectivity: z.number().min(0).max(1),
    lexiconPositive: z.number().min(0).max(1),
    lexiconNeutral: z.number().min(0).max(1),
    lexiconNegative: z.number().min(0).max(1),
    lexiconCompound: z.number().min(-1).max(1)
  }),
  overallSentiment: z.enum(["very_negative", "negative", "neutral", "positive"]),
  emotionAnalysis: z.object({
    highRiskCount: z.number().int().min(0),
    mediumRiskCount: z.number().int().min(0),
    positiveCount: z.number().int().min(0),
    detectedKeywords: z.array(z.tuple([z.enum(["high_risk", "medium_risk", "positive"]), z.string()]))
  }),
  academicStress: z.object({
    stressIndicators: z.number().int().min(0),
    detectedTerms: z.array(z.string()),
    hasAcademicStress: z.boolean()
  }),
  riskLevel: riskLevelSchema,
  needsAttention: z.boolean(),
  counselorReferral: z.boolean(),
  confidence: z.number().min(0).max(1)
}) satisfies z.ZodType<SentimentResult>;

/** Prior analyses handed back by callers must be complete; nothing is defaulted. */
export const parsePriorAnalyses = (values: unknown[]): SentimentResult[] =>
  values.map((value, index) => {
    const parsed = sentimentResultSchema.safeParse(value);
    if (!parsed.success) {
      throw new MalformedSentimentResultError(
        index,
        parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      );
    }
    return parsed.data;
  });
