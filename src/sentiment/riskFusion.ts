import type { AcademicStressAnalysis, EmotionAnalysis } from "./keywordTaxonomy";
import type { OverallSentiment, TextRiskLevel } from "./types";

export const POLARITY_THRESHOLD = 0.1;

export const classifyOverallSentiment = (
  generalPolarity: number,
  compound: number,
  emotion: EmotionAnalysis
): OverallSentiment => {
  if (emotion.highRiskCount > 0) return "very_negative";
  if (emotion.mediumRiskCount > emotion.positiveCount) return "negative";

  const average = (generalPolarity + compound) / 2;
  if (average >= POLARITY_THRESHOLD) return "positive";
  if (average <= -POLARITY_THRESHOLD) return "negative";
  return "neutral";
};

export const classifyTextRisk = (
  emotion: EmotionAnalysis,
  overall: OverallSentiment,
  academicStress: AcademicStressAnalysis
): TextRiskLevel => {
  if (emotion.highRiskCount > 0) return "high";

  if (
    emotion.mediumRiskCount >= 2 ||
    overall === "very_negative" ||
    (overall === "negative" && academicStress.hasAcademicStress)
  ) {
    return "medium";
  }

  return "low";
};

export const roundTo = (value: number, digits = 3): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

/** Agreement between the two estimators: 1 when they match, 0 when they sit at opposite ends. */
export const estimatorConfidence = (generalPolarity: number, compound: number): number => {
  const agreement = 1 - Math.abs(generalPolarity - compound) / 2;
  return roundTo(Math.min(1, Math.max(0, agreement)));
};

export const needsAttentionFor = (risk: TextRiskLevel): boolean => risk === "medium" || risk === "high";

export const counselorReferralFor = (risk: TextRiskLevel): boolean => risk === "high";
