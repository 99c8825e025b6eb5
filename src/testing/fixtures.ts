import type { KeywordMatch } from "../sentiment/keywordTaxonomy";
import type { GeneralPolarityEstimator, LexiconValenceEstimator } from "../sentiment/polarity";
import { SentimentAnalyzer } from "../sentiment/sentimentAnalyzer";
import type { SentimentResult, TextRiskLevel } from "../sentiment/types";
import { createLogger } from "../utils/logger";

export const silentLogger = createLogger("silent");

export const fixedClock = (iso = "2024-03-01T10:00:00.000Z") => () => new Date(iso);

export const fixedGeneral = (polarity = 0, subjectivity = 0): GeneralPolarityEstimator => ({
  estimate: () => ({ polarity, subjectivity })
});

/** Compound looked up by cleaned text, 0 for anything unlisted. */
export const lexiconByText = (compounds: Record<string, number> = {}): LexiconValenceEstimator => ({
  estimate: (text) => ({ positive: 0, neutral: 1, negative: 0, compound: compounds[text] ?? 0 })
});

export const stubAnalyzer = (compounds: Record<string, number> = {}, clock = fixedClock()): SentimentAnalyzer =>
  new SentimentAnalyzer({ generalEstimator: fixedGeneral(), lexiconEstimator: lexiconByText(compounds), clock });

export const makeResult = (
  overrides: { compound?: number; riskLevel?: TextRiskLevel; timestamp?: string; text?: string; concerns?: string[] } = {}
): SentimentResult => {
  const riskLevel = overrides.riskLevel ?? "low";
  const concerns = overrides.concerns ?? [];
  return {
    text: overrides.text ?? "placeholder",
    timestamp: overrides.timestamp ?? "2024-03-01T10:00:00.000Z",
    scores: {
      generalPolarity: 0,
      subjectivity: 0,
      lexiconPositive: 0,
      lexiconNeutral: 1,
      lexiconNegative: 0,
      lexiconCompound: overrides.compound ?? 0
    },
    overallSentiment: riskLevel === "high" ? "very_negative" : "neutral",
    emotionAnalysis: {
      highRiskCount: riskLevel === "high" ? concerns.length : 0,
      mediumRiskCount: riskLevel === "high" ? 0 : concerns.length,
      positiveCount: 0,
      detectedKeywords: concerns.map((term): KeywordMatch => [riskLevel === "high" ? "high_risk" : "medium_risk", term])
    },
    academicStress: { stressIndicators: 0, detectedTerms: [], hasAcademicStress: false },
    riskLevel,
    needsAttention: riskLevel !== "low",
    counselorReferral: riskLevel === "high",
    confidence: 1
  };
};
