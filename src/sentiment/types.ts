import type { AcademicStressAnalysis, EmotionAnalysis } from "./keywordTaxonomy";

export type OverallSentiment = "very_negative" | "negative" | "neutral" | "positive";

export type TextRiskLevel = "low" | "medium" | "high";

export interface SentimentScores {
  generalPolarity: number;
  subjectivity: number;
  lexiconPositive: number;
  lexiconNeutral: number;
  lexiconNegative: number;
  lexiconCompound: number;
}

export interface SentimentResult {
  text: string;
  timestamp: string;
  scores: SentimentScores;
  overallSentiment: OverallSentiment;
  emotionAnalysis: EmotionAnalysis;
  academicStress: AcademicStressAnalysis;
  riskLevel: TextRiskLevel;
  needsAttention: boolean;
  counselorReferral: boolean;
  confidence: number;
}

export type SentimentTrend = "improving" | "declining" | "stable" | "insufficient_data";

export interface RiskCounts {
  high: number;
  medium: number;
  low: number;
}

export interface SentimentTrendReport {
  trend: SentimentTrend | "no_data";
  averageSentiment: number;
  riskCounts: RiskCounts;
  totalAnalyses: number;
  needsIntervention: boolean;
}
