import { roundTo } from "./riskFusion";
import type { RiskCounts, SentimentResult, SentimentTrend, SentimentTrendReport } from "./types";

export const TREND_WINDOW = 3;
export const TREND_THRESHOLD = 0.1;

const mean = (values: number[]): number =>
  values.length === 0 ? 0 : values.reduce((acc, v) => acc + v, 0) / values.length;

/**
 * Compares the mean of the last (up to) three scores with the mean of everything before them.
 * With no earlier scores the baseline is 0.
 */
export const computeTrend = (scores: number[]): SentimentTrend => {
  if (scores.length < 2) return "insufficient_data";

  const recent = mean(scores.slice(-TREND_WINDOW));
  const earlier = mean(scores.slice(0, -TREND_WINDOW));

  if (recent > earlier + TREND_THRESHOLD) return "improving";
  if (recent < earlier - TREND_THRESHOLD) return "declining";
  return "stable";
};

export const countRiskLevels = (analyses: SentimentResult[]): RiskCounts => ({
  high: analyses.filter((a) => a.riskLevel === "high").length,
  medium: analyses.filter((a) => a.riskLevel === "medium").length,
  low: analyses.filter((a) => a.riskLevel === "low").length
});

export const buildTrendReport = (analyses: SentimentResult[]): SentimentTrendReport => {
  if (analyses.length === 0) {
    return {
      trend: "no_data",
      averageSentiment: 0,
      riskCounts: { high: 0, medium: 0, low: 0 },
      totalAnalyses: 0,
      needsIntervention: false
    };
  }

  const sorted = [...analyses].sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp));
  const scores = sorted.map((a) => a.scores.lexiconCompound);
  const riskCounts = countRiskLevels(sorted);

  return {
    trend: computeTrend(scores),
    averageSentiment: roundTo(mean(scores)),
    riskCounts,
    totalAnalyses: analyses.length,
    needsIntervention: riskCounts.high > 0 || riskCounts.medium >= 3
  };
};
