import { describe, expect, it } from "vitest";

import type { AcademicStressAnalysis, EmotionAnalysis } from "./keywordTaxonomy";
import { classifyOverallSentiment, classifyTextRisk, estimatorConfidence, roundTo } from "./riskFusion";

const emotion = (high = 0, medium = 0, positive = 0): EmotionAnalysis => ({
  highRiskCount: high,
  mediumRiskCount: medium,
  positiveCount: positive,
  detectedKeywords: []
});

const stress = (hasAcademicStress: boolean): AcademicStressAnalysis => ({
  stressIndicators: hasAcademicStress ? 2 : 0,
  detectedTerms: [],
  hasAcademicStress
});

describe("classifyOverallSentiment", () => {
  it("puts crisis keywords first", () => {
    expect(classifyOverallSentiment(0.9, 0.9, emotion(1, 0, 3))).toBe("very_negative");
  });

  it("prefers distress keywords over positive scores", () => {
    expect(classifyOverallSentiment(0.8, 0.8, emotion(0, 2, 1))).toBe("negative");
  });

  it("falls back to the mean of both estimates", () => {
    expect(classifyOverallSentiment(0.1, 0.1, emotion())).toBe("positive");
    expect(classifyOverallSentiment(-0.2, -0.2, emotion())).toBe("negative");
    expect(classifyOverallSentiment(0.05, -0.05, emotion())).toBe("neutral");
  });
});

describe("classifyTextRisk", () => {
  it("is high for any crisis keyword", () => {
    expect(classifyTextRisk(emotion(1), "very_negative", stress(false))).toBe("high");
  });

  it("is medium for repeated distress or negative academic stress", () => {
    expect(classifyTextRisk(emotion(0, 2), "negative", stress(false))).toBe("medium");
    expect(classifyTextRisk(emotion(0, 1), "negative", stress(true))).toBe("medium");
  });

  it("is low otherwise", () => {
    expect(classifyTextRisk(emotion(0, 1), "negative", stress(false))).toBe("low");
    expect(classifyTextRisk(emotion(), "positive", stress(true))).toBe("low");
  });
});

describe("estimatorConfidence", () => {
  it("measures agreement between estimators", () => {
    expect(estimatorConfidence(0.2, 0.2)).toBe(1);
    expect(estimatorConfidence(0.5, -0.5)).toBe(0.5);
    expect(estimatorConfidence(1, -1)).toBe(0);
  });
});

describe("roundTo", () => {
  it("rounds to three decimals by default", () => {
    expect(roundTo(0.12345)).toBe(0.123);
    expect(roundTo(66.666, 1)).toBe(66.7);
  });
});
