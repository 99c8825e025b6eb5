import type { SentimentResult, TextRiskLevel } from "../sentiment/types";
import { ACADEMIC_RESOURCES, CRISIS_RESOURCES } from "./resources";
import type { SupportResource } from "./types";

export interface TextRiskAssessment {
  riskLevel: TextRiskLevel;
  narrative: string;
  resources: SupportResource[];
}

const concernList = (result: SentimentResult): string => {
  const terms = result.emotionAnalysis.detectedKeywords
    .filter(([tag]) => tag !== "positive")
    .map(([, term]) => `"${term}"`);
  return terms.length > 0 ? terms.join(", ") : "none";
};

const narrativeFor = (result: SentimentResult): string => {
  switch (result.riskLevel) {
    case "high":
      return (
        `Crisis language detected (${concernList(result)}). ` +
        `This student should be contacted by a counselor as soon as possible and given crisis resources.`
      );
    case "medium":
      return (
        `Signs of distress detected (concerns: ${concernList(result)}; overall sentiment ${result.overallSentiment}). ` +
        `Flag for counselor review and follow up with the student this week.`
      );
    case "low":
      return `No distress signals detected (overall sentiment ${result.overallSentiment}). Continue routine check-ins.`;
  }
};

export const supportResourcesFor = (result: SentimentResult): SupportResource[] => [
  ...(result.riskLevel === "high" ? CRISIS_RESOURCES : []),
  ...(result.academicStress.hasAcademicStress ? ACADEMIC_RESOURCES : [])
];

export const assessTextRisk = (result: SentimentResult): TextRiskAssessment => ({
  riskLevel: result.riskLevel,
  narrative: narrativeFor(result),
  resources: supportResourcesFor(result)
});
