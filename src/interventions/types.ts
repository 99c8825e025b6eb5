import type { RiskTier } from "../risk/riskTier";

export type InterventionPriority = "High" | "Medium" | "Low";

export type InterventionCategory =
  | "Attendance"
  | "Academic Performance"
  | "Engagement"
  | "Assignment Completion"
  | "General Support";

export interface Intervention {
  priority: InterventionPriority;
  category: InterventionCategory;
  action: string;
  timeline: string;
}

export interface InterventionPlan {
  type: "rule_based";
  riskTier: RiskTier;
  assessment: string;
  interventions: Intervention[];
  totalInterventions: number;
}

export interface GeneratedRecommendations {
  type: "ai_generated";
  riskTier: RiskTier;
  recommendations: string;
}

export type RecommendationOutcome = GeneratedRecommendations | InterventionPlan;

export interface SupportResource {
  type: "crisis" | "professional" | "academic";
  name: string;
  contact?: string;
  description?: string;
}
