import { dispositionFor, type RiskTier } from "../risk/riskTier";
import type { StudentMetrics } from "../risk/studentMetrics";
import type { SentimentResult, TextRiskLevel } from "../sentiment/types";

export type AlertType = "academic_risk" | "high_risk_chat" | "high_risk_feedback";

export type AlertSource = "structured" | "chat" | "feedback";

export interface Alert {
  studentId: string;
  riskLevel: RiskTier | TextRiskLevel;
  alertType: AlertType;
  source: AlertSource;
  message: string;
  recommendedContactWindow: string;
  sentimentScore?: number;
  timestamp: string;
}

const EXCERPT_LENGTH = 100;

const CONTACT_WINDOW: Record<RiskTier | TextRiskLevel, string> = {
  "Critical Risk": "Within 24 hours",
  "High Risk": "Within 3 days",
  "Medium Risk": "Within 2 weeks",
  Safe: "Next routine check-in",
  high: "Within 24 hours",
  medium: "Within 1 week",
  low: "Next routine check-in"
};

// Counted in code points so a surrogate pair is never split.
export const excerpt = (text: string): string => {
  const chars = Array.from(text);
  return chars.length > EXCERPT_LENGTH ? `${chars.slice(0, EXCERPT_LENGTH).join("")}...` : text;
};

/** Escalation only: Safe and Medium Risk students never produce an alert record. */
export const decideStudentAlert = (
  studentId: string,
  metrics: StudentMetrics,
  tier: RiskTier,
  now: Date = new Date()
): Alert | null => {
  if (dispositionFor(tier) !== "escalate") return null;

  return {
    studentId,
    riskLevel: tier,
    alertType: "academic_risk",
    source: "structured",
    message:
      `${metrics.name ?? studentId} is at ${tier.toUpperCase()} of academic failure ` +
      `(attendance ${metrics.attendance}%, average score ${metrics.averageScore}%, ` +
      `engagement ${metrics.engagementScore}%, assignments ${metrics.assignmentsSubmitted}/${metrics.totalAssignments}).`,
    recommendedContactWindow: CONTACT_WINDOW[tier],
    timestamp: now.toISOString()
  };
};

export const decideSentimentAlert = (
  studentId: string,
  source: Exclude<AlertSource, "structured">,
  result: SentimentResult,
  now: Date = new Date()
): Alert | null => {
  if (dispositionFor(result.riskLevel) !== "escalate") return null;

  return {
    studentId,
    riskLevel: result.riskLevel,
    alertType: source === "chat" ? "high_risk_chat" : "high_risk_feedback",
    source,
    message: `High-risk sentiment detected in ${source}: ${excerpt(result.text)}`,
    recommendedContactWindow: CONTACT_WINDOW[result.riskLevel],
    sentimentScore: result.scores.lexiconCompound,
    timestamp: now.toISOString()
  };
};

export const renderGuardianEmail = (metrics: StudentMetrics, alert: Alert): { subject: string; body: string } => {
  const name = metrics.name ?? alert.studentId;
  return {
    subject: `URGENT: Academic Alert for ${name}`,
    body: [
      "Dear Parent/Guardian,",
      "",
      `This is an automated alert regarding ${name} (ID: ${alert.studentId}).`,
      "",
      `Current status: ${alert.riskLevel}.`,
      "",
      "Current performance:",
      `- Attendance: ${metrics.attendance}%`,
      `- Average Score: ${metrics.averageScore}%`,
      `- Engagement: ${metrics.engagementScore}%`,
      `- Assignments: ${metrics.assignmentsSubmitted}/${metrics.totalAssignments}`,
      "",
      "Actions requested:",
      `1. Schedule a meeting with the academic advisor (${alert.recommendedContactWindow.toLowerCase()})`,
      "2. Review attendance barriers",
      "3. Discuss academic support options",
      "4. Create an improvement plan",
      "",
      "Please contact the school administration as soon as possible."
    ].join("\n")
  };
};

export const renderSmsText = (metrics: StudentMetrics, alert: Alert): string =>
  `URGENT ALERT: ${metrics.name ?? alert.studentId} is at ${alert.riskLevel.toUpperCase()} academically. ` +
  `Attendance: ${metrics.attendance}%, Score: ${metrics.averageScore}%. Please contact school immediately.`;
