import type { RiskTier } from "../risk/riskTier";
import { completionRate, type StudentMetrics } from "../risk/studentMetrics";
import type { Intervention, InterventionCategory, InterventionPlan, InterventionPriority } from "./types";

type Rule = (metrics: StudentMetrics, tier: RiskTier) => Intervention[];

const item = (
  priority: InterventionPriority,
  category: InterventionCategory,
  action: string,
  timeline: string
): Intervention => ({ priority, category, action, timeline });

const attendanceRule: Rule = ({ attendance }) => {
  if (attendance < 60) {
    return [
      item("High", "Attendance", "Schedule immediate meeting with student to discuss attendance barriers", "Within 1 week"),
      item("High", "Attendance", "Contact parents/guardians about attendance concerns", "Within 3 days")
    ];
  }
  if (attendance < 75) {
    return [
      item("Medium", "Attendance", "Send attendance reminder and offer flexible scheduling options", "Within 2 weeks")
    ];
  }
  return [];
};

const averageScoreRule: Rule = ({ averageScore }) => {
  if (averageScore < 50) {
    return [
      item("High", "Academic Performance", "Enroll in intensive tutoring program (3x per week)", "Start immediately"),
      item("High", "Academic Performance", "Provide personalized study plan with weekly check-ins", "Ongoing for 6 weeks")
    ];
  }
  if (averageScore < 70) {
    return [
      item("Medium", "Academic Performance", "Assign peer tutor or study buddy", "Within 1 week"),
      item("Medium", "Academic Performance", "Offer supplementary learning materials and practice tests", "Ongoing")
    ];
  }
  return [];
};

const engagementRule: Rule = ({ engagementScore }) => {
  if (engagementScore < 40) {
    return [
      item("High", "Engagement", "One-on-one counseling to identify motivation barriers", "Within 1 week"),
      item("Medium", "Engagement", "Introduce gamified learning activities to boost interest", "Within 2 weeks")
    ];
  }
  if (engagementScore < 60) {
    return [item("Medium", "Engagement", "Invite to join study groups or academic clubs", "Within 2 weeks")];
  }
  return [];
};

const completionRule: Rule = (metrics) => {
  const rate = completionRate(metrics);
  if (rate < 50) {
    return [
      item("High", "Assignment Completion", "Create assignment tracking system with deadline reminders", "Start immediately"),
      item("Medium", "Assignment Completion", "Break down large assignments into smaller, manageable tasks", "Ongoing")
    ];
  }
  if (rate < 70) {
    return [item("Medium", "Assignment Completion", "Send weekly assignment reminders and progress updates", "Ongoing")];
  }
  return [];
};

const generalSupportRule: Rule = (_metrics, tier) => {
  if (tier === "Critical Risk") {
    return [
      item(
        "High",
        "General Support",
        "EMERGENCY: Immediate intervention required - contact student and parents today",
        "Within 24 hours"
      ),
      item("High", "General Support", "Schedule emergency meeting with academic dean and counselor", "Within 2 days"),
      item("High", "General Support", "Consider immediate academic probation or withdrawal prevention plan", "Within 1 week")
    ];
  }
  if (tier === "High Risk") {
    return [
      item("High", "General Support", "Assign dedicated academic advisor for weekly monitoring", "Immediate and ongoing"),
      item("High", "General Support", "Consider academic probation with structured improvement plan", "Within 1 week")
    ];
  }
  return [];
};

// Evaluation order is part of the output contract.
const RULES: readonly Rule[] = [attendanceRule, averageScoreRule, engagementRule, completionRule, generalSupportRule];

export const generateInterventions = (metrics: StudentMetrics, tier: RiskTier): Intervention[] =>
  RULES.flatMap((rule) => rule(metrics, tier));

export const generateAssessment = (metrics: StudentMetrics, tier: RiskTier): string => {
  const { attendance, averageScore, engagementScore } = metrics;

  switch (tier) {
    case "Critical Risk":
      return (
        `CRITICAL ALERT: This student is in immediate danger of academic failure. ` +
        `With only ${attendance}% attendance, this is a severe situation requiring emergency intervention ` +
        `within 24-48 hours. Without immediate action, this student is likely to fail or drop out. ` +
        `Contact parents and schedule emergency meetings now.`
      );
    case "High Risk":
      return (
        `This student is at HIGH RISK of academic failure. ` +
        `With ${attendance}% attendance, ${averageScore}% average score, and ${engagementScore}% engagement, ` +
        `immediate intervention is critical. Multiple support systems should be activated urgently.`
      );
    case "Medium Risk":
      return (
        `This student shows WARNING SIGNS that require attention. ` +
        `Current metrics (${attendance}% attendance, ${averageScore}% score) indicate potential for improvement ` +
        `with targeted support. Early intervention can prevent further decline.`
      );
    case "Safe":
      return (
        `This student is performing adequately with ${attendance}% attendance and ${averageScore}% average score. ` +
        `Continue monitoring and provide encouragement to maintain current trajectory.`
      );
  }
};

export const buildInterventionPlan = (metrics: StudentMetrics, tier: RiskTier): InterventionPlan => {
  const interventions = generateInterventions(metrics, tier);
  return {
    type: "rule_based",
    riskTier: tier,
    assessment: generateAssessment(metrics, tier),
    interventions,
    totalInterventions: interventions.length
  };
};
