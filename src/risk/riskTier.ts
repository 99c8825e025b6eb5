import type { TextRiskLevel } from "../sentiment/types";

export const RISK_TIERS = ["Safe", "Medium Risk", "High Risk", "Critical Risk"] as const;

export type RiskTier = (typeof RISK_TIERS)[number];

export const TEXT_RISK_LEVELS = ["low", "medium", "high"] as const satisfies readonly TextRiskLevel[];

export type AlertDisposition = "none" | "review" | "escalate";

export const ATTENDANCE_THRESHOLDS = {
  safe: 75,
  medium: 70,
  high: 60
} as const;

/** Attendance alone decides the tier; other metrics only shape the intervention list. */
export const classifyAttendance = (attendance: number): RiskTier => {
  if (attendance >= ATTENDANCE_THRESHOLDS.safe) return "Safe";
  if (attendance >= ATTENDANCE_THRESHOLDS.medium) return "Medium Risk";
  if (attendance >= ATTENDANCE_THRESHOLDS.high) return "High Risk";
  return "Critical Risk";
};

export const riskTierSeverity = (tier: RiskTier): number => RISK_TIERS.indexOf(tier);

export const compareRiskTiers = (a: RiskTier, b: RiskTier): number => riskTierSeverity(a) - riskTierSeverity(b);

export const maxRiskTier = (tiers: RiskTier[]): RiskTier | null =>
  tiers.reduce<RiskTier | null>((top, tier) => (top === null || compareRiskTiers(tier, top) > 0 ? tier : top), null);

export const textRiskSeverity = (level: TextRiskLevel): number => TEXT_RISK_LEVELS.indexOf(level);

export const compareTextRisk = (a: TextRiskLevel, b: TextRiskLevel): number => textRiskSeverity(a) - textRiskSeverity(b);

export const maxTextRisk = (levels: TextRiskLevel[]): TextRiskLevel | null =>
  levels.reduce<TextRiskLevel | null>(
    (top, level) => (top === null || compareTextRisk(level, top) > 0 ? level : top),
    null
  );

const STRUCTURED_DISPOSITION: Record<RiskTier, AlertDisposition> = {
  Safe: "none",
  "Medium Risk": "review",
  "High Risk": "escalate",
  "Critical Risk": "escalate"
};

const TEXT_DISPOSITION: Record<TextRiskLevel, AlertDisposition> = {
  low: "none",
  medium: "review",
  high: "escalate"
};

export const isRiskTier = (value: string): value is RiskTier => RISK_TIERS.some((tier) => tier === value);

export const dispositionFor = (level: RiskTier | TextRiskLevel): AlertDisposition =>
  isRiskTier(level) ? STRUCTURED_DISPOSITION[level] : TEXT_DISPOSITION[level];
