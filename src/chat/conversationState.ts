import type { HistoryTurn } from "../ai/generationBackend";
import type { ResponseCategory } from "../ai/promptBuilder";
import { maxTextRisk } from "../risk/riskTier";
import { roundTo } from "../sentiment/riskFusion";
import { buildTrendReport, computeTrend } from "../sentiment/trends";
import type { SentimentResult, SentimentTrend, SentimentTrendReport, TextRiskLevel } from "../sentiment/types";

export type SessionRiskState = "no_risk_seen" | TextRiskLevel;

export interface TranscriptTurn extends HistoryTurn {
  responseCategory: ResponseCategory;
  timestamp: string;
}

export interface ConversationState {
  sessionId: string;
  studentId: string;
  messageCount: number;
  averageSentiment: number;
  trend: SentimentTrend;
  currentRisk: SessionRiskState;
  peakRisk: SessionRiskState;
  needsHumanReview: boolean;
  counselorAlerted: boolean;
  alertCount: number;
  history: SentimentResult[];
  transcript: TranscriptTurn[];
  createdAt: string;
  updatedAt: string;
}

/** What is persisted per chat turn: the scalar session fields plus the turn just recorded. */
export type ConversationTurnSnapshot = Omit<ConversationState, "history" | "transcript"> & {
  turn: TranscriptTurn;
  sentiment: SentimentResult;
};

export interface ConversationSummary {
  conversationLength: number;
  sentimentTrend: SentimentTrendReport["trend"];
  averageSentiment: number;
  highRiskMessages: number;
  mediumRiskMessages: number;
  needsIntervention: boolean;
  recommendCounselorWithin24h: boolean;
  lastInteraction: string | null;
  keyConcerns: string[];
  recommendations: string[];
}

// Current risk is the highest tier among the most recent messages, so a crisis message
// keeps the session elevated for a couple of turns before it decays.
export const RISK_RECENCY_WINDOW = 3;
const KEY_CONCERN_LIMIT = 5;

export const createConversationState = (sessionId: string, studentId: string, now: Date): ConversationState => ({
  sessionId,
  studentId,
  messageCount: 0,
  averageSentiment: 0,
  trend: "insufficient_data",
  currentRisk: "no_risk_seen",
  peakRisk: "no_risk_seen",
  needsHumanReview: false,
  counselorAlerted: false,
  alertCount: 0,
  history: [],
  transcript: [],
  createdAt: now.toISOString(),
  updatedAt: now.toISOString()
});

export const recordTurn = (
  state: ConversationState,
  sentiment: SentimentResult,
  turn: TranscriptTurn,
  now: Date
): ConversationState => {
  const history = [...state.history, sentiment];
  const compounds = history.map((h) => h.scores.lexiconCompound);
  const risks = history.map((h) => h.riskLevel);
  const isHigh = sentiment.riskLevel === "high";

  return {
    ...state,
    history,
    transcript: [...state.transcript, turn],
    messageCount: history.length,
    averageSentiment: roundTo(compounds.reduce((acc, c) => acc + c, 0) / compounds.length),
    trend: computeTrend(compounds),
    currentRisk: maxTextRisk(risks.slice(-RISK_RECENCY_WINDOW)) ?? "no_risk_seen",
    peakRisk: maxTextRisk(risks) ?? "no_risk_seen",
    needsHumanReview: state.needsHumanReview || isHigh,
    counselorAlerted: isHigh,
    alertCount: state.alertCount + (isHigh ? 1 : 0),
    updatedAt: now.toISOString()
  };
};

export const toTurnSnapshot = (
  state: ConversationState,
  turn: TranscriptTurn,
  sentiment: SentimentResult
): ConversationTurnSnapshot => {
  const { history: _history, transcript: _transcript, ...scalars } = state;
  return { ...scalars, turn, sentiment };
};

export const extractKeyConcerns = (analyses: SentimentResult[]): string[] => {
  const concerns: string[] = [];
  for (const analysis of analyses) {
    for (const [tag, term] of analysis.emotionAnalysis.detectedKeywords) {
      if (tag !== "positive" && !concerns.includes(term)) concerns.push(term);
    }
  }
  return concerns.slice(0, KEY_CONCERN_LIMIT);
};

const latestTimestamp = (analyses: SentimentResult[]): string | null =>
  analyses.reduce<string | null>(
    (latest, a) => (latest === null || Date.parse(a.timestamp) > Date.parse(latest) ? a.timestamp : latest),
    null
  );

export const summarizeAnalyses = (analyses: SentimentResult[]): ConversationSummary => {
  const report = buildTrendReport(analyses);
  const high = report.riskCounts.high;
  const medium = report.riskCounts.medium;
  const declining = report.trend === "declining";
  const recommendCounselorWithin24h = high > 0 || medium >= 3 || declining;

  const recommendations: string[] = [];
  if (high > 0) recommendations.push("URGENT: Immediate human counselor intervention recommended");
  if (recommendCounselorWithin24h) {
    recommendations.push("Schedule in-person or video call with a human counselor within 24 hours");
  }
  if (medium >= 3) recommendations.push("Schedule follow-up session with human counselor");
  if (declining) recommendations.push("Monitor closely - sentiment trend is declining");
  if (report.needsIntervention) recommendations.push("Consider proactive outreach and additional support resources");

  return {
    conversationLength: analyses.length,
    sentimentTrend: report.trend,
    averageSentiment: report.averageSentiment,
    highRiskMessages: high,
    mediumRiskMessages: medium,
    needsIntervention: report.needsIntervention,
    recommendCounselorWithin24h,
    lastInteraction: latestTimestamp(analyses),
    keyConcerns: extractKeyConcerns(analyses),
    recommendations
  };
};

export const summarizeConversation = (state: ConversationState): ConversationSummary =>
  summarizeAnalyses(state.history);
