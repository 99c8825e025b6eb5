import type { StudentMetrics } from "../risk/studentMetrics";
import type { RiskTier } from "../risk/riskTier";
import type { SentimentResult } from "../sentiment/types";
import type { HistoryTurn, PromptCategory } from "./generationBackend";

export type ResponseCategory = Exclude<PromptCategory, "intervention_plan">;

export const PROMPT_VERSION = "support-chat-v1";

const HISTORY_TURNS = 5;

const GUIDELINES: Record<ResponseCategory, string[]> = {
  general_support: [
    "You are a compassionate and professional student support counselor.",
    "Be empathetic, warm, and non-judgmental; acknowledge and validate the student's feelings.",
    "Ask open-ended questions to encourage them to share more.",
    "Offer practical coping strategies when appropriate and gently suggest professional help if distress shows.",
    "Keep the reply conversational rather than clinical, and remind them difficulties are temporary.",
    "Mention campus resources or study strategies if relevant."
  ],
  high_risk: [
    "You are a crisis-trained student support counselor. The message shows signs of serious distress or possible self-harm.",
    "Take their feelings seriously and express genuine concern for their wellbeing.",
    "Clearly encourage them to speak with a professional counselor now.",
    "Always include crisis resources: 988 (Suicide & Crisis Lifeline), text HOME to 741741, or call 911 in immediate danger.",
    "Ask whether they are safe right now and remind them they are not alone.",
    "Do not dismiss their feelings or offer simple fixes; focus on immediate safety and professional support."
  ],
  academic_stress: [
    "You are a student support counselor specializing in academic stress and study challenges.",
    "Acknowledge the academic pressure and normalize it; many students feel this way.",
    "Give practical study strategies and time management tips, such as breaking large tasks into small steps.",
    "Point to campus academic support (tutoring, writing center, study skills workshops).",
    "Encourage self-care and balance, and help reframe negative thoughts about their abilities.",
    "Ask about the specific challenge they are facing."
  ]
};

export const formatHistory = (history: HistoryTurn[]): string => {
  if (history.length === 0) return "This is the start of the conversation.";

  return history
    .slice(-HISTORY_TURNS)
    .flatMap((turn) => [`Student: ${turn.studentMessage}`, `Counselor: ${turn.botResponse}`])
    .join("\n");
};

export const formatSentimentForPrompt = (result: SentimentResult): string =>
  [
    `Risk level: ${result.riskLevel}`,
    `Overall sentiment: ${result.overallSentiment}`,
    `Emotional keywords: ${result.emotionAnalysis.detectedKeywords.map(([tag, term]) => `${term} (${tag})`).join(", ") || "none"}`,
    `Academic stress: ${result.academicStress.hasAcademicStress ? "yes" : "no"}`,
    `Needs attention: ${result.needsAttention ? "yes" : "no"}`
  ].join("\n");

export const buildChatPrompt = (input: {
  category: ResponseCategory;
  message: string;
  sentiment: SentimentResult;
  history: HistoryTurn[];
}): string =>
  [
    `Prompt version: ${PROMPT_VERSION}`,
    ...GUIDELINES[input.category],
    "Reply in plain text, without sign-offs or placeholders.",
    "",
    "Conversation so far:",
    formatHistory(input.history),
    "",
    "Sentiment analysis of the latest message:",
    formatSentimentForPrompt(input.sentiment),
    "",
    "Student message:",
    input.message
  ].join("\n");

export const buildInterventionPrompt = (metrics: StudentMetrics, tier: RiskTier): string =>
  [
    "You are an academic advisor helping students succeed. Generate personalized intervention recommendations.",
    "",
    "Student profile:",
    `- Name: ${metrics.name ?? "Student"}`,
    `- Risk level: ${tier}`,
    `- Attendance: ${metrics.attendance}%`,
    `- Average score: ${metrics.averageScore}%`,
    `- Assignments submitted: ${metrics.assignmentsSubmitted}/${metrics.totalAssignments}`,
    `- Engagement score: ${metrics.engagementScore}%`,
    "",
    "Provide:",
    "1. A brief assessment of the student's situation (2-3 sentences)",
    "2. 3-5 specific, actionable intervention strategies",
    "3. A priority level for each intervention (High/Medium/Low)",
    "4. An expected timeline for improvement",
    "",
    "Format the response as a structured recommendation that educators can act on immediately."
  ].join("\n");
