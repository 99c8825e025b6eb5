import { randomUUID } from "crypto";

import { generateWithTimeout, type TextGenerationBackend } from "../ai/generationBackend";
import { buildChatPrompt, type ResponseCategory } from "../ai/promptBuilder";
import { decideSentimentAlert, type Alert } from "../alerts/alertPolicy";
import type { AlertSink } from "../alerts/alertSink";
import { InvalidInputError } from "../errors";
import { ACADEMIC_RESOURCES, CRISIS_RESOURCES } from "../interventions/resources";
import type { SupportResource } from "../interventions/types";
import { parsePriorAnalyses } from "../sentiment/sentimentResultSchema";
import type { SentimentAnalyzer } from "../sentiment/sentimentAnalyzer";
import { isBlank } from "../sentiment/textPreprocessor";
import type { SentimentResult } from "../sentiment/types";
import type { RecordSink } from "../storage/recordSink";
import type { Logger } from "../utils/logger";
import {
  createConversationState,
  recordTurn,
  summarizeAnalyses,
  summarizeConversation,
  toTurnSnapshot,
  type ConversationState,
  type ConversationSummary,
  type TranscriptTurn
} from "./conversationState";
import { GREETING, fallbackReply } from "./responseTemplates";
import type { SessionStore } from "./sessionStore";

export interface ChatMessageInput {
  studentId: string;
  sessionId?: string;
  message: string;
}

export type ResponseSource = "generated" | "fallback" | "greeting";

export interface ChatReply {
  studentId: string;
  sessionId: string;
  timestamp: string;
  studentMessage: string;
  botResponse: string;
  sentiment: SentimentResult;
  responseCategory: ResponseCategory;
  responseSource: ResponseSource;
  resources: SupportResource[];
  needsHumanIntervention: boolean;
  counselorAlert: boolean;
  alert: Alert | null;
  session: ConversationState | null;
}

export interface SupportChatbotOptions {
  analyzer: SentimentAnalyzer;
  sessions: SessionStore;
  backend: TextGenerationBackend | null;
  generationTimeoutMs: number;
  alertSink: AlertSink;
  recordSink: RecordSink;
  logger: Logger;
  clock?: () => Date;
}

export const selectResponseCategory = (sentiment: SentimentResult): ResponseCategory => {
  if (sentiment.riskLevel === "high") return "high_risk";
  if (sentiment.academicStress.hasAcademicStress) return "academic_stress";
  return "general_support";
};

export const chatResourcesFor = (sentiment: SentimentResult, category: ResponseCategory): SupportResource[] => [
  ...(sentiment.riskLevel === "high" ? CRISIS_RESOURCES : []),
  ...(category === "academic_stress" ? ACADEMIC_RESOURCES : [])
];

const assertOwnedBy = (state: ConversationState | null, studentId: string, sessionId: string): void => {
  if (state && state.studentId !== studentId) {
    throw new InvalidInputError("Session belongs to a different student", [`sessionId: ${sessionId}`]);
  }
};

export class SupportChatbot {
  private readonly analyzer: SentimentAnalyzer;
  private readonly sessions: SessionStore;
  private readonly backend: TextGenerationBackend | null;
  private readonly generationTimeoutMs: number;
  private readonly alertSink: AlertSink;
  private readonly recordSink: RecordSink;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(options: SupportChatbotOptions) {
    this.analyzer = options.analyzer;
    this.sessions = options.sessions;
    this.backend = options.backend;
    this.generationTimeoutMs = options.generationTimeoutMs;
    this.alertSink = options.alertSink;
    this.recordSink = options.recordSink;
    this.logger = options.logger;
    this.clock = options.clock ?? (() => new Date());
  }

  async handleMessage(input: ChatMessageInput): Promise<ChatReply> {
    const sessionId = input.sessionId ?? randomUUID();

    if (isBlank(input.message)) {
      return this.greet(input.studentId, sessionId);
    }

    return this.sessions.withSession(sessionId, async (current) => {
      assertOwnedBy(current, input.studentId, sessionId);

      const now = this.clock();
      const base = current ?? createConversationState(sessionId, input.studentId, now);
      const sentiment = this.analyzer.analyze(input.message);
      const category = selectResponseCategory(sentiment);
      const { text: botResponse, source } = await this.composeReply(input.message, sentiment, category, base);

      const turn: TranscriptTurn = {
        studentMessage: input.message,
        botResponse,
        responseCategory: category,
        timestamp: now.toISOString()
      };
      const state = recordTurn(base, sentiment, turn, now);

      const alert = state.counselorAlerted ? decideSentimentAlert(input.studentId, "chat", sentiment, now) : null;
      if (alert) await this.alertSink.emit(alert);

      await this.recordSink.record({
        kind: "sentiment_result",
        timestamp: now.toISOString(),
        studentId: input.studentId,
        payload: sentiment
      });
      await this.recordSink.record({
        kind: "conversation_state",
        timestamp: now.toISOString(),
        studentId: input.studentId,
        payload: toTurnSnapshot(state, turn, sentiment)
      });

      this.logger.info(
        {
          sessionId,
          category,
          source,
          riskLevel: sentiment.riskLevel,
          currentRisk: state.currentRisk,
          needsHumanReview: state.needsHumanReview
        },
        "chat_reply_generated"
      );

      const reply: ChatReply = {
        studentId: input.studentId,
        sessionId,
        timestamp: now.toISOString(),
        studentMessage: input.message,
        botResponse,
        sentiment,
        responseCategory: category,
        responseSource: source,
        resources: chatResourcesFor(sentiment, category),
        needsHumanIntervention: sentiment.riskLevel === "high",
        counselorAlert: state.counselorAlerted,
        alert,
        session: state
      };

      return { state, result: reply };
    });
  }

  getSession(sessionId: string): ConversationState | null {
    return this.sessions.get(sessionId);
  }

  summarizeSession(sessionId: string): ConversationSummary | null {
    const state = this.sessions.get(sessionId);
    return state ? summarizeConversation(state) : null;
  }

  /** Summary over prior analyses supplied by the caller; malformed entries are rejected. */
  summarizeHistory(history: unknown[]): ConversationSummary {
    return summarizeAnalyses(parsePriorAnalyses(history));
  }

  private greet(studentId: string, sessionId: string): ChatReply {
    const current = this.sessions.get(sessionId);
    assertOwnedBy(current, studentId, sessionId);

    return {
      studentId,
      sessionId,
      timestamp: this.clock().toISOString(),
      studentMessage: "",
      botResponse: GREETING,
      sentiment: this.analyzer.analyze(""),
      responseCategory: "general_support",
      responseSource: "greeting",
      resources: [],
      needsHumanIntervention: false,
      counselorAlert: false,
      alert: null,
      session: current
    };
  }

  private async composeReply(
    message: string,
    sentiment: SentimentResult,
    category: ResponseCategory,
    state: ConversationState
  ): Promise<{ text: string; source: ResponseSource }> {
    const history = state.transcript.map(({ studentMessage, botResponse }) => ({ studentMessage, botResponse }));
    const outcome = await generateWithTimeout(
      this.backend,
      {
        category,
        prompt: buildChatPrompt({ category, message, sentiment, history }),
        context: { studentId: state.studentId, sessionId: state.sessionId, riskLevel: sentiment.riskLevel },
        history
      },
      this.generationTimeoutMs
    );

    if (outcome.ok) return { text: outcome.value, source: "generated" };

    if (outcome.error.reason !== "not_configured") {
      this.logger.warn(
        { sessionId: state.sessionId, reason: outcome.error.reason, err: outcome.error },
        "generation_backend_failed"
      );
    }
    return { text: fallbackReply(message, sentiment), source: "fallback" };
  }
}
