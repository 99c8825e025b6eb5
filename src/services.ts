import { createGeminiClient } from "./ai/geminiClient";
import type { TextGenerationBackend } from "./ai/generationBackend";
import { JsonlAlertSink, type AlertSink } from "./alerts/alertSink";
import { SessionStore } from "./chat/sessionStore";
import { SupportChatbot } from "./chat/supportChatbot";
import type { AppConfig } from "./config";
import { FeedbackService } from "./feedback/feedbackService";
import { StudentEvaluator } from "./interventions/interventionAgent";
import { AttendanceRiskPredictor } from "./risk/riskPredictor";
import { SentimentAnalyzer } from "./sentiment/sentimentAnalyzer";
import { JsonlRecordSink, type RecordSink } from "./storage/recordSink";
import type { Logger } from "./utils/logger";

export interface Services {
  analyzer: SentimentAnalyzer;
  chatbot: SupportChatbot;
  evaluator: StudentEvaluator;
  feedback: FeedbackService;
  alertSink: AlertSink;
}

export interface ServiceOverrides {
  backend?: TextGenerationBackend | null;
  alertSink?: AlertSink;
  recordSink?: RecordSink;
  analyzer?: SentimentAnalyzer;
  clock?: () => Date;
}

/** Builds every long-lived collaborator once; handlers only ever see these instances. */
export const createServices = (config: AppConfig, logger: Logger, overrides: ServiceOverrides = {}): Services => {
  const backend =
    overrides.backend !== undefined ? overrides.backend : createGeminiClient(config.generation, logger);
  const alertSink =
    overrides.alertSink ??
    new JsonlAlertSink({ file: config.storage.alertsFile, retentionDays: config.storage.retentionDays, logger });
  const recordSink =
    overrides.recordSink ??
    new JsonlRecordSink({ file: config.storage.recordsFile, retentionDays: config.storage.retentionDays, logger });
  const analyzer = overrides.analyzer ?? new SentimentAnalyzer({ clock: overrides.clock });

  if (!backend) logger.info("generation_backend_disabled");

  return {
    analyzer,
    alertSink,
    chatbot: new SupportChatbot({
      analyzer,
      sessions: new SessionStore(),
      backend,
      generationTimeoutMs: config.generation.timeoutMs,
      alertSink,
      recordSink,
      logger,
      clock: overrides.clock
    }),
    evaluator: new StudentEvaluator({
      predictor: new AttendanceRiskPredictor(),
      backend,
      generationTimeoutMs: config.generation.timeoutMs,
      alertSink,
      recordSink,
      logger,
      clock: overrides.clock
    }),
    feedback: new FeedbackService({ analyzer, alertSink, recordSink, logger, clock: overrides.clock })
  };
};
