import { decideSentimentAlert, type Alert } from "../alerts/alertPolicy";
import type { AlertSink } from "../alerts/alertSink";
import { assessTextRisk, type TextRiskAssessment } from "../interventions/textAssessment";
import type { SentimentAnalyzer } from "../sentiment/sentimentAnalyzer";
import type { SentimentResult } from "../sentiment/types";
import type { RecordSink } from "../storage/recordSink";
import type { Logger } from "../utils/logger";

export type FeedbackType = "general" | "course" | "wellbeing";

export interface FeedbackSubmission {
  studentId: string;
  text: string;
  feedbackType?: FeedbackType;
}

export interface FeedbackOutcome {
  studentId: string;
  feedbackType: FeedbackType;
  analysis: SentimentResult;
  assessment: TextRiskAssessment;
  alert: Alert | null;
}

export class FeedbackService {
  constructor(
    private readonly deps: {
      analyzer: SentimentAnalyzer;
      alertSink: AlertSink;
      recordSink: RecordSink;
      logger: Logger;
      clock?: () => Date;
    }
  ) {}

  async submit(submission: FeedbackSubmission): Promise<FeedbackOutcome> {
    const now = this.deps.clock ? this.deps.clock() : new Date();
    const feedbackType = submission.feedbackType ?? "general";
    const analysis = this.deps.analyzer.analyze(submission.text);
    const alert = decideSentimentAlert(submission.studentId, "feedback", analysis, now);

    if (alert) await this.deps.alertSink.emit(alert);
    await this.deps.recordSink.record({
      kind: "sentiment_result",
      timestamp: now.toISOString(),
      studentId: submission.studentId,
      payload: analysis
    });

    this.deps.logger.info(
      { studentId: submission.studentId, feedbackType, riskLevel: analysis.riskLevel, alerted: alert !== null },
      "feedback_analyzed"
    );

    return {
      studentId: submission.studentId,
      feedbackType,
      analysis,
      assessment: assessTextRisk(analysis),
      alert
    };
  }
}
