import { generateWithTimeout, type TextGenerationBackend } from "../ai/generationBackend";
import { buildInterventionPrompt } from "../ai/promptBuilder";
import { decideStudentAlert, renderGuardianEmail, renderSmsText, type Alert } from "../alerts/alertPolicy";
import type { AlertSink } from "../alerts/alertSink";
import { InvalidInputError } from "../errors";
import type { RiskPredictor } from "../risk/riskPredictor";
import { compareRiskTiers, dispositionFor, type AlertDisposition, type RiskTier } from "../risk/riskTier";
import { completionRate, createStudentMetrics, type StudentMetrics } from "../risk/studentMetrics";
import { roundTo } from "../sentiment/riskFusion";
import type { RecordSink } from "../storage/recordSink";
import type { Logger } from "../utils/logger";
import { buildInterventionPlan } from "./interventionPolicy";
import type { InterventionPlan, RecommendationOutcome } from "./types";

export interface GuardianNotice {
  email: { subject: string; body: string };
  sms: string;
}

export interface StudentEvaluation {
  studentId: string | null;
  name: string | null;
  riskTier: RiskTier;
  predictor: string;
  completionRate: number;
  disposition: AlertDisposition;
  plan: InterventionPlan;
  alert: Alert | null;
  guardianNotice: GuardianNotice | null;
}

export interface StudentEvaluatorOptions {
  predictor: RiskPredictor;
  backend: TextGenerationBackend | null;
  generationTimeoutMs: number;
  alertSink: AlertSink;
  recordSink: RecordSink;
  logger: Logger;
  clock?: () => Date;
}

const UNIDENTIFIED_STUDENT = "unidentified";

export class StudentEvaluator {
  private readonly predictor: RiskPredictor;
  private readonly backend: TextGenerationBackend | null;
  private readonly generationTimeoutMs: number;
  private readonly alertSink: AlertSink;
  private readonly recordSink: RecordSink;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(options: StudentEvaluatorOptions) {
    this.predictor = options.predictor;
    this.backend = options.backend;
    this.generationTimeoutMs = options.generationTimeoutMs;
    this.alertSink = options.alertSink;
    this.recordSink = options.recordSink;
    this.logger = options.logger;
    this.clock = options.clock ?? (() => new Date());
  }

  async evaluate(input: unknown): Promise<StudentEvaluation> {
    const metrics = createStudentMetrics(input);
    return this.evaluateMetrics(metrics);
  }

  /** Validates every entry before anything is emitted; the result is ordered most severe first. */
  async evaluateBatch(inputs: unknown[]): Promise<StudentEvaluation[]> {
    const metrics = inputs.map((input, index) => {
      try {
        return createStudentMetrics(input);
      } catch (error) {
        if (error instanceof InvalidInputError) {
          throw new InvalidInputError(`Invalid student metrics at index ${index}`, error.issues);
        }
        throw error;
      }
    });

    const evaluations: StudentEvaluation[] = [];
    for (const m of metrics) {
      evaluations.push(await this.evaluateMetrics(m));
    }

    return evaluations.sort((a, b) => compareRiskTiers(b.riskTier, a.riskTier));
  }

  async recommend(input: unknown): Promise<RecommendationOutcome> {
    const metrics = createStudentMetrics(input);
    const { riskTier } = this.predictor.predict(metrics);

    const outcome = await generateWithTimeout(
      this.backend,
      {
        category: "intervention_plan",
        prompt: buildInterventionPrompt(metrics, riskTier),
        context: { studentId: metrics.studentId ?? null, riskTier },
        history: []
      },
      this.generationTimeoutMs
    );

    if (outcome.ok) {
      return { type: "ai_generated", riskTier, recommendations: outcome.value };
    }

    if (outcome.error.reason !== "not_configured") {
      this.logger.warn(
        { studentId: metrics.studentId, reason: outcome.error.reason, err: outcome.error },
        "generation_backend_failed"
      );
    }
    return buildInterventionPlan(metrics, riskTier);
  }

  private async evaluateMetrics(metrics: StudentMetrics): Promise<StudentEvaluation> {
    const now = this.clock();
    const { riskTier, predictor } = this.predictor.predict(metrics);
    const plan = buildInterventionPlan(metrics, riskTier);
    const alert = decideStudentAlert(metrics.studentId ?? UNIDENTIFIED_STUDENT, metrics, riskTier, now);

    if (alert) await this.alertSink.emit(alert);
    await this.recordSink.record({
      kind: "intervention_plan",
      timestamp: now.toISOString(),
      studentId: metrics.studentId,
      payload: plan
    });

    this.logger.info(
      { studentId: metrics.studentId, riskTier, interventions: plan.totalInterventions, alerted: alert !== null },
      "student_evaluated"
    );

    return {
      studentId: metrics.studentId ?? null,
      name: metrics.name ?? null,
      riskTier,
      predictor,
      completionRate: roundTo(completionRate(metrics), 1),
      disposition: dispositionFor(riskTier),
      plan,
      alert,
      guardianNotice: alert ? { email: renderGuardianEmail(metrics, alert), sms: renderSmsText(metrics, alert) } : null
    };
  }
}
