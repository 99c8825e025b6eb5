import { classifyAttendance, type RiskTier } from "./riskTier";
import type { StudentMetrics } from "./studentMetrics";

export interface RiskPrediction {
  riskTier: RiskTier;
  predictor: string;
}

/** Any predictor (rule table, trained model) that turns metrics into a tier. */
export interface RiskPredictor {
  readonly name: string;
  predict(metrics: StudentMetrics): RiskPrediction;
}

export class AttendanceRiskPredictor implements RiskPredictor {
  readonly name = "attendance_rules";

  predict(metrics: StudentMetrics): RiskPrediction {
    return { riskTier: classifyAttendance(metrics.attendance), predictor: this.name };
  }
}
