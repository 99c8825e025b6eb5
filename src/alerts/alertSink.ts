import { z } from "zod";

import { JsonlStore } from "../storage/jsonlStore";
import type { Logger } from "../utils/logger";
import type { Alert } from "./alertPolicy";

/** Receives alert decisions. Delivery (email, SMS, paging) belongs to the implementation. */
export interface AlertSink {
  emit(alert: Alert): Promise<void>;
  list(studentId?: string): Promise<Alert[]>;
}

const alertSchema = z.object({
  studentId: z.string(),
  riskLevel: z.enum(["Safe", "Medium Risk", "High Risk", "Critical Risk", "low", "medium", "high"]),
  alertType: z.enum(["academic_risk", "high_risk_chat", "high_risk_feedback"]),
  source: z.enum(["structured", "chat", "feedback"]),
  message: z.string(),
  recommendedContactWindow: z.string(),
  sentimentScore: z.number().optional(),
  timestamp: z.string()
}) satisfies z.ZodType<Alert>;

const isAlert = (value: unknown): value is Alert => alertSchema.safeParse(value).success;

export class MemoryAlertSink implements AlertSink {
  private readonly alerts: Alert[] = [];

  async emit(alert: Alert): Promise<void> {
    this.alerts.push(alert);
  }

  async list(studentId?: string): Promise<Alert[]> {
    return studentId ? this.alerts.filter((a) => a.studentId === studentId) : [...this.alerts];
  }
}

export class JsonlAlertSink implements AlertSink {
  private readonly store: JsonlStore<Alert>;
  private readonly logger: Logger;

  constructor(opts: { file: string; retentionDays: number; logger: Logger }) {
    this.logger = opts.logger;
    this.store = new JsonlStore<Alert>({ ...opts, isEntry: isAlert });
  }

  async emit(alert: Alert): Promise<void> {
    await this.store.append(alert);
    this.logger.warn(
      {
        studentId: alert.studentId,
        alertType: alert.alertType,
        riskLevel: alert.riskLevel,
        contactWindow: alert.recommendedContactWindow
      },
      "alert_emitted"
    );
  }

  async list(studentId?: string): Promise<Alert[]> {
    return this.store.list(studentId ? (a) => a.studentId === studentId : undefined);
  }
}
