import { describe, expect, it } from "vitest";

import { MemoryAlertSink } from "../alerts/alertSink";
import { MemoryRecordSink } from "../storage/recordSink";
import { silentLogger, stubAnalyzer } from "../testing/fixtures";
import { FeedbackService } from "./feedbackService";

const setup = () => {
  const alertSink = new MemoryAlertSink();
  const recordSink = new MemoryRecordSink();
  const service = new FeedbackService({ analyzer: stubAnalyzer(), alertSink, recordSink, logger: silentLogger });
  return { service, alertSink, recordSink };
};

describe("FeedbackService.submit", () => {
  it("raises a feedback alert for crisis language", async () => {
    const { service, alertSink } = setup();

    const outcome = await service.submit({ studentId: "s-1", text: "Everything is falling apart", feedbackType: "wellbeing" });

    expect(outcome.analysis.riskLevel).toBe("high");
    expect(outcome.alert?.alertType).toBe("high_risk_feedback");
    expect(outcome.assessment.resources.map((r) => r.name)).toEqual([
      "Crisis Hotline",
      "Crisis Text Line",
      "Campus Counseling"
    ]);
    expect(await alertSink.list("s-1")).toHaveLength(1);
  });

  it("records ordinary feedback without alerting", async () => {
    const { service, alertSink, recordSink } = setup();

    const outcome = await service.submit({ studentId: "s-2", text: "The course pace is fine" });

    expect(outcome.feedbackType).toBe("general");
    expect(outcome.alert).toBeNull();
    expect(await alertSink.list()).toEqual([]);
    expect(recordSink.entries).toHaveLength(1);
  });
});
