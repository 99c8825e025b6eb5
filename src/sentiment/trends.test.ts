import { describe, expect, it } from "vitest";

import { makeResult } from "../testing/fixtures";
import { buildTrendReport, computeTrend } from "./trends";

describe("computeTrend", () => {
  it("detects a decline against the earlier mean", () => {
    expect(computeTrend([0.5, 0.4, 0.3, -0.2, -0.3])).toBe("declining");
  });

  it("needs at least two scores", () => {
    expect(computeTrend([])).toBe("insufficient_data");
    expect(computeTrend([0.8])).toBe("insufficient_data");
  });

  it("compares against a zero baseline when there is nothing earlier", () => {
    expect(computeTrend([0.1, 0.3])).toBe("improving");
    expect(computeTrend([0.05, 0.05])).toBe("stable");
    expect(computeTrend([-0.3, -0.1, -0.2])).toBe("declining");
  });

  it("reports improvement", () => {
    expect(computeTrend([-0.5, -0.4, 0.2, 0.3, 0.1])).toBe("improving");
  });
});

describe("buildTrendReport", () => {
  it("orders analyses by time before computing the trend", () => {
    const report = buildTrendReport([
      makeResult({ compound: -0.6, riskLevel: "high", timestamp: "2024-03-03T00:00:00.000Z" }),
      makeResult({ compound: 0.6, riskLevel: "low", timestamp: "2024-03-01T00:00:00.000Z" }),
      makeResult({ compound: 0.5, riskLevel: "low", timestamp: "2024-02-28T00:00:00.000Z" }),
      makeResult({ compound: 0.4, riskLevel: "medium", timestamp: "2024-02-27T00:00:00.000Z" }),
      makeResult({ compound: -0.5, riskLevel: "medium", timestamp: "2024-03-02T00:00:00.000Z" })
    ]);

    expect(report).toEqual({
      trend: "declining",
      averageSentiment: 0.08,
      riskCounts: { high: 1, medium: 2, low: 2 },
      totalAnalyses: 5,
      needsIntervention: true
    });
  });

  it("orders by instant rather than by timestamp text", () => {
    const report = buildTrendReport([
      makeResult({ compound: -0.6, timestamp: "2024-03-01T08:00:00.000Z" }),
      makeResult({ compound: 0.6, timestamp: "2024-03-01T09:00:00+02:00" }),
      makeResult({ compound: -0.6, timestamp: "2024-03-01T09:00:00.000Z" }),
      makeResult({ compound: -0.6, timestamp: "2024-03-01T10:00:00.000Z" })
    ]);

    expect(report.trend).toBe("declining");
    expect(report.averageSentiment).toBe(-0.3);
  });

  it("needs intervention at three medium analyses", () => {
    const report = buildTrendReport([
      makeResult({ riskLevel: "medium" }),
      makeResult({ riskLevel: "medium" }),
      makeResult({ riskLevel: "medium" })
    ]);

    expect(report.needsIntervention).toBe(true);
    expect(report.trend).toBe("stable");
  });

  it("reports no data for an empty list", () => {
    expect(buildTrendReport([])).toEqual({
      trend: "no_data",
      averageSentiment: 0,
      riskCounts: { high: 0, medium: 0, low: 0 },
      totalAnalyses: 0,
      needsIntervention: false
    });
  });
});
