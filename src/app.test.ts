import type { Server } from "http";
import { afterAll, beforeAll, describe, expect, it } from "vitest";

import { createApp } from "./app";
import { MemoryAlertSink } from "./alerts/alertSink";
import { loadConfig } from "./config";
import { createServices } from "./services";
import { MemoryRecordSink } from "./storage/recordSink";
import { fixedClock, silentLogger, stubAnalyzer } from "./testing/fixtures";

let server: Server;
let baseUrl: string;

beforeAll(async () => {
  const services = createServices(loadConfig({}), silentLogger, {
    backend: null,
    alertSink: new MemoryAlertSink(),
    recordSink: new MemoryRecordSink(),
    analyzer: stubAnalyzer(),
    clock: fixedClock()
  });
  const app = createApp({ services, logger: silentLogger, corsOrigins: null, rateLimitPerMinute: 1_000 });

  server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
  });
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("expected a TCP address");
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

const post = (route: string, body: unknown) =>
  fetch(`${baseUrl}${route}`, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body)
  });

describe("HTTP API", () => {
  it("answers health checks", async () => {
    const res = await fetch(`${baseUrl}/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true });
  });

  it("analyzes text", async () => {
    const res = await post("/api/sentiment/analyze", { text: "I want to end it all" });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      ok: true,
      data: {
        analysis: { riskLevel: "high", counselorReferral: true },
        assessment: {
          resources: [{ name: "Crisis Hotline" }, { name: "Crisis Text Line" }, { name: "Campus Counseling" }]
        }
      }
    });
  });

  it("rejects malformed prior analyses with 422", async () => {
    const res = await post("/api/sentiment/trends", { analyses: [{ text: "placeholder" }] });

    expect(res.status).toBe(422);
    expect(await res.json()).toMatchObject({
      ok: false,
      error: { message: "Prior analysis at index 0 is malformed", status: 422, details: { index: 0 } }
    });
  });

  it("rejects invalid metrics with 400", async () => {
    const res = await post("/api/students/evaluate", {
      attendance: 80,
      averageScore: 80,
      assignmentsSubmitted: 0,
      totalAssignments: 0,
      engagementScore: 80
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      ok: false,
      error: {
        message: "Invalid student metrics",
        details: { issues: ["totalAssignments: totalAssignments must be >= 1"] }
      }
    });
  });

  it("lists alerts raised by an evaluation", async () => {
    await post("/api/students/evaluate", {
      studentId: "s-http",
      attendance: 50,
      averageScore: 60,
      assignmentsSubmitted: 6,
      totalAssignments: 10,
      engagementScore: 55
    });

    const res = await fetch(`${baseUrl}/api/alerts?studentId=s-http`);

    expect(await res.json()).toMatchObject({
      ok: true,
      data: { total: 1, alerts: [{ studentId: "s-http", riskLevel: "Critical Risk", alertType: "academic_risk" }] }
    });
  });

  it("chats and exposes the session", async () => {
    const chat = await post("/api/chat", { studentId: "s-chat", sessionId: "http-session", message: "I feel hopeless" });

    expect(await chat.json()).toMatchObject({ ok: true, data: { counselorAlert: true, responseCategory: "high_risk" } });

    const res = await fetch(`${baseUrl}/api/chat/http-session`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      ok: true,
      data: { session: { messageCount: 1, needsHumanReview: true }, summary: { recommendCounselorWithin24h: true } }
    });
  });

  it("returns 404 for an unknown session", async () => {
    const res = await fetch(`${baseUrl}/api/chat/unknown-session`);

    expect(res.status).toBe(404);
  });

  it("rejects a malformed JSON body", async () => {
    const res = await fetch(`${baseUrl}/api/chat`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: "{not json"
    });

    expect(res.status).toBe(400);
  });
});
