import { describe, expect, it, vi } from "vitest";

import type { GenerationRequest, TextGenerationBackend } from "../ai/generationBackend";
import { MemoryAlertSink } from "../alerts/alertSink";
import { InvalidInputError, MalformedSentimentResultError } from "../errors";
import { ACADEMIC_RESOURCES, CRISIS_RESOURCES } from "../interventions/resources";
import { MemoryRecordSink } from "../storage/recordSink";
import { fixedClock, silentLogger, stubAnalyzer } from "../testing/fixtures";
import { GREETING, fallbackTemplate } from "./responseTemplates";
import { SessionStore } from "./sessionStore";
import { SupportChatbot } from "./supportChatbot";

const setup = (backend: TextGenerationBackend | null = null) => {
  const alertSink = new MemoryAlertSink();
  const recordSink = new MemoryRecordSink();
  const chatbot = new SupportChatbot({
    analyzer: stubAnalyzer(),
    sessions: new SessionStore(),
    backend,
    generationTimeoutMs: 1_000,
    alertSink,
    recordSink,
    logger: silentLogger,
    clock: fixedClock()
  });
  return { chatbot, alertSink, recordSink };
};

describe("SupportChatbot without a generation backend", () => {
  it("answers crisis messages with crisis resources and raises an alert", async () => {
    const { chatbot, alertSink, recordSink } = setup();

    const reply = await chatbot.handleMessage({ studentId: "s-1", sessionId: "chat-1", message: "I want to end it all" });

    expect(reply.responseCategory).toBe("high_risk");
    expect(reply.responseSource).toBe("fallback");
    expect(reply.botResponse).toBe(fallbackTemplate("crisis"));
    expect(reply.resources).toEqual(CRISIS_RESOURCES);
    expect(reply.needsHumanIntervention).toBe(true);
    expect(reply.counselorAlert).toBe(true);
    expect(reply.alert?.message).toBe("High-risk sentiment detected in chat: I want to end it all");
    expect(reply.session?.needsHumanReview).toBe(true);
    expect(await alertSink.list("s-1")).toHaveLength(1);
    expect(recordSink.entries.map((e) => e.kind)).toEqual(["sentiment_result", "conversation_state"]);
  });

  it("raises an alert for every high-risk message", async () => {
    const { chatbot, alertSink } = setup();

    await chatbot.handleMessage({ studentId: "s-1", sessionId: "chat-1", message: "I feel hopeless" });
    await chatbot.handleMessage({ studentId: "s-1", sessionId: "chat-1", message: "thanks for listening" });
    const reply = await chatbot.handleMessage({ studentId: "s-1", sessionId: "chat-1", message: "still hopeless" });

    expect(await alertSink.list()).toHaveLength(2);
    expect(reply.session?.alertCount).toBe(2);
    expect(reply.session?.messageCount).toBe(3);
  });

  it("rescans the raw message for crisis words", async () => {
    const { chatbot, alertSink } = setup();

    const reply = await chatbot.handleMessage({
      studentId: "s-1",
      sessionId: "chat-2",
      message: "I could die of boredom in this lecture"
    });

    expect(reply.sentiment.riskLevel).toBe("low");
    expect(reply.responseCategory).toBe("general_support");
    expect(reply.botResponse).toBe(fallbackTemplate("crisis"));
    expect(reply.counselorAlert).toBe(false);
    expect(await alertSink.list()).toEqual([]);
  });

  it.each([
    ["I have an exam and a deadline", "academic_stress", "academic"],
    ["I feel lonely", "general_support", "emotional"],
    ["hello", "general_support", "generic"]
  ] as const)("replies to %j with the %s category and the %s template", async (message, category, template) => {
    const { chatbot } = setup();

    const reply = await chatbot.handleMessage({ studentId: "s-1", message });

    expect(reply.responseCategory).toBe(category);
    expect(reply.botResponse).toBe(fallbackTemplate(template));
  });

  it("offers academic resources for academic stress", async () => {
    const { chatbot } = setup();

    const reply = await chatbot.handleMessage({ studentId: "s-1", message: "I have an exam and a deadline" });

    expect(reply.resources).toEqual(ACADEMIC_RESOURCES);
  });

  it("greets an empty message without touching the session", async () => {
    const { chatbot, recordSink } = setup();

    const reply = await chatbot.handleMessage({ studentId: "s-1", sessionId: "chat-3", message: "   " });

    expect(reply.botResponse).toBe(GREETING);
    expect(reply.responseSource).toBe("greeting");
    expect(reply.session).toBeNull();
    expect(chatbot.getSession("chat-3")).toBeNull();
    expect(recordSink.entries).toEqual([]);
  });

  it("creates a session id when none is given", async () => {
    const { chatbot } = setup();

    const reply = await chatbot.handleMessage({ studentId: "s-1", message: "hello" });

    expect(reply.sessionId.length).toBeGreaterThan(0);
    expect(chatbot.getSession(reply.sessionId)?.studentId).toBe("s-1");
  });

  it("refuses a session that belongs to another student", async () => {
    const { chatbot } = setup();
    await chatbot.handleMessage({ studentId: "s-1", sessionId: "chat-4", message: "hello" });

    await expect(chatbot.handleMessage({ studentId: "s-2", sessionId: "chat-4", message: "hello" })).rejects.toBeInstanceOf(
      InvalidInputError
    );
  });

  it("refuses an empty message on a session that belongs to another student", async () => {
    const { chatbot } = setup();
    await chatbot.handleMessage({ studentId: "s-1", sessionId: "chat-8", message: "I feel hopeless" });

    await expect(chatbot.handleMessage({ studentId: "s-2", sessionId: "chat-8", message: "   " })).rejects.toBeInstanceOf(
      InvalidInputError
    );
  });

  it("greets the owner of an existing session with its state", async () => {
    const { chatbot } = setup();
    await chatbot.handleMessage({ studentId: "s-1", sessionId: "chat-9", message: "hello" });

    const reply = await chatbot.handleMessage({ studentId: "s-1", sessionId: "chat-9", message: "" });

    expect(reply.responseSource).toBe("greeting");
    expect(reply.session?.messageCount).toBe(1);
  });

  it("persists only the latest turn with each conversation record", async () => {
    const { chatbot, recordSink } = setup();
    for (let i = 0; i < 8; i += 1) {
      await chatbot.handleMessage({ studentId: "s-1", sessionId: "chat-10", message: "hello" });
    }

    const snapshots = recordSink.entries.flatMap((e) => (e.kind === "conversation_state" ? [e.payload] : []));
    const second = snapshots[1];
    const last = snapshots[7];

    expect(snapshots).toHaveLength(8);
    expect(last?.messageCount).toBe(8);
    expect(last?.turn.studentMessage).toBe("hello");
    expect(last && "history" in last).toBe(false);
    expect(last && "transcript" in last).toBe(false);
    expect(JSON.stringify(last).length).toBe(JSON.stringify(second).length);
  });
});

describe("SupportChatbot with a generation backend", () => {
  it("uses generated text and passes the transcript as history", async () => {
    const generate = vi.fn(async (_request: GenerationRequest) => "You are not alone.");
    const { chatbot } = setup({ name: "stub", generate });

    const first = await chatbot.handleMessage({ studentId: "s-1", sessionId: "chat-5", message: "first message" });
    await chatbot.handleMessage({ studentId: "s-1", sessionId: "chat-5", message: "second message" });

    expect(first.responseSource).toBe("generated");
    expect(first.botResponse).toBe("You are not alone.");
    expect(generate.mock.calls[0]?.[0].history).toEqual([]);
    expect(generate.mock.calls[1]?.[0].history).toEqual([
      { studentMessage: "first message", botResponse: "You are not alone." }
    ]);
    expect(generate.mock.calls[1]?.[0].category).toBe("general_support");
  });

  it("falls back to a template when the backend fails", async () => {
    const { chatbot } = setup({
      name: "stub",
      generate: async () => {
        throw new Error("unavailable");
      }
    });

    const reply = await chatbot.handleMessage({ studentId: "s-1", message: "I have an exam and a deadline" });

    expect(reply.responseSource).toBe("fallback");
    expect(reply.botResponse).toBe(fallbackTemplate("academic"));
  });

  it("serializes concurrent messages in the same session", async () => {
    const backend: TextGenerationBackend = {
      name: "stub",
      generate: async (request) => {
        await new Promise((resolve) => setTimeout(resolve, request.history.length === 0 ? 20 : 0));
        return `reply ${request.history.length}`;
      }
    };
    const { chatbot } = setup(backend);

    const replies = await Promise.all(
      ["one", "two", "three"].map((message) => chatbot.handleMessage({ studentId: "s-1", sessionId: "chat-6", message }))
    );

    expect(replies.map((r) => r.botResponse)).toEqual(["reply 0", "reply 1", "reply 2"]);
    expect(chatbot.getSession("chat-6")?.transcript.map((t) => t.studentMessage)).toEqual(["one", "two", "three"]);
  });
});

describe("SupportChatbot summaries", () => {
  it("summarizes a live session", async () => {
    const { chatbot } = setup();
    await chatbot.handleMessage({ studentId: "s-1", sessionId: "chat-7", message: "I feel hopeless" });

    const summary = chatbot.summarizeSession("chat-7");

    expect(summary?.highRiskMessages).toBe(1);
    expect(summary?.keyConcerns).toEqual(["hopeless"]);
    expect(chatbot.summarizeSession("missing")).toBeNull();
  });

  it("rejects malformed explicit history", () => {
    const { chatbot } = setup();

    expect(() => chatbot.summarizeHistory([{ text: "placeholder" }])).toThrow(MalformedSentimentResultError);
  });
});
