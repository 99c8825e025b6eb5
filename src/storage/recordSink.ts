import { z } from "zod";

import type { ConversationTurnSnapshot } from "../chat/conversationState";
import type { InterventionPlan } from "../interventions/types";
import type { SentimentResult } from "../sentiment/types";
import type { Logger } from "../utils/logger";
import { JsonlStore } from "./jsonlStore";

export type CoreRecord =
  | { kind: "sentiment_result"; timestamp: string; studentId?: string; payload: SentimentResult }
  | { kind: "conversation_state"; timestamp: string; studentId: string; payload: ConversationTurnSnapshot }
  | { kind: "intervention_plan"; timestamp: string; studentId?: string; payload: InterventionPlan };

/** Persistence collaborator: the core only writes records, it never reads them back. */
export interface RecordSink {
  record(entry: CoreRecord): Promise<void>;
}

export class MemoryRecordSink implements RecordSink {
  readonly entries: CoreRecord[] = [];

  async record(entry: CoreRecord): Promise<void> {
    this.entries.push(entry);
  }
}

const recordEnvelopeSchema = z.object({
  kind: z.enum(["sentiment_result", "conversation_state", "intervention_plan"]),
  timestamp: z.string(),
  studentId: z.string().optional(),
  payload: z.record(z.unknown())
});

// Stored payloads are written by this process; only the envelope is checked when reloading.
const isRecord = (value: unknown): value is CoreRecord => recordEnvelopeSchema.safeParse(value).success;

export class JsonlRecordSink implements RecordSink {
  private readonly store: JsonlStore<CoreRecord>;
  private readonly logger: Logger;

  constructor(opts: { file: string; retentionDays: number; logger: Logger }) {
    this.logger = opts.logger;
    this.store = new JsonlStore<CoreRecord>({ ...opts, isEntry: isRecord, keepInMemory: false });
  }

  async record(entry: CoreRecord): Promise<void> {
    await this.store.append(entry);
    this.logger.debug({ kind: entry.kind, studentId: entry.studentId }, "record_persisted");
  }
}
