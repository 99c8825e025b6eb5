import fs from "fs/promises";
import path from "path";

import type { Logger } from "../utils/logger";

export interface Timestamped {
  timestamp: string;
}

const withinRetention = (d: Date, retentionDays: number, now: Date): boolean => {
  const cutoff = new Date(now);
  cutoff.setDate(cutoff.getDate() - retentionDays);
  return d.getTime() >= cutoff.getTime();
};

/**
 * Append-only JSON Lines file with an optional in-memory mirror. Entries older than the
 * retention window are dropped on load. Appends are serialized through a single write chain.
 * Write-only stores pass `keepInMemory: false`; `list` then always resolves empty.
 */
export class JsonlStore<T extends Timestamped> {
  private readonly file: string;
  private readonly retentionDays: number;
  private readonly logger: Logger;
  private readonly isEntry: (value: unknown) => value is T;
  private initialized: Promise<void> | null = null;
  private writeChain: Promise<void> = Promise.resolve();
  private readonly keepInMemory: boolean;
  private entries: T[] = [];

  constructor(opts: {
    file: string;
    retentionDays: number;
    logger: Logger;
    isEntry: (value: unknown) => value is T;
    keepInMemory?: boolean;
  }) {
    this.file = opts.file;
    this.keepInMemory = opts.keepInMemory ?? true;
    this.retentionDays = opts.retentionDays;
    this.logger = opts.logger;
    this.isEntry = opts.isEntry;
  }

  private async ensureInitialized(): Promise<void> {
    if (this.initialized) return this.initialized;

    this.initialized = (async () => {
      await fs.mkdir(path.dirname(this.file), { recursive: true });
      try {
        const raw = await fs.readFile(this.file, "utf8");
        const lines = raw.split("\n").filter(Boolean);
        const now = new Date();
        const parsed: T[] = [];

        for (const line of lines) {
          let value: unknown;
          try {
            value = JSON.parse(line);
          } catch {
            this.logger.warn({ file: this.file }, "jsonl_line_unparseable");
            continue;
          }
          if (!this.isEntry(value)) continue;
          const ts = new Date(value.timestamp);
          if (Number.isNaN(ts.getTime()) || !withinRetention(ts, this.retentionDays, now)) continue;
          parsed.push(value);
        }

        if (this.keepInMemory) this.entries = parsed;

        if (lines.length !== parsed.length) {
          await this.rewriteFile(parsed);
        }
      } catch (error: unknown) {
        const code = error instanceof Error && "code" in error ? error.code : undefined;
        if (code !== "ENOENT") {
          this.logger.warn({ err: error, file: this.file }, "jsonl_load_failed");
        }
        this.entries = [];
      }
    })();

    return this.initialized;
  }

  private async rewriteFile(entries: T[]): Promise<void> {
    const tmp = `${this.file}.tmp`;
    const content = entries.map((e) => JSON.stringify(e)).join("\n") + (entries.length ? "\n" : "");
    await fs.writeFile(tmp, content, "utf8");
    await fs.rename(tmp, this.file);
  }

  async append(entry: T): Promise<void> {
    await this.ensureInitialized();
    if (this.keepInMemory) this.entries.push(entry);

    this.writeChain = this.writeChain.then(() => fs.appendFile(this.file, JSON.stringify(entry) + "\n", "utf8"));
    const pending = this.writeChain;
    // Keep the chain usable for later appends even if this write fails.
    this.writeChain = pending.catch(() => undefined);
    await pending;
  }

  async list(filter?: (entry: T) => boolean): Promise<T[]> {
    await this.ensureInitialized();
    return filter ? this.entries.filter(filter) : [...this.entries];
  }
}
