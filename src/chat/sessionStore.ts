import type { ConversationState } from "./conversationState";

export interface SessionUpdate<T> {
  state: ConversationState;
  result: T;
}

/**
 * Owns every live conversation. Updates to one session run strictly one after another;
 * different sessions never wait on each other.
 */
export class SessionStore {
  private readonly sessions = new Map<string, ConversationState>();
  private readonly tails = new Map<string, Promise<void>>();

  get(sessionId: string): ConversationState | null {
    return this.sessions.get(sessionId) ?? null;
  }

  size(): number {
    return this.sessions.size;
  }

  withSession<T>(
    sessionId: string,
    update: (current: ConversationState | null) => Promise<SessionUpdate<T>>
  ): Promise<T> {
    const previous = this.tails.get(sessionId) ?? Promise.resolve();

    const task = previous.then(async () => {
      const { state, result } = await update(this.get(sessionId));
      this.sessions.set(sessionId, state);
      return result;
    });

    const tail = task.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(sessionId, tail);
    void tail.then(() => {
      if (this.tails.get(sessionId) === tail) this.tails.delete(sessionId);
    });

    return task;
  }
}
