export class InvalidInputError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "InvalidInputError";
    this.issues = issues;
  }
}

export class MalformedSentimentResultError extends Error {
  public readonly index: number;
  public readonly issues: string[];

  constructor(index: number, issues: string[]) {
    super(`Prior analysis at index ${index} is malformed`);
    this.name = "MalformedSentimentResultError";
    this.index = index;
    this.issues = issues;
  }
}

export type BackendErrorReason = "not_configured" | "timeout" | "empty_response" | "call_failed";

export class BackendUnavailableError extends Error {
  public readonly reason: BackendErrorReason;

  constructor(reason: BackendErrorReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BackendUnavailableError";
    this.reason = reason;
  }
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const err = <E>(error: E): Result<never, E> => ({ ok: false, error });
