import { BackendUnavailableError, err, ok, type Result } from "../errors";

export type PromptCategory = "general_support" | "high_risk" | "academic_stress" | "intervention_plan";

export interface HistoryTurn {
  studentMessage: string;
  botResponse: string;
}

export interface GenerationRequest {
  category: PromptCategory;
  prompt: string;
  context: Record<string, unknown>;
  history: HistoryTurn[];
}

/** Optional free-text generator. Implementations may throw; callers go through `generateWithTimeout`. */
export interface TextGenerationBackend {
  readonly name: string;
  generate(request: GenerationRequest): Promise<string>;
}

export type GenerationOutcome = Result<string, BackendUnavailableError>;

const TIMED_OUT = Symbol("timed_out");

/**
 * Single attempt, bounded by `timeoutMs`. Every failure mode comes back as an error value
 * so the caller can take its deterministic branch.
 */
export const generateWithTimeout = async (
  backend: TextGenerationBackend | null,
  request: GenerationRequest,
  timeoutMs: number
): Promise<GenerationOutcome> => {
  if (!backend) {
    return err(new BackendUnavailableError("not_configured", "No text generation backend configured"));
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => resolve(TIMED_OUT), timeoutMs);
  });

  try {
    const winner = await Promise.race([backend.generate(request), timeout]);
    if (winner === TIMED_OUT) {
      return err(new BackendUnavailableError("timeout", `${backend.name} did not answer within ${timeoutMs}ms`));
    }

    const text = winner.trim();
    if (!text) {
      return err(new BackendUnavailableError("empty_response", `${backend.name} returned an empty response`));
    }
    return ok(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(new BackendUnavailableError("call_failed", `${backend.name} call failed: ${message}`, { cause: error }));
  } finally {
    clearTimeout(timer);
  }
};
