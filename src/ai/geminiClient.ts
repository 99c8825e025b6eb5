import { GoogleGenerativeAI, type GenerationConfig } from "@google/generative-ai";

import type { Logger } from "../utils/logger";
import type { GenerationRequest, PromptCategory, TextGenerationBackend } from "./generationBackend";

const GENERATION_CONFIG: Record<PromptCategory, GenerationConfig> = {
  general_support: { temperature: 0.7, maxOutputTokens: 500, topP: 0.9, topK: 40 },
  academic_stress: { temperature: 0.6, maxOutputTokens: 600, topP: 0.9, topK: 40 },
  high_risk: { temperature: 0.3, maxOutputTokens: 500, topP: 0.8, topK: 40 },
  intervention_plan: { temperature: 0.5, maxOutputTokens: 900, topP: 0.9, topK: 40 }
};

export class GeminiClient implements TextGenerationBackend {
  readonly name = "gemini";
  private readonly genAI: GoogleGenerativeAI;
  private readonly modelName: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(opts: { apiKey: string; modelName: string; timeoutMs: number; logger: Logger }) {
    this.genAI = new GoogleGenerativeAI(opts.apiKey);
    this.modelName = opts.modelName;
    this.timeoutMs = opts.timeoutMs;
    this.logger = opts.logger;
  }

  async generate(request: GenerationRequest): Promise<string> {
    const model = this.genAI.getGenerativeModel({ model: this.modelName }, { timeout: this.timeoutMs });

    const result = await model.generateContent({
      contents: [{ role: "user", parts: [{ text: request.prompt }] }],
      generationConfig: GENERATION_CONFIG[request.category]
    });

    const response = result.response;
    const usage = response.usageMetadata;

    this.logger.debug(
      {
        model: this.modelName,
        category: request.category,
        input_tokens: usage?.promptTokenCount,
        output_tokens: usage?.candidatesTokenCount
      },
      "gemini_generation_complete"
    );

    return response.text();
  }
}

export const createGeminiClient = (
  config: { apiKey: string | null; model: string; timeoutMs: number },
  logger: Logger
): GeminiClient | null => {
  if (!config.apiKey) return null;
  return new GeminiClient({ apiKey: config.apiKey, modelName: config.model, timeoutMs: config.timeoutMs, logger });
};
