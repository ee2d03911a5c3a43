// ============================================
// LLM Client — OpenAI chat completion as the generation primitive
// ============================================

import OpenAI from "openai";
import { config } from "../config/env.js";
import { cancelledError, generationError, isAbortError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { ANSWER_SYSTEM_PROMPT, buildAnswerMessage } from "./prompts.js";

export interface CompletionOptions {
  signal?: AbortSignal;
  requestId?: string;
}

/** Black-box text completion over an already-bounded context */
export interface AnswerGenerator {
  complete(question: string, contextTexts: readonly string[], options?: CompletionOptions): Promise<string>;
}

export interface OpenAIGeneratorOptions {
  model?: string;
  timeoutMs?: number;
  temperature?: number;
  maxTokens?: number;
}

export class OpenAIAnswerGenerator implements AnswerGenerator {
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(
    private readonly client: OpenAI = new OpenAI({ apiKey: config.openai.apiKey }),
    options: OpenAIGeneratorOptions = {}
  ) {
    this.model = options.model ?? config.openai.generationModel;
    this.timeoutMs = options.timeoutMs ?? config.generation.timeoutMs;
    this.temperature = options.temperature ?? 0.1;
    this.maxTokens = options.maxTokens ?? 500;
  }

  async complete(question: string, contextTexts: readonly string[], options: CompletionOptions = {}): Promise<string> {
    const { signal, requestId } = options;
    const startTime = Date.now();

    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: "system", content: ANSWER_SYSTEM_PROMPT },
            { role: "user", content: buildAnswerMessage(question, contextTexts) },
          ],
          temperature: this.temperature,
          max_tokens: this.maxTokens,
        },
        { signal, timeout: this.timeoutMs, maxRetries: 0 }
      );

      const content = response.choices[0]?.message?.content?.trim() ?? "";
      if (!content) {
        throw new Error("Empty completion returned from OpenAI");
      }

      logger.debug("LLM completion done", {
        stage: "llm",
        requestId,
        model: this.model,
        durationMs: Date.now() - startTime,
      });

      return content;
    } catch (err) {
      if (signal?.aborted || isAbortError(err)) {
        throw cancelledError(requestId, err);
      }
      logger.error("LLM completion failed", {
        stage: "llm",
        requestId,
        model: this.model,
        durationMs: Date.now() - startTime,
        error: err,
      });
      throw generationError(err instanceof Error ? err.message : String(err), requestId, err);
    }
  }
}
