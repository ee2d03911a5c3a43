// ============================================
// Embeddings — OpenAI embedding generation
// ============================================

import OpenAI from "openai";
import { config } from "../config/env.js";
import { logger } from "../lib/logger.js";
import type { EmbeddingProvider } from "./types.js";

export const EMBEDDING_DIMENSIONS = 1536;

/** Model input limit, in characters */
const MAX_INPUT_CHARS = 8000;

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  constructor(
    private readonly client: OpenAI = new OpenAI({ apiKey: config.openai.apiKey }),
    private readonly model: string = config.openai.embeddingModel
  ) {}

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    try {
      const response = await this.client.embeddings.create(
        {
          model: this.model,
          input: text.slice(0, MAX_INPUT_CHARS),
          dimensions: EMBEDDING_DIMENSIONS,
        },
        { signal }
      );
      const embedding = response.data[0]?.embedding;
      if (!embedding) {
        throw new Error("No embedding returned from OpenAI");
      }
      return embedding;
    } catch (err) {
      logger.error("Embedding generation failed", {
        stage: "retrieval",
        textPreview: text.slice(0, 50),
        error: err,
      });
      throw err;
    }
  }

  async embedMany(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];
    try {
      const response = await this.client.embeddings.create(
        {
          model: this.model,
          input: texts.map((t) => t.slice(0, MAX_INPUT_CHARS)),
          dimensions: EMBEDDING_DIMENSIONS,
        },
        { signal }
      );
      return response.data.map((d) => d.embedding);
    } catch (err) {
      logger.error("Batch embedding generation failed", {
        stage: "retrieval",
        textCount: texts.length,
        error: err,
      });
      throw err;
    }
  }
}
