// ============================================
// Default wiring — production collaborators from config
// ============================================

import { config } from "../config/env.js";
import { SupabaseOwnershipStore } from "../db/ownership.js";
import { OpenAIAnswerGenerator } from "../llm/client.js";
import { OpenAIEmbeddingProvider } from "../retrieval/embeddings.js";
import { DualChannelRetriever } from "../retrieval/retriever.js";
import { SupabaseDocumentIndex, SupabaseEmailIndex } from "../retrieval/supabaseIndex.js";
import { createQueryEngine, type QueryEngine } from "./pipeline.js";

export function createDefaultQueryEngine(): QueryEngine {
  const retriever = new DualChannelRetriever({
    embedder: new OpenAIEmbeddingProvider(),
    documents: new SupabaseDocumentIndex(),
    emails: new SupabaseEmailIndex(),
    topK: config.retrieval.topK,
  });

  return createQueryEngine({
    retriever,
    generator: new OpenAIAnswerGenerator(),
    ownership: new SupabaseOwnershipStore(),
    options: {
      maxContextChars: config.generation.maxContextChars,
      documentCacheTtlMs: config.cache.documentTtlMs,
      answerCacheTtlMs: config.cache.answerTtlMs,
    },
  });
}
