// ============================================
// Public API
// ============================================

export {
  createQueryEngine,
  PIPELINE_VERSION,
  QueryEngine,
  type AnswerOptions,
  type QueryEngineDeps,
  type QueryEngineOptions,
} from "./app/pipeline.js";
export { createDefaultQueryEngine } from "./app/container.js";
export { listAvailableSources, type SourceItem } from "./app/sources.js";

export {
  parseSourceSelection,
  resolveSearchPlan,
  sourceSelectionSchema,
  type SourceSelection,
} from "./query/sourceResolver.js";
export { classifyQuery } from "./query/classify.js";

export { DualChannelRetriever, type RetrieverDeps } from "./retrieval/retriever.js";
export type { DocumentIndex, EmailIndex, EmbeddingProvider } from "./retrieval/types.js";
export { OpenAIEmbeddingProvider } from "./retrieval/embeddings.js";
export { SupabaseDocumentIndex, SupabaseEmailIndex } from "./retrieval/supabaseIndex.js";
export { OpenAIAnswerGenerator, type AnswerGenerator } from "./llm/client.js";
export { SupabaseOwnershipStore, type OwnedDocument, type OwnershipStore } from "./db/ownership.js";

export { validateResponse, buildSafeAnswer } from "./grounding/responseValidator.js";
export { attributeSources } from "./grounding/attribution.js";

export { EmailClassifier, type EmailClassification, type EmailMessage } from "./background/emailClassifier.js";
export { EmailIndexer, SupabaseEmailChunkStore, type EmailChunkStore } from "./background/emailIndexer.js";
export { TaskQueue } from "./background/taskQueue.js";

export { QueryEngineError, getUserMessage, type ErrorCode } from "./lib/errors.js";
export type * from "./types/index.js";
