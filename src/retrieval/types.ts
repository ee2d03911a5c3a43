// ============================================
// Retrieval collaborators — injected into the engine
// ============================================

import type { EmailType, Passage } from "../types/index.js";

export interface EmbeddingProvider {
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
  embedMany(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

export interface DocumentSearchFilters {
  /** Restrict to one document (single-document mode) */
  documentId?: string;
  limit: number;
}

export interface EmailSearchFilters {
  emailType?: EmailType;
  limit: number;
}

export interface DocumentIndex {
  search(
    queryEmbedding: number[],
    userId: string,
    filters: DocumentSearchFilters,
    signal?: AbortSignal
  ): Promise<Passage[]>;
}

export interface EmailIndex {
  search(
    queryEmbedding: number[],
    userId: string,
    filters: EmailSearchFilters,
    signal?: AbortSignal
  ): Promise<Passage[]>;
}
