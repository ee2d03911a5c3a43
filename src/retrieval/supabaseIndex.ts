// ============================================
// Supabase vector indexes — match_document_chunks / match_email_chunks
// ============================================

import { supabase, type SupabaseClient } from "../db/supabase.js";
import { logger } from "../lib/logger.js";
import { retrievalError } from "../lib/errors.js";
import type { Passage } from "../types/index.js";
import type { DocumentIndex, DocumentSearchFilters, EmailIndex, EmailSearchFilters } from "./types.js";
import {
  documentRowToPassage,
  emailRowToPassage,
  parseDocumentRow,
  parseEmailRow,
  type RowParseResult,
} from "./passages.js";

/**
 * Map RPC rows to passages. A row that does not parse is logged and
 * skipped; the rest of the result set is kept.
 */
function collectPassages<R>(
  rpc: string,
  data: unknown,
  parse: (raw: unknown) => RowParseResult<R>,
  toPassage: (row: R) => Passage
): Passage[] {
  const rows: unknown[] = Array.isArray(data) ? data : [];
  const passages: Passage[] = [];
  let skipped = 0;

  for (const raw of rows) {
    const parsed = parse(raw);
    if (!parsed.ok) {
      skipped++;
      logger.warn("Skipping malformed search row", {
        stage: "retrieval",
        rpc,
        reason: parsed.reason,
      });
      continue;
    }
    passages.push(toPassage(parsed.row));
  }

  if (skipped > 0) {
    logger.info("Search rows skipped", { stage: "retrieval", rpc, skipped, kept: passages.length });
  }

  return passages;
}

export class SupabaseDocumentIndex implements DocumentIndex {
  constructor(private readonly client: SupabaseClient = supabase) {}

  async search(
    queryEmbedding: number[],
    userId: string,
    filters: DocumentSearchFilters,
    signal?: AbortSignal
  ): Promise<Passage[]> {
    const query = this.client.rpc("match_document_chunks", {
      query_embedding: queryEmbedding,
      match_user_id: userId,
      match_document_id: filters.documentId ?? null,
      match_count: filters.limit,
    });

    const { data, error } = await (signal ? query.abortSignal(signal) : query);

    if (error) {
      throw retrievalError(`match_document_chunks failed: ${error.message}`);
    }

    return collectPassages("match_document_chunks", data, parseDocumentRow, documentRowToPassage);
  }
}

export class SupabaseEmailIndex implements EmailIndex {
  constructor(private readonly client: SupabaseClient = supabase) {}

  async search(
    queryEmbedding: number[],
    userId: string,
    filters: EmailSearchFilters,
    signal?: AbortSignal
  ): Promise<Passage[]> {
    const query = this.client.rpc("match_email_chunks", {
      query_embedding: queryEmbedding,
      match_user_id: userId,
      match_email_type: filters.emailType ?? null,
      match_count: filters.limit,
    });

    const { data, error } = await (signal ? query.abortSignal(signal) : query);

    if (error) {
      throw retrievalError(`match_email_chunks failed: ${error.message}`);
    }

    return collectPassages("match_email_chunks", data, parseEmailRow, emailRowToPassage);
  }
}
