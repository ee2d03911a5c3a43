// ============================================
// Dual-Channel Retriever — documents and emails searched independently
// ============================================

import { retrievalError, cancelledError, isAbortError, wrapError, QueryEngineError } from "../lib/errors.js";
import type { RequestLogger } from "../lib/logger.js";
import type { Passage, SearchPlan } from "../types/index.js";
import type { DocumentIndex, EmailIndex, EmbeddingProvider } from "./types.js";

export type ChannelName = "documents" | "emails";

export type ChannelResult =
  | { status: "ok"; passages: Passage[] }
  | { status: "failed"; error: QueryEngineError }
  | { status: "skipped" };

export interface RetrievalOutcome {
  documents: ChannelResult;
  emails: ChannelResult;
}

export interface RetrieverDeps {
  embedder: EmbeddingProvider;
  documents: DocumentIndex;
  emails: EmailIndex;
  /** Per-channel result bound */
  topK: number;
}

export interface RetrieveOptions {
  signal?: AbortSignal;
  log: RequestLogger;
  requestId?: string;
}

/** Passages of a channel, empty unless it succeeded */
export function channelPassages(result: ChannelResult): Passage[] {
  return result.status === "ok" ? result.passages : [];
}

export class DualChannelRetriever {
  constructor(private readonly deps: RetrieverDeps) {}

  /**
   * Run the channels the plan asks for, concurrently. A failed channel is
   * reported in its result and the other still runs. Throws only when
   * every requested channel failed, or on cancellation.
   */
  async retrieve(
    question: string,
    userId: string,
    plan: SearchPlan,
    options: RetrieveOptions
  ): Promise<RetrievalOutcome> {
    const { signal, log, requestId } = options;
    const startTime = Date.now();

    // Shared by both channels; a rejection fails each channel in turn
    let embedding: Promise<number[]> | undefined;
    const queryEmbedding = () => {
      embedding ??= this.deps.embedder.embed(question, signal);
      return embedding;
    };

    const [documents, emails] = await Promise.all([
      plan.searchDocuments
        ? this.runChannel("documents", log, signal, async () =>
            this.deps.documents.search(
              await queryEmbedding(),
              userId,
              { documentId: plan.documentId, limit: this.deps.topK },
              signal
            )
          )
        : Promise.resolve<ChannelResult>({ status: "skipped" }),
      plan.searchEmails
        ? this.runChannel("emails", log, signal, async () =>
            this.deps.emails.search(
              await queryEmbedding(),
              userId,
              { emailType: plan.emailTypeFilter, limit: this.deps.topK },
              signal
            )
          )
        : Promise.resolve<ChannelResult>({ status: "skipped" }),
    ]);

    if (signal?.aborted) {
      throw cancelledError(requestId);
    }

    const requested = [documents, emails].filter((r) => r.status !== "skipped");
    if (requested.length > 0 && requested.every((r) => r.status === "failed")) {
      log.error("All retrieval channels failed", {
        documents: documents.status,
        emails: emails.status,
      });
      throw retrievalError("All retrieval channels failed", requestId);
    }

    log.info("Retrieval complete", {
      documents: documents.status === "ok" ? documents.passages.length : documents.status,
      emails: emails.status === "ok" ? emails.passages.length : emails.status,
      durationMs: Date.now() - startTime,
    });

    return { documents, emails };
  }

  private async runChannel(
    channel: ChannelName,
    log: RequestLogger,
    signal: AbortSignal | undefined,
    search: () => Promise<Passage[]>
  ): Promise<ChannelResult> {
    try {
      const passages = await search();
      return { status: "ok", passages: passages.slice(0, this.deps.topK) };
    } catch (err) {
      if (signal?.aborted || isAbortError(err)) {
        return { status: "failed", error: cancelledError(undefined, err) };
      }
      const error = err instanceof QueryEngineError
        ? err
        : new QueryEngineError({
            code: "RETRIEVAL_FAILED",
            message: `${channel} channel failed: ${wrapError(err).message}`,
            cause: err,
          });
      log.warn("Retrieval channel failed, treating as empty", {
        channel,
        error: error.message,
      });
      return { status: "failed", error };
    }
  }
}
