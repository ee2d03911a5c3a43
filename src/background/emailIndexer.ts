// ============================================
// Email Indexer — classify, chunk, embed and store new emails
// Runs off the read path; one email failing never stops the batch.
// ============================================

import crypto from "crypto";
import { config } from "../config/env.js";
import { supabase, type SupabaseClient } from "../db/supabase.js";
import { logger } from "../lib/logger.js";
import { formatEmailText } from "../retrieval/passages.js";
import type { EmbeddingProvider } from "../retrieval/types.js";
import type { EmailType } from "../types/index.js";
import { chunkEmailForType, type ChunkStrategy } from "./emailChunker.js";
import type { EmailClassifier, EmailMessage } from "./emailClassifier.js";
import { TaskQueue } from "./taskQueue.js";

export interface EmailChunkRow {
  email_id: string;
  user_id: string;
  email_type: EmailType;
  chunk_index: number;
  content: string;
  embedding: number[];
  metadata: {
    subject: string;
    sender: string;
    date: string | null;
    classification_tags: string[];
    chunking_strategy: ChunkStrategy;
    index_run_id: string;
  };
}

/** Where indexed chunks end up */
export interface EmailChunkStore {
  insertChunks(rows: EmailChunkRow[]): Promise<void>;
  setEmailType(emailId: string, emailType: EmailType): Promise<void>;
}

export class SupabaseEmailChunkStore implements EmailChunkStore {
  constructor(private readonly client: SupabaseClient = supabase) {}

  async insertChunks(rows: EmailChunkRow[]): Promise<void> {
    const { error } = await this.client.from("email_chunks").insert(rows);
    if (error) {
      throw new Error(`email_chunks insert failed: ${error.message}`);
    }
  }

  async setEmailType(emailId: string, emailType: EmailType): Promise<void> {
    const { error } = await this.client.from("emails").update({ email_type: emailType }).eq("id", emailId);
    if (error) {
      throw new Error(`emails update failed: ${error.message}`);
    }
  }
}

export interface EmailIndexerDeps {
  classifier: EmailClassifier;
  embedder: EmbeddingProvider;
  store: EmailChunkStore;
  concurrency?: number;
}

export interface IndexEmailsResult {
  indexRunId: string;
  emailsIndexed: number;
  chunksWritten: number;
  skipped: number;
  failed: number;
}

export class EmailIndexer {
  constructor(private readonly deps: EmailIndexerDeps) {}

  async indexEmails(emails: readonly EmailMessage[]): Promise<IndexEmailsResult> {
    const indexRunId = crypto.randomUUID();
    const result: IndexEmailsResult = {
      indexRunId,
      emailsIndexed: 0,
      chunksWritten: 0,
      skipped: 0,
      failed: 0,
    };

    logger.info("Starting email indexing", {
      stage: "background",
      indexRunId,
      emailCount: emails.length,
    });

    const queue = new TaskQueue<EmailMessage>({
      name: "email-indexer",
      concurrency: this.deps.concurrency ?? config.background.concurrency,
      describe: (email) => email.id,
      worker: async (email) => {
        const written = await this.indexEmail(email, indexRunId);
        if (written === 0) {
          result.skipped++;
        } else {
          result.emailsIndexed++;
          result.chunksWritten += written;
        }
      },
    });

    queue.enqueueAll(emails);
    await queue.onIdle();
    result.failed = queue.stats().failed;

    logger.info("Email indexing complete", {
      stage: "background",
      ...result,
    });

    return result;
  }

  /** Returns the number of chunks written */
  private async indexEmail(email: EmailMessage, indexRunId: string): Promise<number> {
    const classification = this.deps.classifier.classify(email);
    const { strategy, chunks: bodies } = chunkEmailForType(email.body, classification.emailType);
    if (bodies.length === 0) {
      logger.debug("Skipping email without searchable body", {
        stage: "background",
        emailId: email.id,
        emailType: classification.emailType,
      });
      return 0;
    }

    const texts = bodies.map((body) => formatEmailText(email.sender, email.subject, body));
    const embeddings = await this.deps.embedder.embedMany(texts);

    const rows: EmailChunkRow[] = [];
    bodies.forEach((content, i) => {
      const embedding = embeddings[i];
      if (!embedding) return;
      rows.push({
        email_id: email.id,
        user_id: email.userId,
        email_type: classification.emailType,
        chunk_index: i,
        content,
        embedding,
        metadata: {
          subject: email.subject,
          sender: email.sender,
          date: email.date ? email.date.toISOString() : null,
          classification_tags: classification.tags,
          chunking_strategy: strategy,
          index_run_id: indexRunId,
        },
      });
    });

    if (rows.length !== texts.length) {
      throw new Error(`Expected ${texts.length} embeddings, got ${embeddings.length}`);
    }

    await this.deps.store.insertChunks(rows);
    await this.deps.store.setEmailType(email.id, classification.emailType);
    return rows.length;
  }
}
