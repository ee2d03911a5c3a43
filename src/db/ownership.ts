// ============================================
// Ownership Store — which documents and emails a user owns
// Used to validate source selection and to tailor fallback messages.
// ============================================

import { z } from "zod";
import { supabase, type SupabaseClient } from "./supabase.js";
import { retrievalError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { EMAIL_TYPES, type EmailType } from "../types/index.js";

export interface OwnedDocument {
  id: string;
  title: string | null;
  filePath: string | null;
  documentType: string | null;
  description: string | null;
}

export type EmailTypeCounts = Record<EmailType, number>;

export interface OwnershipStore {
  documentBelongsTo(userId: string, documentId: string): Promise<boolean>;
  hasDocuments(userId: string): Promise<boolean>;
  /** Number of the user's emails, optionally of one type */
  countEmails(userId: string, emailType?: EmailType): Promise<number>;
  emailTypeCounts(userId: string): Promise<EmailTypeCounts>;
  listDocuments(userId: string): Promise<OwnedDocument[]>;
}

const documentRowSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  title: z.string().nullable().optional(),
  file_path: z.string().nullable().optional(),
  document_type: z.string().nullable().optional(),
  description: z.string().nullable().optional(),
});

const emailTypeRowSchema = z.object({
  email_type: z.string().nullable(),
});

export function emptyEmailTypeCounts(): EmailTypeCounts {
  return {
    business: 0,
    personal: 0,
    promotional: 0,
    transactional: 0,
    support: 0,
    generic: 0,
  };
}

export interface CountResult {
  count: number | null;
  error: { message: string } | null;
}

/**
 * Count from a head query. A failed query is a storage failure, never
 * "not owned" or "no emails".
 */
export function requireCount(result: CountResult, check: string, context: Record<string, unknown>): number {
  if (result.error) {
    logger.error(`${check} failed`, { ...context, stage: "db", error: result.error.message });
    throw retrievalError(`${check} failed: ${result.error.message}`, undefined, result.error);
  }
  return result.count ?? 0;
}

/**
 * Supabase-backed store over the `documents` and `emails` tables.
 * Ownership checks throw RETRIEVAL_FAILED on query errors; listings
 * degrade to empty.
 */
export class SupabaseOwnershipStore implements OwnershipStore {
  constructor(private readonly client: SupabaseClient = supabase) {}

  async documentBelongsTo(userId: string, documentId: string): Promise<boolean> {
    const result = await this.client
      .from("documents")
      .select("id", { count: "exact", head: true })
      .eq("id", documentId)
      .eq("owner_id", userId);

    return requireCount(result, "Document ownership check", { userId, documentId }) > 0;
  }

  async hasDocuments(userId: string): Promise<boolean> {
    const { count, error } = await this.client
      .from("documents")
      .select("id", { count: "exact", head: true })
      .eq("owner_id", userId);

    if (error) {
      // Only gates an early exit, so let retrieval run
      logger.warn("Document existence check failed", {
        stage: "db",
        userId,
        error: error.message,
      });
      return true;
    }

    return (count ?? 0) > 0;
  }

  async countEmails(userId: string, emailType?: EmailType): Promise<number> {
    let query = this.client
      .from("emails")
      .select("id", { count: "exact", head: true })
      .eq("user_id", userId);

    if (emailType) {
      query = query.eq("email_type", emailType);
    }

    return requireCount(await query, "Email count", { userId, emailType });
  }

  async emailTypeCounts(userId: string): Promise<EmailTypeCounts> {
    const counts = emptyEmailTypeCounts();

    const { data, error } = await this.client
      .from("emails")
      .select("email_type")
      .eq("user_id", userId);

    if (error) {
      logger.error("Email type listing failed", {
        stage: "db",
        userId,
        error: error.message,
      });
      return counts;
    }

    for (const raw of data ?? []) {
      const row = emailTypeRowSchema.safeParse(raw);
      if (!row.success) continue;
      const type = EMAIL_TYPES.find((t) => t === row.data.email_type) ?? "generic";
      counts[type]++;
    }

    return counts;
  }

  async listDocuments(userId: string): Promise<OwnedDocument[]> {
    const { data, error } = await this.client
      .from("documents")
      .select("id, title, file_path, document_type, description")
      .eq("owner_id", userId)
      .order("created_at", { ascending: false });

    if (error) {
      logger.error("Document listing failed", {
        stage: "db",
        userId,
        error: error.message,
      });
      return [];
    }

    const documents: OwnedDocument[] = [];
    for (const raw of data ?? []) {
      const row = documentRowSchema.safeParse(raw);
      if (!row.success) {
        logger.warn("Skipping malformed document row", { stage: "db", userId });
        continue;
      }
      documents.push({
        id: row.data.id,
        title: row.data.title ?? null,
        filePath: row.data.file_path ?? null,
        documentType: row.data.document_type ?? null,
        description: row.data.description ?? null,
      });
    }
    return documents;
  }
}
