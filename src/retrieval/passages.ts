// ============================================
// Row -> Passage mapping for both channels
// ============================================

import { z } from "zod";
import type { Passage } from "../types/index.js";

const optionalText = z.string().nullable().optional();

const documentRowSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  document_id: z.union([z.string(), z.number()]).transform(String).nullable().optional(),
  content: z.string(),
  similarity: z.number(),
  metadata: z
    .object({
      title: optionalText,
      filename: optionalText,
      namespace: optionalText,
    })
    .passthrough()
    .nullable()
    .optional(),
});

const emailRowSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  email_id: z.union([z.string(), z.number()]).transform(String),
  content: z.string(),
  similarity: z.number(),
  metadata: z
    .object({
      subject: optionalText,
      sender: optionalText,
      date: optionalText,
      classification_tags: z.array(z.string()).nullable().optional(),
    })
    .passthrough()
    .nullable()
    .optional(),
});

export type DocumentRow = z.output<typeof documentRowSchema>;
export type EmailRow = z.output<typeof emailRowSchema>;

export type RowParseResult<T> = { ok: true; row: T } | { ok: false; reason: string };

function parseRow<S extends z.ZodTypeAny>(schema: S, raw: unknown): RowParseResult<z.output<S>> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, reason: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ") };
  }
  return { ok: true, row: parsed.data };
}

export const parseDocumentRow = (raw: unknown) => parseRow(documentRowSchema, raw);
export const parseEmailRow = (raw: unknown) => parseRow(emailRowSchema, raw);

const MAX_FILENAME_LABEL = 30;

/** "Q3 Budget.pdf" -> "Document: Q3 Budget" */
export function documentLabel(id: string, title?: string | null, filename?: string | null): string {
  if (title) return title;
  if (filename) {
    const name = filename.replace(/\.pdf$/i, "");
    const short = name.length > MAX_FILENAME_LABEL ? `${name.slice(0, MAX_FILENAME_LABEL)}...` : name;
    return `Document: ${short}`;
  }
  return `Document ${id}`;
}

export function emailLabel(emailId: string, subject?: string | null, sender?: string | null): string {
  return subject || sender || `Email ${emailId}`;
}

/** Provenance-prefixed email text used for matching and generation */
export function formatEmailText(sender: string | null | undefined, subject: string | null | undefined, body: string): string {
  return `[EMAIL from ${sender || "Unknown Sender"}] Subject: ${subject || "No Subject"}\nContent: ${body}`;
}

export function documentRowToPassage(row: DocumentRow): Passage {
  const meta = row.metadata;
  const identity = row.document_id || meta?.filename || meta?.namespace || row.id;
  return {
    text: row.content,
    score: row.similarity,
    sourceKind: "document",
    sourceIdentity: identity,
    displayLabel: documentLabel(identity, meta?.title, meta?.filename),
  };
}

export function emailRowToPassage(row: EmailRow): Passage {
  const meta = row.metadata;
  return {
    text: formatEmailText(meta?.sender, meta?.subject, row.content),
    score: row.similarity,
    sourceKind: "email",
    sourceIdentity: row.email_id,
    displayLabel: emailLabel(row.email_id, meta?.subject, meta?.sender),
  };
}

/** True when the passage text carries the email provenance prefix */
export function isEmailText(text: string): boolean {
  return text.includes("[EMAIL");
}
