// ============================================
// Email body chunking — paragraphs, then sentences, then hard limits
// Chunk sizing depends on the email's canonical type.
// ============================================

import type { EmailType } from "../types/index.js";

export const EMAIL_CHUNK_SIZE = 1000;
export const EMAIL_CHUNK_OVERLAP = 100;

/** Chunks shorter than this carry no searchable content */
export const MIN_CHUNK_LENGTH = 20;

const PARAGRAPH_SEPARATOR = "\n\n";

/** Closed set of chunking strategies, recorded on each stored chunk */
export type ChunkStrategy =
  | "thread_aware"
  | "conversation"
  | "content_focused"
  | "data_extraction"
  | "issue_focused"
  | "balanced";

export interface EmailChunkConfig {
  strategy: ChunkStrategy;
  chunkSize: number;
  overlap: number;
  minChunkSize: number;
}

export const EMAIL_CHUNK_CONFIGS: Readonly<Record<EmailType, EmailChunkConfig>> = {
  business: { strategy: "thread_aware", chunkSize: 800, overlap: 100, minChunkSize: 150 },
  personal: { strategy: "conversation", chunkSize: 600, overlap: 75, minChunkSize: 100 },
  promotional: { strategy: "content_focused", chunkSize: 500, overlap: 50, minChunkSize: 100 },
  transactional: { strategy: "data_extraction", chunkSize: 400, overlap: 40, minChunkSize: 80 },
  support: { strategy: "issue_focused", chunkSize: 700, overlap: 100, minChunkSize: 120 },
  generic: { strategy: "balanced", chunkSize: 400, overlap: 50, minChunkSize: 100 },
};

export interface TypedChunks {
  strategy: ChunkStrategy;
  chunks: string[];
}

/** Chunk a body with the sizing of its email type */
export function chunkEmailForType(body: string, emailType: EmailType): TypedChunks {
  const { strategy, chunkSize, overlap, minChunkSize } = EMAIL_CHUNK_CONFIGS[emailType];
  return { strategy, chunks: chunkEmailBody(body, chunkSize, overlap, minChunkSize) };
}

/**
 * Split an email body into overlapping chunks of at most `maxSize`
 * characters. A short body is one chunk. Chunks under `minSize`
 * characters are dropped, including a short body.
 */
export function chunkEmailBody(
  body: string,
  maxSize: number = EMAIL_CHUNK_SIZE,
  overlap: number = EMAIL_CHUNK_OVERLAP,
  minSize: number = MIN_CHUNK_LENGTH
): string[] {
  const text = body.replace(/\r\n/g, "\n").trim();
  if (!text) return [];
  if (text.length <= maxSize) {
    return text.length >= minSize ? [text] : [];
  }

  const chunks: string[] = [];
  let current = "";

  for (const paragraph of text.split(/\n\n+/)) {
    for (const part of splitLongText(paragraph, maxSize)) {
      if (!current) {
        current = part;
      } else if (current.length + PARAGRAPH_SEPARATOR.length + part.length > maxSize) {
        chunks.push(current);
        // Overlap shrinks so the carried tail and the next part still fit
        const room = maxSize - PARAGRAPH_SEPARATOR.length - part.length;
        const carried = Math.min(overlap, room) > 0 ? current.slice(-Math.min(overlap, room)) : "";
        current = carried ? `${carried}${PARAGRAPH_SEPARATOR}${part}` : part;
      } else {
        current = `${current}${PARAGRAPH_SEPARATOR}${part}`;
      }
    }
  }

  if (current.trim()) {
    chunks.push(current);
  }

  return chunks.map((c) => c.trim()).filter((c) => c.length >= minSize);
}

/**
 * Split text that's too long by sentence boundaries, falling back to a
 * hard character limit for run-on sentences.
 */
function splitLongText(text: string, maxSize: number): string[] {
  if (text.length <= maxSize) return [text];

  const parts: string[] = [];
  let current = "";

  for (const sentence of text.split(/(?<=[.!?])\s+/)) {
    if (sentence.length > maxSize) {
      if (current.trim()) {
        parts.push(current.trim());
        current = "";
      }
      for (let i = 0; i < sentence.length; i += maxSize) {
        parts.push(sentence.slice(i, i + maxSize));
      }
    } else if (current.length + sentence.length + 1 > maxSize) {
      if (current.trim()) parts.push(current.trim());
      current = sentence;
    } else {
      current = current ? `${current} ${sentence}` : sentence;
    }
  }

  if (current.trim()) {
    parts.push(current.trim());
  }

  return parts;
}
