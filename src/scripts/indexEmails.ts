import "dotenv/config";
import { z } from "zod";
import { EmailClassifier, type EmailMessage } from "../background/emailClassifier.js";
import { EmailIndexer, SupabaseEmailChunkStore } from "../background/emailIndexer.js";
import { supabase } from "../db/supabase.js";
import { OpenAIEmbeddingProvider } from "../retrieval/embeddings.js";

const emailRowSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  user_id: z.string(),
  subject: z.string().nullable(),
  sender: z.string().nullable(),
  body: z.string().nullable(),
  received_at: z.string().nullable().optional(),
});

/**
 * Index every email of a user that has no chunks yet.
 *
 *   indexEmails <userId>
 */
async function main() {
  const userId = process.argv[2];
  if (!userId) {
    console.error("Usage: indexEmails <userId>");
    process.exit(1);
  }

  const { data, error } = await supabase
    .from("emails")
    .select("id, user_id, subject, sender, body, received_at")
    .eq("user_id", userId);
  if (error) throw new Error(`Failed to load emails: ${error.message}`);

  const { data: indexed } = await supabase.from("email_chunks").select("email_id").eq("user_id", userId);
  const done = new Set((indexed ?? []).map((row) => String(row.email_id)));

  const emails: EmailMessage[] = [];
  for (const raw of data ?? []) {
    const row = emailRowSchema.safeParse(raw);
    if (!row.success || done.has(row.data.id)) continue;
    emails.push({
      id: row.data.id,
      userId: row.data.user_id,
      subject: row.data.subject ?? "",
      sender: row.data.sender ?? "",
      body: row.data.body ?? "",
      date: row.data.received_at ? new Date(row.data.received_at) : undefined,
    });
  }

  console.log(`\n📧 Indexing ${emails.length} emails (${done.size} already indexed)`);

  const indexer = new EmailIndexer({
    classifier: new EmailClassifier(),
    embedder: new OpenAIEmbeddingProvider(),
    store: new SupabaseEmailChunkStore(),
  });
  const result = await indexer.indexEmails(emails);

  console.log(`✅ Indexed ${result.emailsIndexed} emails into ${result.chunksWritten} chunks`);
  if (result.skipped > 0) console.log(`   Skipped ${result.skipped} without body text`);
  if (result.failed > 0) console.log(`   ⚠️ ${result.failed} failed, see logs`);
}

main().catch(console.error);
