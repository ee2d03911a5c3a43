import { z } from "zod";

// ============================================
// Environment configuration with validation
// Fails fast on startup if config is invalid
// ============================================

const numberFromEnv = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform(Number)
    .pipe(z.number().int().nonnegative());

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  // Supabase (vector indexes + ownership tables)
  SUPABASE_URL: z.string().url("SUPABASE_URL must be a valid URL"),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1, "SUPABASE_SERVICE_ROLE_KEY is required"),

  // OpenAI (embeddings + generation)
  OPENAI_API_KEY: z.string().min(1, "OPENAI_API_KEY is required"),
  EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  GENERATION_MODEL: z.string().default("gpt-4o-mini"),

  // Retrieval
  RETRIEVAL_TOP_K: numberFromEnv("10"),

  // Caches
  DOCUMENT_CACHE_TTL_MS: numberFromEnv("300000"), // 5 minutes
  ANSWER_CACHE_TTL_MS: numberFromEnv("180000"), // 3 minutes, 0 disables

  // Generation
  GENERATION_TIMEOUT_MS: numberFromEnv("30000"),
  MAX_CONTEXT_CHARS: numberFromEnv("6000"),

  // Background email indexing
  BACKGROUND_CONCURRENCY: numberFromEnv("4"),

  // Query classification overrides, comma-separated
  EXPENSE_KEYWORDS: z.string().optional(),
  SKILLS_KEYWORDS: z.string().optional(),
  VACATION_KEYWORDS: z.string().optional(),
  PROMPT_KEYWORDS: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error("❌ Invalid environment configuration:");
    for (const issue of result.error.issues) {
      console.error(`   ${issue.path.join(".")}: ${issue.message}`);
    }
    process.exit(1);
  }

  return result.data;
}

// Validate on module load
export const env = validateEnv();

/**
 * Parse a comma-separated keyword override.
 * Returns undefined when unset so callers keep their defaults.
 */
export function parseKeywordList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  const keywords = value
    .split(",")
    .map((k) => k.trim().toLowerCase())
    .filter(Boolean);
  return keywords.length > 0 ? keywords : undefined;
}

// Derived config for convenience
export const config = {
  isDev: env.NODE_ENV === "development",
  isProd: env.NODE_ENV === "production",

  supabase: {
    url: env.SUPABASE_URL,
    serviceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY,
  },

  openai: {
    apiKey: env.OPENAI_API_KEY,
    embeddingModel: env.EMBEDDING_MODEL,
    generationModel: env.GENERATION_MODEL,
  },

  retrieval: {
    topK: env.RETRIEVAL_TOP_K,
  },

  cache: {
    documentTtlMs: env.DOCUMENT_CACHE_TTL_MS,
    answerTtlMs: env.ANSWER_CACHE_TTL_MS,
  },

  generation: {
    timeoutMs: env.GENERATION_TIMEOUT_MS,
    maxContextChars: env.MAX_CONTEXT_CHARS,
  },

  background: {
    concurrency: Math.max(1, env.BACKGROUND_CONCURRENCY),
  },

  classification: {
    expense: parseKeywordList(env.EXPENSE_KEYWORDS),
    skills: parseKeywordList(env.SKILLS_KEYWORDS),
    vacation: parseKeywordList(env.VACATION_KEYWORDS),
    promptEngineering: parseKeywordList(env.PROMPT_KEYWORDS),
  },
} as const;

export type AppConfig = typeof config;
