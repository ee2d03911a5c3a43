// ============================================
// Pipeline — Query answering orchestration
//
// Flow:
// 1. Resolve sources (scope + question cues -> SearchPlan)
// 2. Retrieve (documents and emails, concurrently)
// 3. Combine (priority policy)
// 4. Synthesize deterministically, else generate + validate
// 5. Attribute citations from the passages actually used
// ============================================

import crypto from "crypto";
import { attributeSources } from "../grounding/attribution.js";
import { buildSafeAnswer, GENERIC_CLARIFY_MESSAGE, validateResponse } from "../grounding/responseValidator.js";
import { synthesizeAnswer } from "../answer/synthesize.js";
import {
  NO_DOCUMENTS_MESSAGE,
  NO_EMAIL_EVIDENCE_MESSAGE,
  noEvidenceMessage,
  userDocumentCategories,
} from "../answer/fallbackMessages.js";
import { technicalDifficultyMessage } from "../answer/errorMessages.js";
import { selectContext } from "../llm/prompts.js";
import type { AnswerGenerator } from "../llm/client.js";
import type { OwnershipStore } from "../db/ownership.js";
import { classifyQuery } from "../query/classify.js";
import { resolveSearchPlan, scopeKey } from "../query/sourceResolver.js";
import { combinePassages } from "../retrieval/combine.js";
import { channelPassages, type DualChannelRetriever } from "../retrieval/retriever.js";
import { cancelledError, isAbortError, sourceError, wrapError } from "../lib/errors.js";
import { createRequestLogger, preview, type RequestLogger } from "../lib/logger.js";
import { TtlCache } from "../lib/ttlCache.js";
import type {
  AnswerOutcome,
  AnswerResponse,
  Passage,
  QueryClassification,
  SearchPlan,
  SearchScope,
  SourceCitation,
} from "../types/index.js";

export const PIPELINE_VERSION = "query-engine.v1.0";

export interface QueryEngineOptions {
  /** Character budget for generation context */
  maxContextChars: number;
  /** TTL of the "user has documents" cache; 0 disables it */
  documentCacheTtlMs: number;
  /** TTL of the final-answer cache; 0 disables it */
  answerCacheTtlMs: number;
  answerCacheSize?: number;
  documentCacheSize?: number;
}

export interface QueryEngineDeps {
  retriever: DualChannelRetriever;
  generator: AnswerGenerator;
  ownership: OwnershipStore;
  options: QueryEngineOptions;
  classify?: (question: string) => QueryClassification;
  /** Picks among technical-difficulty message variants */
  random?: () => number;
  now?: () => number;
}

export interface AnswerOptions {
  signal?: AbortSignal;
  requestId?: string;
}

/** Outcomes whose answer depends on state that may change any moment */
const UNCACHED_OUTCOMES: ReadonlySet<AnswerOutcome> = new Set([
  "no_documents",
  "no_email_evidence",
  "technical_difficulty",
]);

interface CachedAnswer {
  answer: string;
  sources: SourceCitation[];
  outcome: AnswerOutcome;
}

interface Draft {
  answer: string;
  sources: SourceCitation[];
  outcome: AnswerOutcome;
}

/** Callers own what they receive; the cache keeps its own copy */
function copyAnswer(answer: CachedAnswer): CachedAnswer {
  return { ...answer, sources: answer.sources.map((source) => ({ ...source })) };
}

function normalizeQuestion(question: string): string {
  return question.trim().toLowerCase().replace(/\s+/g, " ");
}

function throwIfAborted(signal: AbortSignal | undefined, requestId: string): void {
  if (signal?.aborted) {
    throw cancelledError(requestId);
  }
}

export class QueryEngine {
  private readonly answerCache: TtlCache<CachedAnswer>;
  private readonly documentCache: TtlCache<boolean>;
  private readonly classify: (question: string) => QueryClassification;
  private readonly now: () => number;

  constructor(private readonly deps: QueryEngineDeps) {
    this.now = deps.now ?? Date.now;
    this.classify = deps.classify ?? ((question) => classifyQuery(question));
    this.answerCache = new TtlCache({
      name: "answers",
      ttlMs: deps.options.answerCacheTtlMs,
      maxSize: deps.options.answerCacheSize ?? 100,
      now: this.now,
    });
    this.documentCache = new TtlCache({
      name: "has-documents",
      ttlMs: deps.options.documentCacheTtlMs,
      maxSize: deps.options.documentCacheSize ?? 1000,
      now: this.now,
    });
  }

  /**
   * Answer a question over the user's documents and emails.
   *
   * Throws QueryEngineError only for a rejected source selection
   * (INVALID_SOURCE, DOCUMENT_NOT_FOUND), cancellation, or when every
   * retrieval channel failed. Everything else resolves to an answer.
   */
  async answerQuestion(
    question: string,
    userId: string,
    scope: SearchScope,
    options: AnswerOptions = {}
  ): Promise<AnswerResponse> {
    const requestId = options.requestId ?? crypto.randomUUID().slice(0, 8);
    const { signal } = options;
    const startTime = this.now();
    const log = createRequestLogger(requestId, "pipeline");

    log.info("Pipeline started", {
      userId,
      scope: scopeKey(scope),
      question: preview(question),
    });

    throwIfAborted(signal, requestId);

    const cacheKey = `${userId}|${scopeKey(scope)}|${normalizeQuestion(question)}`;
    const cached = this.answerCache.get(cacheKey);
    if (cached) {
      log.withStage("cache").info("Answer cache hit");
      return { ...copyAnswer(cached), fromCache: true, elapsedMs: this.now() - startTime };
    }

    const draft = await this.run(question, userId, scope, requestId, log, signal);

    if (!UNCACHED_OUTCOMES.has(draft.outcome)) {
      this.answerCache.set(cacheKey, copyAnswer(draft));
    }

    const elapsedMs = this.now() - startTime;
    log.info("Pipeline complete", {
      outcome: draft.outcome,
      sourceCount: draft.sources.length,
      elapsedMs,
    });

    return { ...draft, fromCache: false, elapsedMs };
  }

  /** Drop cached answers and existence checks, e.g. after new uploads */
  invalidateUser(userId: string): void {
    this.documentCache.delete(userId);
    this.answerCache.deleteByPrefix(`${userId}|`);
  }

  private async run(
    question: string,
    userId: string,
    scope: SearchScope,
    requestId: string,
    log: RequestLogger,
    signal: AbortSignal | undefined
  ): Promise<Draft> {
    // Step 1: Resolve sources
    const resolution = await resolveSearchPlan(scope, question, userId, this.deps.ownership);
    if (resolution.status === "rejected") {
      log.withStage("resolve").warn("Source selection rejected", {
        code: resolution.code,
        reason: resolution.reason,
      });
      throw sourceError(resolution.code, resolution.reason, requestId, { scope: scopeKey(scope) });
    }

    const plan = resolution.plan;
    log.withStage("resolve").info("Search plan resolved", { ...plan });

    const classification = this.classify(question);

    if (await this.lacksDocumentsForPlan(userId, plan)) {
      log.withStage("fallback").info("User has no documents for a documents-only search");
      return { answer: NO_DOCUMENTS_MESSAGE, sources: [], outcome: "no_documents" };
    }

    throwIfAborted(signal, requestId);

    // Step 2: Retrieve
    const retrieval = await this.deps.retriever.retrieve(question, userId, plan, {
      signal,
      requestId,
      log: log.withStage("retrieval"),
    });

    // Step 3: Combine
    const combined = combinePassages(
      channelPassages(retrieval.documents),
      channelPassages(retrieval.emails),
      plan.prioritizeEmails
    );

    if (combined.kind === "no_email_evidence") {
      log.withStage("combine").info("Email search was prioritized and found nothing");
      return { answer: NO_EMAIL_EVIDENCE_MESSAGE, sources: [], outcome: "no_email_evidence" };
    }

    const passages = combined.passages;
    log.withStage("combine").info("Passages combined", { count: passages.length });

    if (passages.length === 0) {
      const documents = await this.deps.ownership.listDocuments(userId);
      return {
        answer: noEvidenceMessage(classification, userDocumentCategories(documents)),
        sources: [],
        outcome: "no_evidence",
      };
    }

    // Step 4a: Deterministic synthesis over the full merged list
    const synthesized = synthesizeAnswer({ question, passages, classification });
    if (synthesized) {
      log.withStage("synthesize").info("Deterministic answer", { synthesizer: synthesized.kind });
      return {
        answer: synthesized.answer,
        sources: this.cite(question, passages, log),
        outcome: "synthesized",
      };
    }

    // Step 4b: Generation over the bounded context
    return this.generate(question, passages, requestId, log, signal);
  }

  private async generate(
    question: string,
    passages: readonly Passage[],
    requestId: string,
    log: RequestLogger,
    signal: AbortSignal | undefined
  ): Promise<Draft> {
    const context = selectContext(passages, this.deps.options.maxContextChars);
    const contextTexts = context.map((p) => p.text);
    const sources = this.cite(question, context, log);

    let generated: string;
    try {
      generated = await this.deps.generator.complete(question, contextTexts, { signal, requestId });
    } catch (err) {
      if (signal?.aborted || isAbortError(err)) {
        throw cancelledError(requestId, err);
      }

      const error = wrapError(err, requestId);
      const safe = buildSafeAnswer(question, contextTexts);
      if (safe !== GENERIC_CLARIFY_MESSAGE) {
        log.withStage("llm").warn("Generation failed, answering from context literals", {
          error: error.message,
        });
        return { answer: safe, sources, outcome: "safe_extraction" };
      }

      log.withStage("llm").error("Generation failed with nothing to extract", { error });
      return {
        answer: technicalDifficultyMessage(error.message, this.deps.random),
        sources: [],
        outcome: "technical_difficulty",
      };
    }

    const validation = validateResponse(generated, contextTexts);
    const validationLog = log.withStage("validation");

    if (validation.isValid) {
      validationLog.info("Generated answer validated", { confidence: validation.confidence });
      return { answer: generated, sources, outcome: "generated" };
    }

    validationLog.warn("Generated answer rejected", {
      confidence: validation.confidence,
      issues: validation.issues,
      suggestedCorrections: validation.suggestedCorrections,
    });
    return { answer: buildSafeAnswer(question, contextTexts), sources, outcome: "safe_extraction" };
  }

  private cite(question: string, passages: readonly Passage[], log: RequestLogger): SourceCitation[] {
    const { citations, selected } = attributeSources(question, passages);
    log.withStage("attribution").debug("Sources attributed", {
      selectedPassages: selected.length,
      citations: citations.length,
    });
    return citations;
  }

  /** Documents-only plans short-circuit for users without any documents */
  private async lacksDocumentsForPlan(userId: string, plan: SearchPlan): Promise<boolean> {
    if (!plan.searchDocuments || plan.searchEmails) return false;

    let hasDocuments = this.documentCache.get(userId);
    if (hasDocuments === undefined) {
      hasDocuments = await this.deps.ownership.hasDocuments(userId);
      this.documentCache.set(userId, hasDocuments);
    }
    return !hasDocuments;
  }
}

export function createQueryEngine(deps: QueryEngineDeps): QueryEngine {
  return new QueryEngine(deps);
}
