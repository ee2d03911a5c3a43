// ============================================
// Email Classifier — category, temporal and priority tags
// Rules live in data/emailCategories.json.
// ============================================

import { z } from "zod";
import { readDataFile } from "../lib/dataFiles.js";
import type { EmailType } from "../types/index.js";

export const EMAIL_CATEGORIES = [
  "receipt",
  "job_offer",
  "travel",
  "newsletter",
  "financial",
  "work",
  "personal",
  "security",
  "promotional",
] as const;

export type EmailCategory = (typeof EMAIL_CATEGORIES)[number];

export interface EmailMessage {
  id: string;
  userId: string;
  subject: string;
  sender: string;
  body: string;
  date?: Date;
  attachments?: string[];
}

export interface EmailClassification {
  /** Every tag, categories first */
  tags: string[];
  categories: EmailCategory[];
  emailType: EmailType;
  /** Highest category priority, 0 when untagged */
  priority: number;
}

const categoryRuleSchema = z.object({
  keywords: z.array(z.string()),
  patterns: z.array(z.string()),
  domains: z.array(z.string()),
});

const rulesSchema = z.object({
  categories: z.object({
    receipt: categoryRuleSchema,
    job_offer: categoryRuleSchema,
    travel: categoryRuleSchema,
    newsletter: categoryRuleSchema,
    financial: categoryRuleSchema,
    work: categoryRuleSchema,
    personal: categoryRuleSchema,
    security: categoryRuleSchema,
    promotional: categoryRuleSchema,
  }),
  priority: z.record(z.number()),
  highPriorityKeywords: z.array(z.string()),
  automatedSenderKeywords: z.array(z.string()),
});

export type EmailRules = z.infer<typeof rulesSchema>;

export function loadEmailRules(): EmailRules {
  return readDataFile("emailCategories.json", rulesSchema);
}

const KEYWORD_POINTS = 1;
const PATTERN_POINTS = 2;
const DOMAIN_POINTS = 3;
const TAG_THRESHOLD = 1;

const DAY_MS = 24 * 60 * 60 * 1000;

/** Canonical email type for the dominant category */
const CATEGORY_EMAIL_TYPE: Record<EmailCategory, EmailType> = {
  receipt: "transactional",
  financial: "transactional",
  travel: "transactional",
  job_offer: "business",
  work: "business",
  newsletter: "promotional",
  promotional: "promotional",
  personal: "personal",
  security: "support",
};

export function extractDomain(sender: string): string | null {
  const match = /[\w.-]+@([\w.-]+)/.exec(sender);
  return match?.[1]?.toLowerCase() ?? null;
}

export class EmailClassifier {
  private readonly patterns: Map<EmailCategory, RegExp[]>;

  constructor(
    private readonly rules: EmailRules = loadEmailRules(),
    private readonly now: () => Date = () => new Date()
  ) {
    this.patterns = new Map(
      EMAIL_CATEGORIES.map((category) => [
        category,
        rules.categories[category].patterns.map((p) => new RegExp(p, "i")),
      ])
    );
  }

  /** Points per category; keyword +1, pattern +2, sender domain +3 */
  score(email: EmailMessage): Map<EmailCategory, number> {
    const text = [email.subject, email.body, email.sender].join(" ").toLowerCase();
    const domain = extractDomain(email.sender);

    const scores = new Map<EmailCategory, number>();
    for (const category of EMAIL_CATEGORIES) {
      const rule = this.rules.categories[category];
      let score = 0;
      for (const keyword of rule.keywords) {
        if (text.includes(keyword.toLowerCase())) score += KEYWORD_POINTS;
      }
      for (const pattern of this.patterns.get(category) ?? []) {
        if (pattern.test(text)) score += PATTERN_POINTS;
      }
      if (domain && rule.domains.includes(domain)) score += DOMAIN_POINTS;
      scores.set(category, score);
    }
    return scores;
  }

  classify(email: EmailMessage): EmailClassification {
    const scores = this.score(email);
    const categories = EMAIL_CATEGORIES.filter((c) => (scores.get(c) ?? 0) >= TAG_THRESHOLD);

    const tags: string[] = [...categories, ...this.temporalTags(email.date), ...this.priorityTags(email)];
    if (tags.length === 0) tags.push("general");

    const dominant = this.dominantCategory(categories, scores);

    return {
      tags: [...new Set(tags)],
      categories,
      emailType: dominant ? CATEGORY_EMAIL_TYPE[dominant] : "generic",
      priority: Math.max(0, ...tags.map((t) => this.rules.priority[t] ?? 0)),
    };
  }

  /** Highest score wins; category priority breaks ties */
  private dominantCategory(
    categories: readonly EmailCategory[],
    scores: Map<EmailCategory, number>
  ): EmailCategory | undefined {
    const rank = (c: EmailCategory): [number, number] => [scores.get(c) ?? 0, this.rules.priority[c] ?? 0];

    let best: EmailCategory | undefined;
    for (const category of categories) {
      if (!best) {
        best = category;
        continue;
      }
      const [score, priority] = rank(category);
      const [bestScore, bestPriority] = rank(best);
      if (score > bestScore || (score === bestScore && priority > bestPriority)) {
        best = category;
      }
    }
    return best;
  }

  private temporalTags(date: Date | undefined): string[] {
    if (!date || Number.isNaN(date.getTime())) return [];

    const daysAgo = Math.floor((this.now().getTime() - date.getTime()) / DAY_MS);
    const age =
      daysAgo < 1 ? "today" : daysAgo < 7 ? "this_week" : daysAgo < 30 ? "this_month" : daysAgo < 365 ? "this_year" : "older";

    const weekday = date.toLocaleDateString("en-US", { weekday: "long", timeZone: "UTC" }).toLowerCase();
    const month = date.toLocaleDateString("en-US", { month: "long", timeZone: "UTC" }).toLowerCase();

    return [age, `day_${weekday}`, `month_${month}`];
  }

  private priorityTags(email: EmailMessage): string[] {
    const tags: string[] = [];
    const subject = email.subject.toLowerCase();
    const sender = email.sender.toLowerCase();

    if (this.rules.highPriorityKeywords.some((k) => subject.includes(k))) {
      tags.push("high_priority");
    }
    if (this.rules.automatedSenderKeywords.some((k) => sender.includes(k))) {
      tags.push("automated");
    }
    if (email.attachments && email.attachments.length > 0) {
      tags.push("has_attachments");
    }
    return tags;
  }
}
