/**
 * Signals read directly from the free-text project description.
 *
 * Used twice: to ground model-extracted profiles in what the user
 * actually wrote, and to build the fallback profile when the model is
 * unavailable.
 */

import { getTechCatalog } from '../catalog/index.js';
import type { TechStack } from '../contracts/index.js';

export const NOT_SPECIFIED = 'Not Specified';

/** Database engines that run inside the application process. */
export const EMBEDDED_DATABASES = ['SQLite'];

export const DEFAULT_BUDGET_SMALL = 10_000;
export const DEFAULT_BUDGET_MEDIUM = 50_000;

/** Concept -> terms that count as evidence of it in the description. */
export const NFR_CONCEPTS: Readonly<Record<string, readonly string[]>> = {
  scalability: ['scalab', 'scale', 'scalable', 'scalability'],
  'cost efficiency': ['cost efficiency', 'cost-effective', 'cost efficient', 'low cost', 'cheap'],
  'high availability': ['availability', 'high availability', 'high-availability', 'uptime'],
  security: ['security', 'secure', 'authentication', 'authorization', 'encryption'],
  'disaster recovery': ['disaster', 'recovery', 'backup', 'failover'],
  monitoring: ['monitor', 'monitoring', 'observability', 'alerting'],
  compliance: ['hipaa', 'gdpr', 'pci', 'soc 2', 'soc2', 'compliance'],
  'low latency': ['latency', 'real-time', 'realtime'],
};

const SMALL_PROJECT_TERMS = ['small', 'mvp', 'prototype', 'hobby', 'side project', 'personal', 'poc'];

const NAME_STOPWORDS = new Set([
  'a', 'an', 'the', 'i', 'we', 'want', 'wants', 'need', 'needs', 'to', 'build', 'building', 'create',
  'creating', 'develop', 'developing', 'am', 'are', 'is', 'our', 'my', 'for', 'with', 'using', 'that',
  'which', 'new', 'simple', 'platform', 'application', 'app', 'project', 'of', 'and', 'on', 'in',
]);

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Whole-word (or whole-phrase) containment, case-insensitive. */
export function mentions(text: string, term: string): boolean {
  const pattern = new RegExp(`(?<![a-z0-9])${escapeRegExp(term.toLowerCase())}(?![a-z0-9])`);
  return pattern.test(text.toLowerCase());
}

export function titleCase(value: string): string {
  return value
    .trim()
    .split(/\s+/)
    .map((w) => (w ? w[0].toUpperCase() + w.slice(1).toLowerCase() : w))
    .join(' ');
}

/**
 * Monthly budget stated as an INR amount ("₹50,000", "Rs. 20000",
 * "INR 15000", "30000 rupees"). Undefined when none is stated.
 */
export function extractBudget(text: string): number | undefined {
  const lower = text.toLowerCase();
  const match =
    /(?:\brs\.?|\binr|₹)\s*(\d[\d,]*)/.exec(lower) ??
    /(\d[\d,]*)\s*(?:rupees|rs\b|inr\b)/.exec(lower);
  if (!match?.[1]) return undefined;

  const amount = parseInt(match[1].replace(/,/g, ''), 10);
  return Number.isFinite(amount) && amount > 0 ? amount : undefined;
}

export function estimateBudget(text: string): number {
  return SMALL_PROJECT_TERMS.some((t) => mentions(text, t)) ? DEFAULT_BUDGET_SMALL : DEFAULT_BUDGET_MEDIUM;
}

/** First sentence or line of the description, without its full stop. */
export function firstSentence(text: string): string {
  const first = text
    .split(/[.!?](?:\s+|$)|\n/)
    .map((s) => s.trim())
    .find((s) => s.length > 0);
  return first ?? '';
}

/**
 * Project name: an explicitly named project ("called ShopKart") wins,
 * otherwise the first three meaningful words of the first sentence.
 */
export function deriveProjectName(text: string): string {
  const named = /\b(?:called|named)\s+["']?([A-Za-z0-9][\w-]*(?:\s+[A-Z][\w-]*){0,3})/.exec(text);
  if (named?.[1]) return named[1].trim();

  const words = firstSentence(text)
    .replace(/[^\w\s-]/g, ' ')
    .split(/\s+/)
    .filter((w) => w && !NAME_STOPWORDS.has(w.toLowerCase()));
  return words.length > 0 ? titleCase(words.slice(0, 3).join(' ')) : 'Untitled Project';
}

/**
 * Technologies named in the text, one per category, in catalogue order.
 */
export function detectTechStack(text: string): TechStack {
  const stack: TechStack = {};
  for (const entry of getTechCatalog()) {
    if (stack[entry.category] !== undefined) continue;
    if (entry.keywords.some((k) => mentions(text, k))) {
      stack[entry.category] = entry.technology;
    }
  }
  return stack;
}

/** Non-functional concepts evidenced in the text, title-cased. */
export function detectRequirements(text: string): string[] {
  const lower = text.toLowerCase();
  const found: string[] = [];
  for (const [concept, terms] of Object.entries(NFR_CONCEPTS)) {
    if (terms.some((t) => lower.includes(t))) found.push(titleCase(concept));
  }

  const volume = /(\d+(?:\.\d+)?)\s*(tb|pb|gb)\b/i.exec(text);
  if (volume?.[1] && volume[2]) {
    found.push(`Data Volume ${volume[1]} ${volume[2].toUpperCase()}`);
  }
  return found;
}

/**
 * Keep a model-proposed requirement only when the description backs it:
 * every number it cites appears in the text, or a concept it names has
 * evidence in the text, or it appears verbatim.
 */
export function isGroundedRequirement(requirement: string, text: string): { grounded: boolean; label: string } {
  const req = requirement.toLowerCase().trim();
  const lower = text.toLowerCase();

  const numbers = req.match(/\d+/g);
  if (numbers && numbers.every((n) => lower.includes(n))) {
    return { grounded: true, label: requirement };
  }

  for (const [concept, terms] of Object.entries(NFR_CONCEPTS)) {
    if (req.includes(concept) || terms.some((t) => req.includes(t))) {
      if ([concept, ...terms].some((t) => lower.includes(t))) {
        return { grounded: true, label: titleCase(requirement) };
      }
    }
  }

  return { grounded: req.length > 0 && lower.includes(req), label: requirement };
}

export function isSpecified(value: string | undefined): value is string {
  return value !== undefined && value.trim() !== '' && value !== NOT_SPECIFIED;
}

export function usesEmbeddedDatabase(techStack: TechStack): boolean {
  const db = techStack.database;
  return isSpecified(db) && EMBEDDED_DATABASES.some((name) => db.toLowerCase().includes(name.toLowerCase()));
}
