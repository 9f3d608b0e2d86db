/**
 * Deterministic fallback documents.
 *
 * When every model attempt for a stage fails, these generators build the
 * stage document from the stage inputs alone. Every choice draws from a
 * PRNG seeded with the canonical hash of the inputs, so identical inputs
 * give byte-identical documents, and every document satisfies the
 * constraint it is generated for.
 */

import { getBillingTemplates, getPlaybook, type BillingTemplate, type PlaybookEntry } from '../catalog/index.js';
import { createSeededRandom, roundCurrency, seedFrom, splitAmount } from '../determinism/index.js';
import {
  deriveProjectName,
  detectRequirements,
  detectTechStack,
  estimateBudget,
  extractBudget,
  firstSentence,
  isSpecified,
  usesEmbeddedDatabase,
} from '../signals/index.js';
import { capTotalSavings, MAX_SAVINGS_SHARE } from '../analysis/index.js';
import type { ItemCountRange, SchemaConstraint } from '../generation/constraints.js';
import type {
  BillingRecord,
  CloudProvider,
  FinancialSummary,
  ProjectProfile,
  Recommendation,
  TechStack,
} from '../contracts/index.js';

export type FallbackInput =
  | { stage: 'profile'; context: { description: string } }
  | { stage: 'billing'; context: { profile: ProjectProfile; cloudProvider: CloudProvider; billingMonth: string } }
  | {
      stage: 'analysis';
      context: { summary: FinancialSummary; techStack: TechStack; cloudProvider: CloudProvider };
    };

/** Total billed stays within this band of the budget. */
export const BILLING_FACTOR_RANGE = { min: 0.97, max: 1.03 } as const;
export const PREFERRED_RECOMMENDATIONS = 8;
/** Share of one service's cost that its recommendations together may claim. */
const MAX_SERVICE_SAVINGS_SHARE = 0.9;

export const PROVIDER_REGIONS: Readonly<Record<CloudProvider, string>> = {
  AWS: 'ap-south-1',
  Azure: 'centralindia',
  GCP: 'asia-south1',
  DigitalOcean: 'blr1',
  'Oracle Cloud': 'ap-mumbai-1',
};

const BASELINE_SERVICES = ['Compute', 'Storage', 'Networking', 'Monitoring'];

/** Tech-stack category -> billing service it implies. */
const CATEGORY_SERVICES: Readonly<Record<string, string>> = {
  database: 'Database',
  cache: 'Cache',
  queue: 'Messaging',
  search: 'Search',
  cdn: 'CDN',
  frontend: 'CDN',
  container: 'Containers',
  ml: 'ML Platform',
  storage: 'Storage',
};

export function generateFallback<T>(input: FallbackInput, constraint: SchemaConstraint<T>): unknown {
  switch (input.stage) {
    case 'profile':
      return fallbackProfile(input.context.description);
    case 'billing':
      return fallbackBilling(input.context, constraint.itemCount);
    case 'analysis':
      return fallbackRecommendations(input.context, constraint.itemCount, constraint.allowedValues?.service);
  }
}

// ============================================================================
// Profile
// ============================================================================

export function fallbackProfile(description: string): ProjectProfile {
  return {
    name: deriveProjectName(description),
    budget: extractBudget(description) ?? estimateBudget(description),
    description: firstSentence(description) || description.trim(),
    tech_stack: detectTechStack(description),
    non_functional_requirements: detectRequirements(description),
  };
}

// ============================================================================
// Billing
// ============================================================================

/** Baseline services plus those the tech stack implies, in template order. */
export function billedServicesFor(techStack: TechStack): string[] {
  const services = new Set(BASELINE_SERVICES);
  for (const [category, tech] of Object.entries(techStack)) {
    const service = CATEGORY_SERVICES[category];
    if (!service || !isSpecified(tech)) continue;
    if (service === 'Database' && usesEmbeddedDatabase(techStack)) continue;
    services.add(service);
  }
  return getBillingTemplates()
    .map((t) => t.service)
    .filter((s) => services.has(s));
}

function techFor(service: string, techStack: TechStack): string {
  const category = service === 'Compute' ? 'backend' : Object.keys(CATEGORY_SERVICES).find((c) => CATEGORY_SERVICES[c] === service);
  const tech = category ? techStack[category] : undefined;
  if (isSpecified(tech)) return tech;
  return service === 'Compute' ? 'Web' : service;
}

function slugify(value: string): string {
  const slug = value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, 20)
    .replace(/-+$/, '');
  return slug || 'project';
}

/**
 * Spread `total` line slots over templates: one each, then the rest by
 * highest weight / (lines + 1).
 */
function allocateLines(templates: readonly BillingTemplate[], total: number): number[] {
  const counts = templates.map(() => 1);
  for (let assigned = templates.length; assigned < total; assigned++) {
    let best = 0;
    for (let i = 1; i < templates.length; i++) {
      if (templates[i].weight / (counts[i] + 1) > templates[best].weight / (counts[best] + 1)) best = i;
    }
    counts[best]++;
  }
  return counts;
}

export function fallbackBilling(
  context: { profile: ProjectProfile; cloudProvider: CloudProvider; billingMonth: string },
  range: ItemCountRange | undefined,
): BillingRecord[] {
  const { profile, cloudProvider, billingMonth } = context;
  const rng = createSeededRandom(seedFrom({ stage: 'billing', profile, cloudProvider, billingMonth }));

  const wanted = new Set(billedServicesFor(profile.tech_stack));
  const templates = getBillingTemplates().filter((t) => wanted.has(t.service));
  const min = Math.max(range?.min ?? templates.length, templates.length);
  const max = Math.max(range?.max ?? min, min);
  const lineCount = rng.int(min, max);
  const counts = allocateLines(templates, lineCount);

  const target = roundCurrency(profile.budget * rng.between(BILLING_FACTOR_RANGE.min, BILLING_FACTOR_RANGE.max));
  const slug = slugify(profile.name);
  const region = PROVIDER_REGIONS[cloudProvider];

  const drafts: Omit<BillingRecord, 'cost_inr'>[] = [];
  const weights: number[] = [];
  templates.forEach((template, index) => {
    const tech = techFor(template.service, profile.tech_stack);
    for (let n = 0; n < counts[index]; n++) {
      const line = template.lines[n % template.lines.length];
      drafts.push({
        month: billingMonth,
        service: template.service,
        resource_id: `${template.prefix}-${slug}-${line.role}-${String(n + 1).padStart(2, '0')}`,
        region,
        usage_type: line.usage_type,
        usage_quantity: roundCurrency(rng.between(line.quantity[0], line.quantity[1])),
        unit: line.unit,
        desc: line.desc.replace(/\{tech\}/g, tech),
      });
      weights.push((template.weight / counts[index]) * rng.between(0.6, 1.4));
    }
  });

  const costs = splitAmount(target, weights);
  return drafts.map((draft, i) => ({ ...draft, cost_inr: costs[i] }));
}

// ============================================================================
// Recommendations
// ============================================================================

function fill(template: string, service: string, provider: CloudProvider): string {
  return template.replace(/\{service\}/g, service).replace(/\{provider\}/g, provider);
}

function toRecommendation(
  entry: PlaybookEntry,
  service: string,
  cost: number,
  savingsPct: number,
  provider: CloudProvider,
): Recommendation {
  return {
    title: fill(entry.title, service, provider),
    service,
    current_cost: roundCurrency(cost),
    potential_savings: Math.floor(cost * savingsPct),
    recommendation_type: entry.recommendation_type,
    description: fill(entry.description, service, provider),
    implementation_effort: entry.implementation_effort,
    risk_level: entry.risk_level,
    steps: entry.steps.map((step) => fill(step, service, provider)),
    cloud_providers: [...new Set(entry.cloud_providers.map((p) => fill(p, service, provider)))],
  };
}

export function fallbackRecommendations(
  context: { summary: FinancialSummary; techStack: TechStack; cloudProvider: CloudProvider },
  range: ItemCountRange | undefined,
  allowedServices: readonly string[] | undefined,
): Recommendation[] {
  const { summary, cloudProvider } = context;
  const embedded = usesEmbeddedDatabase(context.techStack);
  const playbook = getPlaybook();
  const generic = playbook.filter((e) => e.service === '*');

  const services = Object.entries(summary.service_costs)
    .filter(([service]) => !allowedServices || allowedServices.includes(service))
    .filter(([service]) => !(embedded && service === 'Database'))
    .sort(([a, x], [b, y]) => y - x || a.localeCompare(b));

  const queues = services.map(([service, cost]) => ({
    service,
    cost,
    used: 0,
    entries: [...playbook.filter((e) => e.service === service), ...generic],
  }));

  const target = Math.min(range?.max ?? PREFERRED_RECOMMENDATIONS, PREFERRED_RECOMMENDATIONS);
  const titles = new Set<string>();
  const picked: Recommendation[] = [];

  while (picked.length < target && queues.some((q) => q.entries.length > 0)) {
    for (const queue of queues) {
      if (picked.length >= target) break;
      const entry = queue.entries.shift();
      if (!entry) continue;

      const pct = Math.min(entry.savings_pct, Math.max(0, MAX_SERVICE_SAVINGS_SHARE - queue.used));
      const rec = toRecommendation(entry, queue.service, queue.cost, pct, cloudProvider);
      if (titles.has(rec.title)) continue;
      titles.add(rec.title);
      queue.used += pct;
      picked.push(rec);
    }
  }

  const capped = capTotalSavings(picked, Math.floor(summary.total_monthly_cost * MAX_SAVINGS_SHARE));
  return capped.sort((a, b) => b.potential_savings - a.potential_savings);
}
