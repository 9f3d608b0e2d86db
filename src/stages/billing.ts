/**
 * Stage 2: synthetic billing ledger.
 */

import { billingConstraint, BILLING_ITEM_RANGE } from '../generation/constraints.js';
import { isRecord, unwrapCollection } from '../generation/validator.js';
import type { GenerationRequest } from '../generation/types.js';
import { BILLING_FACTOR_RANGE, PROVIDER_REGIONS } from '../fallback/index.js';
import { createSeededRandom, roundCurrency, seedFrom, splitAmount } from '../determinism/index.js';
import { usesEmbeddedDatabase } from '../signals/index.js';
import type { BillingDocument, BillingRecord, CloudProvider, ProjectProfile } from '../contracts/index.js';

export const BILLING_MAX_TOKENS = 2500;

const NUMERIC_FIELDS = ['cost_inr', 'usage_quantity'] as const;

export function buildBillingPrompt(profile: ProjectProfile, provider: CloudProvider, billingMonth: string): string {
  const embedded = usesEmbeddedDatabase(profile.tech_stack);
  return `You are a cloud billing simulation engine.
Generate a realistic JSON billing ledger for one month of a cloud project.

PROJECT CONTEXT:
- Name: "${profile.name}"
- Tech Stack: ${JSON.stringify(profile.tech_stack)}
- Budget: ~${profile.budget} INR for the month
- Month: ${billingMonth}
- Cloud Provider: ${provider} (use ${provider} regions and service names)
- Embedded database? ${embedded ? 'Yes (no Database costs)' : 'No'}

RULES:
- Return a JSON array of ${BILLING_ITEM_RANGE.min}-${BILLING_ITEM_RANGE.max} records, nothing else
- Every record has: month, service, resource_id, region, usage_type, usage_quantity, unit, cost_inr, desc
- month is "${billingMonth}" on every record
- service is one of: Compute, Database, Storage, Networking, Monitoring, Cache, Messaging, Search, CDN, Containers, ML Platform
- resource_id is unique per record (e.g. "i-app-prod-01")
- cost_inr and usage_quantity are non-negative numbers
- The cost_inr values add up to roughly the budget

Return ONLY the JSON array.`;
}

function coerceNumber(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const parsed = Number(value.replace(/[₹,\s]/g, ''));
  return value.trim() !== '' && Number.isFinite(parsed) ? parsed : value;
}

/**
 * Repair model-made records: numeric strings become numbers, and missing
 * region, usage type, description and month get defaults.
 */
export function normalizeBilling(
  candidate: unknown,
  context: { cloudProvider: CloudProvider; billingMonth: string },
): unknown {
  const items = unwrapCollection(candidate);
  if (!Array.isArray(items)) return candidate;

  return items.map((item) => {
    if (!isRecord(item)) return item;
    const record: Record<string, unknown> = { ...item };
    for (const field of NUMERIC_FIELDS) record[field] = coerceNumber(record[field]);

    record.month ??= context.billingMonth;
    record.region ??= PROVIDER_REGIONS[context.cloudProvider];
    record.usage_type ??= 'Standard';
    if (record.desc === undefined && typeof record.service === 'string') {
      record.desc = `${record.service} usage`;
    }
    return record;
  });
}

/**
 * Rescale a ledger so it totals `budget × factor`, the factor drawn from
 * a PRNG seeded with the ledger itself. Proportions between lines are
 * kept; the total is cents-exact.
 */
export function alignToBudget(records: readonly BillingRecord[], budget: number): BillingRecord[] {
  const rng = createSeededRandom(seedFrom({ stage: 'billing-align', records, budget }));
  const target = roundCurrency(budget * rng.between(BILLING_FACTOR_RANGE.min, BILLING_FACTOR_RANGE.max));

  const current = records.reduce((sum, r) => sum + r.cost_inr, 0);
  const weights = current > 0 ? records.map((r) => r.cost_inr) : records.map(() => 1);
  const costs = splitAmount(target, weights);
  return records.map((record, i) => ({ ...record, cost_inr: costs[i] }));
}

export function billingRequest(
  profile: ProjectProfile,
  cloudProvider: CloudProvider,
  billingMonth: string,
): GenerationRequest<BillingDocument> {
  return {
    stage: 'billing',
    prompt: buildBillingPrompt(profile, cloudProvider, billingMonth),
    constraint: billingConstraint(),
    maxTokens: BILLING_MAX_TOKENS,
    fallback: { stage: 'billing', context: { profile, cloudProvider, billingMonth } },
    normalize: (candidate) => normalizeBilling(candidate, { cloudProvider, billingMonth }),
  };
}
