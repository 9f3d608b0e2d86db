/**
 * Cost analysis engine
 *
 * Turns a billing ledger into a financial summary and keeps model-made
 * recommendations consistent with it. Everything here is pure.
 */

import { roundCurrency, splitAmount } from '../determinism/index.js';
import { isRecord, unwrapCollection } from '../generation/validator.js';
import { usesEmbeddedDatabase } from '../signals/index.js';
import type { BillingRecord, FinancialSummary, TechStack } from '../contracts/index.js';

/** A service is high-cost above this share of the total... */
export const HIGH_COST_SHARE = 0.05;
/** ...or at/above this absolute monthly amount (INR). */
export const HIGH_COST_FLOOR_INR = 25_000;
/** Share of total cost that all recommendations together may claim. */
export const MAX_SAVINGS_SHARE = 0.35;
export const MAX_RECOMMENDATIONS = 10;

const DEDUPE_PREFIX_LENGTH = 15;
const BANNED_TITLE_TERMS = ['transfer acceleration'];

// ============================================================================
// Summary
// ============================================================================

/**
 * Group by service and compare against the budget.
 * `budget_variance` is total - budget: negative means under budget.
 */
export function analyze(records: readonly BillingRecord[], budget: number): FinancialSummary {
  const raw = new Map<string, number>();
  let total = 0;
  for (const record of records) {
    raw.set(record.service, (raw.get(record.service) ?? 0) + record.cost_inr);
    total += record.cost_inr;
  }
  total = roundCurrency(total);

  // fromEntries keeps "__proto__" an own key.
  const costs = [...raw].map(([service, cost]): [string, number] => [service, roundCurrency(cost)]);
  const serviceCosts: Record<string, number> = Object.fromEntries(costs);

  const highCost: Record<string, number> = Object.fromEntries(
    costs
      .filter(([, cost]) => (total > 0 && cost / total > HIGH_COST_SHARE) || cost >= HIGH_COST_FLOOR_INR)
      .sort(([a, x], [b, y]) => y - x || a.localeCompare(b)),
  );

  return {
    total_monthly_cost: total,
    budget,
    budget_variance: roundCurrency(total - budget),
    service_costs: serviceCosts,
    high_cost_services: highCost,
    is_over_budget: total > budget,
  };
}

/**
 * An embedded database has no bill of its own: move any Database lines
 * onto the Compute lines, split evenly. The total is unchanged, and a
 * ledger without Compute lines is returned as is.
 */
export function foldEmbeddedDatabase(records: readonly BillingRecord[], techStack: TechStack): BillingRecord[] {
  const database = records.filter((r) => r.service === 'Database');
  if (!usesEmbeddedDatabase(techStack) || database.length === 0) return [...records];

  const rest = records.filter((r) => r.service !== 'Database');
  const computeIndexes = rest.flatMap((r, i) => (r.service === 'Compute' ? [i] : []));
  // nowhere to fold into
  if (computeIndexes.length === 0) return [...records];

  const moved = database.reduce((sum, r) => sum + r.cost_inr, 0);
  const shares = splitAmount(roundCurrency(moved), computeIndexes.map(() => 1));
  return rest.map((record, i) => {
    const slot = computeIndexes.indexOf(i);
    return slot === -1 ? record : { ...record, cost_inr: roundCurrency(record.cost_inr + shares[slot]) };
  });
}

// ============================================================================
// Recommendations
// ============================================================================

/**
 * Scale savings down so they total at most `cap`, keeping integer amounts.
 */
export function capTotalSavings<T extends { potential_savings: number }>(items: readonly T[], cap: number): T[] {
  const total = items.reduce((sum, r) => sum + r.potential_savings, 0);
  if (total <= cap || total === 0) return [...items];
  const ratio = Math.max(0, cap) / total;
  return items.map((r) => ({ ...r, potential_savings: Math.floor(r.potential_savings * ratio) }));
}

function toAmount(value: unknown): number {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string') {
    const parsed = Number(value.replace(/[₹,\s]/g, ''));
    if (Number.isFinite(parsed)) return parsed;
  }
  return 0;
}

/**
 * Clean up model-proposed recommendations before validation.
 *
 * Drops untitled items, near-duplicates (same leading title), banned
 * suggestions, Database advice for embedded-database projects, services
 * absent from the bill and zero-value items other than governance ones.
 * Savings are clamped to the service's cost. Output is sorted by savings
 * and capped at ten items.
 */
export function normalizeRecommendations(
  candidate: unknown,
  context: { summary: FinancialSummary; techStack: TechStack },
): unknown {
  const items = unwrapCollection(candidate);
  if (!Array.isArray(items)) return candidate;

  const embedded = usesEmbeddedDatabase(context.techStack);
  const seen = new Set<string>();
  const kept: Record<string, unknown>[] = [];

  for (const item of items) {
    if (!isRecord(item)) continue;

    const title = typeof item.title === 'string' ? item.title.trim() : '';
    if (!title) continue;
    const key = title.slice(0, DEDUPE_PREFIX_LENGTH).toLowerCase();
    if (seen.has(key)) continue;
    if (BANNED_TITLE_TERMS.some((term) => title.toLowerCase().includes(term))) continue;

    const service = typeof item.service === 'string' ? item.service.trim() : '';
    if (embedded && service === 'Database') continue;
    const serviceCost = context.summary.service_costs[service];
    if (serviceCost === undefined) continue;

    const savings = roundCurrency(Math.min(Math.max(toAmount(item.potential_savings), 0), serviceCost));
    const type = typeof item.recommendation_type === 'string' ? item.recommendation_type : '';
    if (savings <= 0 && !type.toLowerCase().includes('governance')) continue;

    seen.add(key);
    kept.push({
      ...item,
      title,
      service,
      current_cost: serviceCost,
      potential_savings: savings,
      description: typeof item.description === 'string' ? item.description : `Optimization for ${service}.`,
    });
  }

  return kept
    .sort((a, b) => toAmount(b.potential_savings) - toAmount(a.potential_savings))
    .slice(0, MAX_RECOMMENDATIONS);
}

/** Total potential savings and their share of the monthly cost, in percent. */
export function savingsSummary(
  recommendations: readonly { potential_savings: number }[],
  totalMonthlyCost: number,
): { total: number; percent: number } {
  const total = roundCurrency(recommendations.reduce((sum, r) => sum + r.potential_savings, 0));
  const percent = totalMonthlyCost > 0 ? roundCurrency((total / totalMonthlyCost) * 100) : 0;
  return { total, percent };
}
