import { describe, it, expect } from 'vitest';
import {
  generateFallback,
  fallbackProfile,
  fallbackBilling,
  billedServicesFor,
  PREFERRED_RECOMMENDATIONS,
} from '../fallback/index.js';
import { billingConstraint, profileConstraint, recommendationConstraint } from '../generation/constraints.js';
import { validate } from '../generation/validator.js';
import { analyze } from '../analysis/index.js';
import type { ProjectProfile } from '../contracts/index.js';
import { BILLING_MONTH, makeLedger, SHOP_PROFILE, standardLedger } from './fixtures.js';

const SHOPKART =
  'An online store called ShopKart built with React, Node.js and PostgreSQL, with Redis for caching. ' +
  'Budget Rs. 20,000 per month. It must be secure and scalable.';

function billingFor(profile: ProjectProfile, cloudProvider: 'AWS' | 'GCP' = 'AWS'): unknown {
  return generateFallback(
    { stage: 'billing', context: { profile, cloudProvider, billingMonth: BILLING_MONTH } },
    billingConstraint(),
  );
}

function billingTotal(doc: readonly { cost_inr: number }[]): number {
  return doc.reduce((sum, r) => sum + r.cost_inr, 0);
}

describe('fallback profile', () => {
  it('reads name, budget, stack and requirements from the description', () => {
    expect(fallbackProfile(SHOPKART)).toEqual({
      name: 'ShopKart',
      budget: 20000,
      description: 'An online store called ShopKart built with React, Node.js and PostgreSQL, with Redis for caching',
      tech_stack: { backend: 'Node.js', frontend: 'React', database: 'PostgreSQL', cache: 'Redis' },
      non_functional_requirements: ['Scalability', 'Security'],
    });
  });

  it('estimates the budget by project size when none is stated', () => {
    expect(fallbackProfile('A prototype todo app').budget).toBe(10000);
    expect(fallbackProfile('A marketplace for used books').budget).toBe(50000);
  });

  it('derives a name from the first meaningful words', () => {
    expect(fallbackProfile('We want to build a recipe sharing platform.').name).toBe('Recipe Sharing');
  });

  it('satisfies the profile constraint', () => {
    const doc = generateFallback({ stage: 'profile', context: { description: 'hello' } }, profileConstraint());
    expect(validate(doc, profileConstraint()).ok).toBe(true);
  });
});

describe('fallback billing', () => {
  it('produces a valid ledger within 3% of the budget', () => {
    const result = validate(billingFor(SHOP_PROFILE), billingConstraint());
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    const doc = result.document;
    expect(doc.length).toBeGreaterThanOrEqual(12);
    expect(doc.length).toBeLessThanOrEqual(20);
    expect(new Set(doc.map((r) => r.resource_id)).size).toBe(doc.length);
    expect(doc.every((r) => r.month === BILLING_MONTH && r.region === 'ap-south-1')).toBe(true);

    const total = billingTotal(doc);
    expect(total).toBeGreaterThanOrEqual(50000 * 0.97 - 0.01);
    expect(total).toBeLessThanOrEqual(50000 * 1.03 + 0.01);
  });

  it('is byte-identical for identical inputs', () => {
    expect(JSON.stringify(billingFor(SHOP_PROFILE))).toBe(JSON.stringify(billingFor({ ...SHOP_PROFILE })));
  });

  it('changes when the inputs change', () => {
    expect(JSON.stringify(billingFor(SHOP_PROFILE))).not.toBe(
      JSON.stringify(billingFor({ ...SHOP_PROFILE, budget: 50001 })),
    );
  });

  it('uses the provider region', () => {
    const result = validate(billingFor(SHOP_PROFILE, 'GCP'), billingConstraint());
    expect(result.ok && result.document.every((r) => r.region === 'asia-south1')).toBe(true);
  });

  it.each([0.5, 1, 1234.56, 10_000_000])('stays valid for a budget of %s', (budget) => {
    expect(validate(billingFor({ ...SHOP_PROFILE, budget }), billingConstraint()).ok).toBe(true);
  });

  it('bills services implied by the stack', () => {
    expect(billedServicesFor(fallbackProfile(SHOPKART).tech_stack)).toEqual([
      'Compute',
      'Database',
      'Storage',
      'Networking',
      'Monitoring',
      'Cache',
      'CDN',
    ]);
  });

  it('never bills a Database for an embedded database', () => {
    const profile = fallbackProfile('A personal recipe app with Flask and SQLite');
    expect(profile.tech_stack).toEqual({ backend: 'Flask', database: 'SQLite' });
    expect(billedServicesFor(profile.tech_stack)).toEqual(['Compute', 'Storage', 'Networking', 'Monitoring']);

    const doc = fallbackBilling({ profile, cloudProvider: 'AWS', billingMonth: BILLING_MONTH }, { min: 12, max: 20 });
    expect(doc.some((r) => r.service === 'Database')).toBe(false);
  });

  it('ignores categories marked Not Specified', () => {
    expect(billedServicesFor({ database: 'Not Specified', cache: 'Redis' })).toEqual([
      'Compute',
      'Storage',
      'Networking',
      'Monitoring',
      'Cache',
    ]);
  });
});

describe('fallback recommendations', () => {
  const summary = analyze(standardLedger(), 50000);
  const services = Object.keys(summary.service_costs);

  function recommend(forSummary = summary, techStack = SHOP_PROFILE.tech_stack) {
    return generateFallback(
      {
        stage: 'analysis',
        context: { summary: forSummary, techStack, cloudProvider: 'AWS' },
      },
      recommendationConstraint(Object.keys(forSummary.service_costs)),
    );
  }

  it('produces a valid list of the preferred size', () => {
    const result = validate(recommend(), recommendationConstraint(services));
    expect(result.ok).toBe(true);
    expect(result.ok && result.document).toHaveLength(PREFERRED_RECOMMENDATIONS);
  });

  it('caps total savings at 35% of the monthly cost, largest first', () => {
    const result = validate(recommend(), recommendationConstraint(services));
    if (!result.ok) throw new Error(result.violations.join('; '));

    expect(result.document.map((r) => r.potential_savings)).toEqual([4751, 3800, 3325, 2217, 1425, 791, 712, 475]);
    expect(result.document[0]).toMatchObject({
      title: 'Commit to a 1-year savings plan for steady Compute',
      service: 'Compute',
      current_cost: 24000,
      recommendation_type: 'commitment',
    });
  });

  it('fills the provider into provider-specific entries', () => {
    const result = validate(recommend(), recommendationConstraint(services));
    if (!result.ok) throw new Error(result.violations.join('; '));

    const rightsize = result.document.find((r) => r.title === 'Rightsize over-provisioned Compute instances');
    expect(rightsize?.cloud_providers).toEqual(['AWS']);
  });

  it('keeps every service savings within its cost', () => {
    const single = analyze(makeLedger(Array.from({ length: 12 }, () => ['Compute', 1000] as const)), 100000);
    const result = validate(recommend(single), recommendationConstraint(['Compute']));
    if (!result.ok) throw new Error(result.violations.join('; '));

    expect(result.document).toHaveLength(8);
    expect(result.document.every((r) => r.service === 'Compute')).toBe(true);
    const claimed = result.document.reduce((sum, r) => sum + r.potential_savings, 0);
    expect(claimed).toBeLessThanOrEqual(12000 * 0.35);
  });

  it('is deterministic', () => {
    expect(JSON.stringify(recommend())).toBe(JSON.stringify(recommend()));
  });

  it('skips Database advice for an embedded database', () => {
    const result = validate(recommend(summary, { backend: 'Flask', database: 'SQLite' }), recommendationConstraint(services));
    if (!result.ok) throw new Error(result.violations.join('; '));

    expect(result.document.length).toBeGreaterThanOrEqual(6);
    expect(result.document.some((r) => r.service === 'Database')).toBe(false);
  });
});
