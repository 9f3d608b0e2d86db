import { describe, it, expect } from 'vitest';
import { formatInr, renderAnalysis, renderRecommendations, renderReportSummary } from '../report/index.js';
import { analyze } from '../analysis/index.js';
import type { CostReport } from '../contracts/index.js';
import { makeLedger, standardLedger } from './fixtures.js';

const RULE = '='.repeat(50);

describe('formatInr', () => {
  it('groups thousands', () => {
    expect(formatInr(50000)).toBe('₹50,000');
    expect(formatInr(1234567.891, 2)).toBe('₹1,234,567.89');
    expect(formatInr(0, 2)).toBe('₹0.00');
  });
});

describe('renderAnalysis', () => {
  it('shows totals, variance and high-cost services', () => {
    const ledger = makeLedger([
      ...Array.from({ length: 11 }, () => ['Compute', 4000] as const),
      ['Storage', 5902.25],
    ]);

    expect(renderAnalysis(analyze(ledger, 50000))).toEqual([
      'Total: ₹49,902.25 (Budget: ₹50,000)',
      'Variance: -₹97.75',
      'Status: UNDER BUDGET',
      '',
      'High-cost services:',
      '  Compute: ₹44,000.00',
      '  Storage: ₹5,902.25',
    ]);
  });

  it('marks overspend with a plus sign', () => {
    expect(renderAnalysis(analyze(makeLedger([['Compute', 1500]]), 1000)).slice(0, 3)).toEqual([
      'Total: ₹1,500.00 (Budget: ₹1,000)',
      'Variance: +₹500.00',
      'Status: OVER BUDGET',
    ]);
  });
});

describe('report rendering', () => {
  const report: CostReport = {
    project_name: 'Shop',
    analysis: analyze(standardLedger(), 50000),
    recommendations: [
      {
        title: 'Rightsize app servers',
        service: 'Compute',
        potential_savings: 3000,
        recommendation_type: 'rightsizing',
        description: 'Move to smaller instances',
        implementation_effort: 'low',
        risk_level: 'medium',
        steps: ['Review CPU graphs', 'Resize'],
      },
      {
        title: 'Tier cold objects',
        service: 'Storage',
        potential_savings: 2000,
        recommendation_type: 'lifecycle',
        description: 'Lifecycle rules',
      },
    ],
  };

  it('summarises the report with the top recommendations', () => {
    expect(renderReportSummary(report)).toEqual([
      RULE,
      'REPORT: Shop',
      RULE,
      'Total: ₹50,000.00 (Budget: ₹50,000)',
      'Variance: ₹0.00',
      'Status: UNDER BUDGET',
      '',
      'High-cost services:',
      '  Compute: ₹24,000.00',
      '  Database: ₹14,000.00',
      '  Storage: ₹6,000.00',
      '  Networking: ₹4,000.00',
      '',
      'Potential savings: ₹5,000 (10.0% of monthly cost)',
      'Found 2 recommendations. Top 2:',
      '1. Rightsize app servers (Save: ₹3,000)',
      '2. Tier cold objects (Save: ₹2,000)',
    ]);
  });

  it('lists every recommendation in full', () => {
    expect(renderRecommendations(report)).toEqual([
      RULE,
      'RECOMMENDATIONS (2)',
      RULE,
      '',
      '1. Rightsize app servers',
      '   Service: Compute',
      '   Savings: ₹3,000',
      '   Effort: low, Risk: medium',
      '   Action: Move to smaller instances',
      '     - Review CPU graphs',
      '     - Resize',
      '',
      '2. Tier cold objects',
      '   Service: Storage',
      '   Savings: ₹2,000',
      '   Action: Lifecycle rules',
    ]);
  });
});
