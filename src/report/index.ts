/**
 * Plain-text rendering of a cost report for the terminal.
 */

import { savingsSummary } from '../analysis/index.js';
import type { CostReport, FinancialSummary } from '../contracts/index.js';

const RULE = '='.repeat(50);
const TOP_RECOMMENDATIONS = 3;

/** "₹49,902.25" with `decimals` fraction digits, comma-grouped. */
export function formatInr(value: number, decimals = 0): string {
  return `₹${value.toLocaleString('en-US', { minimumFractionDigits: decimals, maximumFractionDigits: decimals })}`;
}

function signOf(value: number): string {
  if (value > 0) return '+';
  return value < 0 ? '-' : '';
}

export function renderAnalysis(summary: FinancialSummary): string[] {
  const lines = [
    `Total: ${formatInr(summary.total_monthly_cost, 2)} (Budget: ${formatInr(summary.budget)})`,
    `Variance: ${signOf(summary.budget_variance)}${formatInr(Math.abs(summary.budget_variance), 2)}`,
    `Status: ${summary.is_over_budget ? 'OVER BUDGET' : 'UNDER BUDGET'}`,
  ];

  const highCost = Object.entries(summary.high_cost_services);
  if (highCost.length > 0) {
    lines.push('', 'High-cost services:');
    for (const [service, cost] of highCost) lines.push(`  ${service}: ${formatInr(cost, 2)}`);
  }
  return lines;
}

/** Headline figures plus the top three recommendations. */
export function renderReportSummary(report: CostReport): string[] {
  const { recommendations } = report;
  const savings = savingsSummary(recommendations, report.analysis.total_monthly_cost);
  const lines = [RULE, `REPORT: ${report.project_name}`, RULE, ...renderAnalysis(report.analysis)];

  lines.push(
    '',
    `Potential savings: ${formatInr(savings.total)} (${savings.percent.toFixed(1)}% of monthly cost)`,
    `Found ${recommendations.length} recommendations. Top ${Math.min(TOP_RECOMMENDATIONS, recommendations.length)}:`,
  );
  recommendations.slice(0, TOP_RECOMMENDATIONS).forEach((r, i) => {
    lines.push(`${i + 1}. ${r.title} (Save: ${formatInr(r.potential_savings)})`);
  });
  return lines;
}

export function renderRecommendations(report: CostReport): string[] {
  const lines = [RULE, `RECOMMENDATIONS (${report.recommendations.length})`, RULE];
  report.recommendations.forEach((r, i) => {
    lines.push('', `${i + 1}. ${r.title}`, `   Service: ${r.service}`, `   Savings: ${formatInr(r.potential_savings)}`);
    if (r.implementation_effort || r.risk_level) {
      lines.push(`   Effort: ${r.implementation_effort ?? 'n/a'}, Risk: ${r.risk_level ?? 'n/a'}`);
    }
    lines.push(`   Action: ${r.description}`);
    for (const step of r.steps ?? []) lines.push(`     - ${step}`);
  });
  return lines;
}
