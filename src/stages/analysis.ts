/**
 * Stage 3: cost analysis and optimisation recommendations.
 */

import { recommendationConstraint, RECOMMENDATION_ITEM_RANGE } from '../generation/constraints.js';
import type { GenerationRequest } from '../generation/types.js';
import { normalizeRecommendations, capTotalSavings, MAX_SAVINGS_SHARE } from '../analysis/index.js';
import { formatInr } from '../report/index.js';
import type {
  CloudProvider,
  CostReport,
  FinancialSummary,
  ProjectProfile,
  Recommendation,
} from '../contracts/index.js';

export const ANALYSIS_MAX_TOKENS = 2500;

export function buildAnalysisPrompt(profile: ProjectProfile, summary: FinancialSummary, provider: CloudProvider): string {
  const status = summary.is_over_budget ? 'OVER' : 'UNDER';
  const services = Object.keys(summary.service_costs);

  return `You are a cloud cost optimization expert. Analyze the billing summary and propose optimizations.

Project: ${profile.name}
Stack: ${JSON.stringify(profile.tech_stack)}
Requirements: ${profile.non_functional_requirements.join(', ') || 'none stated'}
Primary Cloud: ${provider}

Cost Context:
- Monthly: ${formatInr(summary.total_monthly_cost)}
- Budget: ${formatInr(summary.budget)} (${status} by ${formatInr(Math.abs(summary.budget_variance))})

Breakdown by service:
${JSON.stringify(summary.service_costs, null, 2)}

INSTRUCTIONS:
1. Return a JSON array of ${RECOMMENDATION_ITEM_RANGE.min}-${RECOMMENDATION_ITEM_RANGE.max} recommendations, nothing else.
2. "service" MUST be one of: ${services.join(', ')}
3. potential_savings is a number in INR and never exceeds that service's monthly cost.
4. Mix rightsizing, commitment, cleanup, governance and alternative-provider ideas.
   Alternative-provider items move work AWAY from ${provider}.
5. Each item has: title, service, potential_savings, recommendation_type, description,
   implementation_effort (low|medium|high), risk_level (low|medium|high), steps (list), cloud_providers (list).

Return ONLY the JSON array.`;
}

export function analysisRequest(
  profile: ProjectProfile,
  summary: FinancialSummary,
  cloudProvider: CloudProvider,
): GenerationRequest<Recommendation[]> {
  const techStack = profile.tech_stack;
  return {
    stage: 'analysis',
    prompt: buildAnalysisPrompt(profile, summary, cloudProvider),
    constraint: recommendationConstraint(Object.keys(summary.service_costs)),
    maxTokens: ANALYSIS_MAX_TOKENS,
    fallback: { stage: 'analysis', context: { summary, techStack, cloudProvider } },
    normalize: (candidate) => normalizeRecommendations(candidate, { summary, techStack }),
  };
}

export function buildReport(
  projectName: string,
  summary: FinancialSummary,
  recommendations: readonly Recommendation[],
): CostReport {
  const cap = Math.floor(summary.total_monthly_cost * MAX_SAVINGS_SHARE);
  return {
    project_name: projectName,
    analysis: summary,
    recommendations: capTotalSavings(recommendations, cap),
  };
}
