/**
 * Core document contracts and Zod schemas for costplan
 *
 * Field names of the persisted documents (profile, billing, report) are
 * load-bearing: other tools read these files, so renames are breaking.
 * Amounts are INR with two-decimal precision.
 */

import { z } from 'zod';

// ============================================================================
// Stages & provenance
// ============================================================================

export const StageKindSchema = z.enum(['profile', 'billing', 'analysis']);
export const OriginSchema = z.enum(['ai', 'fallback']);

export type StageKind = z.infer<typeof StageKindSchema>;
export type Origin = z.infer<typeof OriginSchema>;

export const CloudProviderSchema = z.enum(['AWS', 'Azure', 'GCP', 'DigitalOcean', 'Oracle Cloud']);
export type CloudProvider = z.infer<typeof CloudProviderSchema>;

// ============================================================================
// Profile (stage 1)
// ============================================================================

export const TechStackSchema = z.record(z.string().min(1), z.string());

export const ProjectProfileSchema = z.object({
  name: z.string().min(1),
  budget: z.number().positive(),
  description: z.string(),
  tech_stack: TechStackSchema,
  non_functional_requirements: z.array(z.string()),
});

export type TechStack = z.infer<typeof TechStackSchema>;
export type ProjectProfile = z.infer<typeof ProjectProfileSchema>;

// ============================================================================
// Billing ledger (stage 2)
// ============================================================================

export const BillingMonthSchema = z.string().regex(/^\d{4}-(0[1-9]|1[0-2])$/, 'expected YYYY-MM');

export const BillingRecordSchema = z.object({
  month: z.string().min(1),
  service: z.string().min(1),
  resource_id: z.string().min(1),
  region: z.string(),
  usage_type: z.string(),
  usage_quantity: z.number().nonnegative(),
  unit: z.string(),
  cost_inr: z.number().nonnegative(),
  desc: z.string(),
});

export const BillingDocumentSchema = z.array(BillingRecordSchema).min(12).max(20);

export type BillingRecord = z.infer<typeof BillingRecordSchema>;
export type BillingDocument = z.infer<typeof BillingDocumentSchema>;

// ============================================================================
// Financial summary (derived, never persisted on its own)
// ============================================================================

export const FinancialSummarySchema = z.object({
  total_monthly_cost: z.number().nonnegative(),
  budget: z.number(),
  budget_variance: z.number(),
  service_costs: z.record(z.string(), z.number().nonnegative()),
  high_cost_services: z.record(z.string(), z.number().nonnegative()),
  is_over_budget: z.boolean(),
});

export type FinancialSummary = z.infer<typeof FinancialSummarySchema>;

// ============================================================================
// Recommendations & report (stage 3)
// ============================================================================

export const RecommendationSchema = z.object({
  title: z.string().min(1),
  service: z.string().min(1),
  current_cost: z.number().nonnegative().optional(),
  potential_savings: z.number().nonnegative(),
  recommendation_type: z.string().min(1),
  description: z.string(),
  implementation_effort: z.string().optional(),
  risk_level: z.string().optional(),
  steps: z.array(z.string()).optional(),
  cloud_providers: z.array(z.string()).optional(),
});

export const RecommendationListSchema = z.array(RecommendationSchema).min(6).max(10);

export const CostReportSchema = z.object({
  project_name: z.string(),
  analysis: FinancialSummarySchema,
  recommendations: RecommendationListSchema,
});

export type Recommendation = z.infer<typeof RecommendationSchema>;
export type CostReport = z.infer<typeof CostReportSchema>;

// ============================================================================
// Run summary (diagnostics written beside the artifacts)
// ============================================================================

export const StageSummarySchema = z.object({
  stage: StageKindSchema,
  origin: OriginSchema,
  attempts: z.number().int().min(0),
  violations: z.array(z.string()),
  artifact: z.string(),
});

export type StageSummary = z.infer<typeof StageSummarySchema>;
