/**
 * costplan
 *
 * Turns a free-text project description into a project profile, a
 * synthetic month of cloud billing and a cost-optimisation report, with
 * every model-generated document checked against its stage constraint
 * and a deterministic fallback behind each stage.
 *
 * Boundary Statement:
 * - One text-completion service, reached over an OpenAI-compatible API
 * - Billing data is simulated; nothing reads a real cloud account
 * - Amounts are INR per month
 */

// Contracts
export {
  StageKindSchema,
  OriginSchema,
  CloudProviderSchema,
  TechStackSchema,
  ProjectProfileSchema,
  BillingMonthSchema,
  BillingRecordSchema,
  BillingDocumentSchema,
  FinancialSummarySchema,
  RecommendationSchema,
  RecommendationListSchema,
  CostReportSchema,
  StageSummarySchema,
} from './contracts/index.js';

export type {
  StageKind,
  Origin,
  CloudProvider,
  TechStack,
  ProjectProfile,
  BillingRecord,
  BillingDocument,
  FinancialSummary,
  Recommendation,
  CostReport,
  StageSummary,
} from './contracts/index.js';

// Configuration
export { loadConfig, resolveCloudProvider, configSummary, type AppConfig } from './config/index.js';

// Generation
export {
  profileConstraint,
  billingConstraint,
  recommendationConstraint,
  BILLING_ITEM_RANGE,
  RECOMMENDATION_ITEM_RANGE,
  type SchemaConstraint,
  type FieldType,
  type ItemCountRange,
} from './generation/constraints.js';
export { validate, extractStructuredBlock, UNPARSEABLE, type ValidationResult } from './generation/validator.js';
export {
  CompletionGateway,
  createGateway,
  createOpenAICompletion,
  classifyGatewayError,
  type InferenceGateway,
  type CompletionFn,
  type GatewayOutcome,
  type ClassifiedError,
  type SendOptions,
} from './generation/gateway.js';
export {
  RetryOrchestrator,
  promptWithFeedback,
  type OrchestratorOptions,
  type OrchestratorState,
} from './generation/orchestrator.js';
export type { GenerationRequest, GenerationResult, GenerationAttempt } from './generation/types.js';

// Fallback
export { generateFallback, type FallbackInput } from './fallback/index.js';

// Analysis
export {
  analyze,
  foldEmbeddedDatabase,
  normalizeRecommendations,
  capTotalSavings,
  savingsSummary,
} from './analysis/index.js';

// Stages
export { runPipeline, billingMonthOf, type PipelineOptions, type PipelineResult } from './stages/pipeline.js';
export { profileRequest, normalizeProfile } from './stages/profile.js';
export { billingRequest, normalizeBilling, alignToBudget } from './stages/billing.js';
export { analysisRequest, buildReport } from './stages/analysis.js';

// Report rendering
export { renderReportSummary, renderRecommendations, renderAnalysis, formatInr } from './report/index.js';

// Runner
export * from './runner/index.js';
