/**
 * Stage pipeline: profile -> billing -> analysis, strictly in order.
 *
 * Each stage's document is written as soon as the stage completes; a
 * later abort leaves earlier artifacts on disk.
 */

import { RetryOrchestrator, type OrchestratorOptions } from '../generation/orchestrator.js';
import type { InferenceGateway } from '../generation/gateway.js';
import type { GenerationResult } from '../generation/types.js';
import { analyze, foldEmbeddedDatabase } from '../analysis/index.js';
import { resolveCloudProvider, type AppConfig } from '../config/index.js';
import { ARTIFACT_FILES, artifactFileFor, type ArtifactWriter } from '../runner/artifacts.js';
import { PipelineAbortedError, PipelineError } from '../runner/errors.js';
import { DEFAULT_RETRY_POLICY, type RetryPolicy, type Sleeper } from '../runner/retry.js';
import type { StructuredLogger } from '../runner/logger.js';
import { profileRequest } from './profile.js';
import { alignToBudget, billingRequest } from './billing.js';
import { analysisRequest, buildReport } from './analysis.js';
import {
  BillingMonthSchema,
  type BillingDocument,
  type CloudProvider,
  type CostReport,
  type ProjectProfile,
  type StageSummary,
} from '../contracts/index.js';

export interface PipelineOptions {
  description: string;
  config: AppConfig;
  gateway: InferenceGateway;
  logger: StructuredLogger;
  writer: ArtifactWriter;
  /** YYYY-MM the ledger covers. */
  billingMonth: string;
  signal?: AbortSignal;
  sleep?: Sleeper;
  onTransition?: OrchestratorOptions['onTransition'];
  onStageComplete?: (summary: StageSummary) => void;
}

export interface PipelineResult {
  profile: ProjectProfile;
  billing: BillingDocument;
  report: CostReport;
  cloudProvider: CloudProvider;
  stages: StageSummary[];
}

/** YYYY-MM of `date` in local time. */
export function billingMonthOf(date: Date): string {
  return `${date.getFullYear()}-${String(date.getMonth() + 1).padStart(2, '0')}`;
}

export function retryPolicyFor(config: Pick<AppConfig, 'maxAttempts' | 'backoffMs'>): RetryPolicy {
  return {
    ...DEFAULT_RETRY_POLICY,
    maxAttempts: config.maxAttempts,
    initialDelayMs: config.backoffMs,
    maxDelayMs: Math.max(DEFAULT_RETRY_POLICY.maxDelayMs, config.backoffMs),
  };
}

function summarizeStage<T>(result: GenerationResult<T>): StageSummary {
  const last = result.attempts.at(-1);
  const violations = last ? (last.error ? [`${last.error.kind}: ${last.error.message}`] : [...last.violations]) : [];
  return {
    stage: result.stage,
    origin: result.origin,
    attempts: result.attempts.length,
    violations: result.origin === 'fallback' ? violations : [],
    artifact: artifactFileFor(result.stage),
  };
}

export async function runPipeline(options: PipelineOptions): Promise<PipelineResult> {
  const { config, writer, signal } = options;
  const description = options.description.trim();
  if (!description) {
    throw new PipelineError('VALIDATION_ERROR', 'Project description is empty');
  }
  if (!BillingMonthSchema.safeParse(options.billingMonth).success) {
    throw new PipelineError('VALIDATION_ERROR', `Billing month must be YYYY-MM, got "${options.billingMonth}"`);
  }
  if (signal?.aborted) throw new PipelineAbortedError();

  const log = options.logger.child('pipeline');
  const orchestrator = new RetryOrchestrator({
    gateway: options.gateway,
    logger: options.logger.child('orchestrator'),
    policy: retryPolicyFor(config),
    timeoutMs: config.timeoutMs,
    sleep: options.sleep,
    onTransition: options.onTransition,
  });
  const stages: StageSummary[] = [];

  const complete = <T>(result: GenerationResult<T>, document: unknown): void => {
    const summary = summarizeStage(result);
    writer.writeDocument(summary.artifact, document);
    stages.push(summary);
    options.onStageComplete?.(summary);
    log.info('pipeline.stage_complete', `${result.stage} stage complete (${result.origin})`, {
      stage: result.stage,
      origin: result.origin,
      attempts: summary.attempts,
    });
  };

  writer.writeText(ARTIFACT_FILES.description, description);

  // Stage 1
  const profileResult = await orchestrator.run(profileRequest(description), signal);
  const profile = profileResult.payload;
  complete(profileResult, profile);

  const cloudProvider = resolveCloudProvider(config.cloudProvider, profile.tech_stack);
  log.info('pipeline.cloud_provider', `Targeting ${cloudProvider}`, {
    cloud_provider: cloudProvider,
    source: config.cloudProvider ? 'config' : 'detected',
  });

  // Stage 2
  const billingResult = await orchestrator.run(billingRequest(profile, cloudProvider, options.billingMonth), signal);
  const billing =
    billingResult.origin === 'ai' && config.alignBillingToBudget
      ? alignToBudget(billingResult.payload, profile.budget)
      : billingResult.payload;
  complete(billingResult, billing);

  // Stage 3
  const summary = analyze(foldEmbeddedDatabase(billing, profile.tech_stack), profile.budget);
  const analysisResult = await orchestrator.run(analysisRequest(profile, summary, cloudProvider), signal);
  const report = buildReport(profile.name, summary, analysisResult.payload);
  complete(analysisResult, report);

  return { profile, billing, report, cloudProvider, stages };
}
