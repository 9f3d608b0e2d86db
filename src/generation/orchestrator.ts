/**
 * Retry orchestrator
 *
 * Drives one stage's generation as an explicit state machine:
 *
 *   pending -> requesting -> validating -> success
 *                  ^             |
 *                  |             v
 *                  +-------- retrying -> fallback
 *
 * A classified gateway error goes straight from requesting to retrying.
 * At most `policy.maxAttempts` gateway calls are made; after that the
 * deterministic fallback supplies the document. Either way the payload
 * satisfies the stage constraint.
 */

import { validate, UNPARSEABLE, extractStructuredBlock, type ValidationResult } from './validator.js';
import type { GatewayOutcome, InferenceGateway } from './gateway.js';
import type { GenerationAttempt, GenerationRequest, GenerationResult } from './types.js';
import { generateFallback } from '../fallback/index.js';
import { backoffDelay, sleep as defaultSleep, DEFAULT_RETRY_POLICY, type RetryPolicy, type Sleeper } from '../runner/retry.js';
import { FallbackFailureError, PipelineAbortedError } from '../runner/errors.js';
import type { StructuredLogger } from '../runner/logger.js';
import type { StageKind } from '../contracts/index.js';

export type OrchestratorState<T> =
  | { kind: 'pending' }
  | { kind: 'requesting'; attempt: number }
  | { kind: 'validating'; attempt: number; raw: string }
  | { kind: 'retrying'; attempt: number }
  | { kind: 'fallback' }
  | { kind: 'success'; document: T };

export type StateKind = OrchestratorState<unknown>['kind'];

export interface OrchestratorOptions {
  gateway: InferenceGateway;
  logger: StructuredLogger;
  policy?: RetryPolicy;
  timeoutMs: number;
  sleep?: Sleeper;
  /** Called on every state change; used for diagnostics. */
  onTransition?: (stage: StageKind, from: StateKind, to: StateKind) => void;
}

const MAX_FEEDBACK_VIOLATIONS = 5;

/**
 * Prompt for the next attempt, telling the model what was wrong with
 * its previous answer.
 */
export function promptWithFeedback(basePrompt: string, previous: GenerationAttempt | undefined): string {
  if (!previous || previous.error) return basePrompt;
  if (previous.violations.length === 1 && previous.violations[0] === UNPARSEABLE) {
    return `${basePrompt}\n\nPREVIOUS OUTPUT WAS NOT JSON.\nReturn ONLY valid JSON.`;
  }
  if (previous.violations.length > 0) {
    const listed = previous.violations.slice(0, MAX_FEEDBACK_VIOLATIONS).join('; ');
    return `${basePrompt}\n\nPREVIOUS OUTPUT INVALID: ${listed}\nEnsure strict JSON compliance.`;
  }
  return basePrompt;
}

export class RetryOrchestrator {
  private readonly policy: RetryPolicy;
  private readonly sleep: Sleeper;

  constructor(private readonly options: OrchestratorOptions) {
    this.policy = options.policy ?? DEFAULT_RETRY_POLICY;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async run<T>(request: GenerationRequest<T>, signal?: AbortSignal): Promise<GenerationResult<T>> {
    const log = this.options.logger;
    const attempts: GenerationAttempt[] = [];
    let state: OrchestratorState<T> = { kind: 'pending' };
    let prompt = request.prompt;

    const moveTo = (from: OrchestratorState<T>, next: OrchestratorState<T>): OrchestratorState<T> => {
      log.debug('orchestrator.transition', `${request.stage}: ${from.kind} -> ${next.kind}`);
      this.options.onTransition?.(request.stage, from.kind, next.kind);
      return next;
    };

    for (;;) {
      switch (state.kind) {
        case 'pending':
          state = moveTo(state, { kind: 'requesting', attempt: 1 });
          break;

        case 'requesting': {
          const { attempt } = state;
          if (signal?.aborted) throw new PipelineAbortedError(request.stage);

          const outcome = await this.callGateway(request, prompt, signal);
          if (outcome.ok) {
            state = moveTo(state, { kind: 'validating', attempt, raw: outcome.text });
          } else {
            attempts.push({ attempt, rawResponse: null, error: outcome.error, violations: [] });
            log.warn('orchestrator.gateway_error', `${request.stage} attempt ${attempt}: ${outcome.error.kind} error`, {
              stage: request.stage,
              attempt,
              kind: outcome.error.kind,
              status: outcome.error.status,
              detail: outcome.error.message,
            });
            state = moveTo(state, { kind: 'retrying', attempt });
          }
          break;
        }

        case 'validating': {
          const { attempt, raw } = state;
          const result = this.check(request, raw);
          attempts.push({ attempt, rawResponse: raw, error: null, violations: result.ok ? [] : result.violations });
          if (result.ok) {
            state = moveTo(state, { kind: 'success', document: result.document });
          } else {
            log.warn('orchestrator.invalid', `${request.stage} attempt ${attempt}: ${result.violations.length} violation(s)`, {
              stage: request.stage,
              attempt,
              violations: result.violations.slice(0, MAX_FEEDBACK_VIOLATIONS),
            });
            state = moveTo(state, { kind: 'retrying', attempt });
          }
          break;
        }

        case 'retrying': {
          const { attempt } = state;
          if (attempt >= this.policy.maxAttempts) {
            state = moveTo(state, { kind: 'fallback' });
            break;
          }
          await this.wait(backoffDelay(this.policy, attempt), request.stage, signal);
          prompt = promptWithFeedback(request.prompt, attempts.at(-1));
          state = moveTo(state, { kind: 'requesting', attempt: attempt + 1 });
          break;
        }

        case 'fallback':
          return this.runFallback(request, attempts);

        case 'success':
          log.info('orchestrator.success', `${request.stage} generated by model after ${attempts.length} attempt(s)`, {
            stage: request.stage,
            attempts: attempts.length,
          });
          return freezeResult({ stage: request.stage, payload: state.document, origin: 'ai', attempts });
      }
    }
  }

  private async callGateway<T>(request: GenerationRequest<T>, prompt: string, signal?: AbortSignal): Promise<GatewayOutcome> {
    try {
      return await this.options.gateway.send(prompt, {
        timeoutMs: this.options.timeoutMs,
        maxTokens: request.maxTokens,
        signal,
      });
    } catch (err) {
      if (err instanceof PipelineAbortedError || signal?.aborted) {
        throw new PipelineAbortedError(request.stage);
      }
      throw err;
    }
  }

  private check<T>(request: GenerationRequest<T>, raw: string): ValidationResult<T> {
    const extracted = extractStructuredBlock(raw);
    if (extracted === undefined) return { ok: false, violations: [UNPARSEABLE] };
    const candidate = request.normalize ? request.normalize(extracted) : extracted;
    return validate(candidate, request.constraint);
  }

  private async wait(ms: number, stage: StageKind, signal?: AbortSignal): Promise<void> {
    try {
      await this.sleep(ms, signal);
    } catch (err) {
      if (signal?.aborted) throw new PipelineAbortedError(stage);
      throw err;
    }
  }

  private runFallback<T>(request: GenerationRequest<T>, attempts: GenerationAttempt[]): GenerationResult<T> {
    const document = generateFallback(request.fallback, request.constraint);
    const result = validate(document, request.constraint);
    if (!result.ok) {
      this.options.logger.fatal('orchestrator.fallback_failure', `${request.stage} fallback violates its constraint`, {
        stage: request.stage,
        violations: result.violations,
      });
      throw new FallbackFailureError(request.stage, result.violations);
    }

    this.options.logger.warn('orchestrator.fallback', `${request.stage} generated by fallback after ${attempts.length} attempt(s)`, {
      stage: request.stage,
      attempts: attempts.length,
    });
    return freezeResult({ stage: request.stage, payload: result.document, origin: 'fallback', attempts });
  }
}

function freezeResult<T>(result: {
  stage: StageKind;
  payload: T;
  origin: 'ai' | 'fallback';
  attempts: GenerationAttempt[];
}): GenerationResult<T> {
  return Object.freeze({ ...result, attempts: Object.freeze([...result.attempts]) });
}
