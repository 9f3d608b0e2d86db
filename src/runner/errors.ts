/**
 * Error taxonomy and the shared error envelope.
 *
 * Only configuration problems, a fallback that breaks its own
 * constraint, and user interrupts ever leave the pipeline; gateway and
 * schema failures are absorbed by the retry orchestrator. Whatever does
 * reach the user goes through `RunnerErrorEnvelope` so CLI output, logs
 * and run_summary.json share one shape.
 */

import { redactString } from './redact.js';

// ---- Exit codes -------------------------------------------------------
export const EXIT_SUCCESS = 0;
export const EXIT_VALIDATION = 2;
export const EXIT_DEPENDENCY = 3;
export const EXIT_BUG = 4;
export const EXIT_INTERRUPTED = 130;

export type ErrorCode =
  | 'CONFIG_ERROR'
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'IO_ERROR'
  | 'FALLBACK_FAILURE'
  | 'ABORTED'
  | 'INTERNAL_ERROR';

const CODE_TO_EXIT: Record<ErrorCode, number> = {
  CONFIG_ERROR: EXIT_VALIDATION,
  VALIDATION_ERROR: EXIT_VALIDATION,
  NOT_FOUND: EXIT_VALIDATION,
  IO_ERROR: EXIT_DEPENDENCY,
  FALLBACK_FAILURE: EXIT_BUG,
  ABORTED: EXIT_INTERRUPTED,
  INTERNAL_ERROR: EXIT_BUG,
};

const RETRYABLE = new Set<ErrorCode>(['IO_ERROR', 'ABORTED']);

export function exitCodeFor(code: ErrorCode): number {
  return CODE_TO_EXIT[code];
}

// ---- Error classes ------------------------------------------------------

export class PipelineError extends Error {
  readonly code: ErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
    this.context = context;
  }
}

/** Missing or malformed configuration; raised before any stage runs. */
export class ConfigurationError extends PipelineError {
  constructor(message: string, context?: Record<string, unknown>) {
    super('CONFIG_ERROR', message, context);
    this.name = 'ConfigurationError';
  }
}

/** The deterministic generator produced a document its own constraint rejects. */
export class FallbackFailureError extends PipelineError {
  readonly violations: readonly string[];

  constructor(stage: string, violations: readonly string[]) {
    super(
      'FALLBACK_FAILURE',
      `Internal consistency error: ${stage} fallback violates its constraint (${violations.slice(0, 3).join('; ')})`,
      { stage, violations: [...violations] },
    );
    this.name = 'FallbackFailureError';
    this.violations = violations;
  }
}

/** A user interrupt cancelled the in-flight stage. */
export class PipelineAbortedError extends PipelineError {
  constructor(stage?: string) {
    super('ABORTED', stage ? `Interrupted during ${stage} stage` : 'Interrupted', stage ? { stage } : undefined);
    this.name = 'PipelineAbortedError';
  }
}

// ---- Error envelope --------------------------------------------------

export interface RunnerErrorEnvelope {
  code: ErrorCode;
  message: string;
  userMessage: string;
  retryable: boolean;
  cause?: string;
  context?: Record<string, unknown>;
}

export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  opts: { cause?: unknown; context?: Record<string, unknown> } = {},
): RunnerErrorEnvelope {
  const causeMsg = opts.cause instanceof Error
    ? opts.cause.message
    : opts.cause != null
      ? String(opts.cause)
      : undefined;

  return {
    code,
    message,
    userMessage: redactString(message),
    retryable: RETRYABLE.has(code),
    cause: causeMsg ? redactString(causeMsg) : undefined,
    context: opts.context,
  };
}

/**
 * Wrap an unknown thrown value into a RunnerErrorEnvelope.
 */
export function wrapError(err: unknown): RunnerErrorEnvelope {
  if (err instanceof PipelineError) {
    return createErrorEnvelope(err.code, err.message, { context: err.context });
  }
  if (err instanceof Error) {
    return createErrorEnvelope('INTERNAL_ERROR', err.message, { cause: err });
  }
  return createErrorEnvelope('INTERNAL_ERROR', String(err));
}
